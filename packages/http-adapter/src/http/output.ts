import type { SwitchyardResponse } from './response';

/**
 * Anything content can be written to: a `ServerResponse`, a stream, a buffer.
 */
export interface OutputSink {
  write(chunk: string | Uint8Array): unknown;
}

/**
 * A sink the kernel serves a whole response to: `begin` receives the prepared status and
 * headers before any content, `end` follows the last chunk.
 */
export interface ResponseSink extends OutputSink {
  begin?(response: SwitchyardResponse): void;
  end?(): void;
}

export class BufferedOutput implements OutputSink {
  private readonly chunks: Buffer[] = [];

  write(chunk: string | Uint8Array): boolean {
    this.chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));

    return true;
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }

  toString(): string {
    return this.toBuffer().toString('utf8');
  }

  get byteLength(): number {
    return this.chunks.reduce((total, chunk) => total + chunk.length, 0);
  }
}
