import type { ResponseSink } from '../http/output';
import type { SwitchyardResponse } from '../http/response';

/**
 * The part of `ServerResponse` the sink writes to.
 */
export interface ServerResponseLike {
  readonly headersSent: boolean;
  writeHead(statusCode: number, headers: Record<string, string | string[]>): unknown;
  write(chunk: string | Uint8Array): unknown;
  end(): unknown;
}

export function toNodeHeaders(headers: Headers): Record<string, string | string[]> {
  const result: Record<string, string | string[]> = {};

  headers.forEach((value, name) => {
    result[name] = value;
  });

  const cookies = headers.getSetCookie();

  if (cookies.length > 0) {
    result['set-cookie'] = cookies;
  }

  return result;
}

export class NodeResponseSink implements ResponseSink {
  constructor(private readonly target: ServerResponseLike) {}

  begin(response: SwitchyardResponse): void {
    this.target.writeHead(response.status, toNodeHeaders(response.headers));
  }

  write(chunk: string | Uint8Array): unknown {
    return this.target.write(chunk);
  }

  end(): void {
    this.target.end();
  }
}
