import { promisify } from 'node:util';
import { gzip } from 'node:zlib';

import type { MaybePromise } from '@switchyard/common';

import { BufferedOutput, type OutputSink } from './output';

export type ContentCallback = (output: OutputSink) => MaybePromise<void>;

/**
 * Decides how a response's content reaches the sink. It receives the content callback and
 * must invoke it once.
 */
export interface ResponseWriter {
  write(output: OutputSink, content: ContentCallback): MaybePromise<void>;
}

export class DirectWriter implements ResponseWriter {
  async write(output: OutputSink, content: ContentCallback): Promise<void> {
    await content(output);
  }
}

const gzipAsync = promisify(gzip);

export class GzipWriter implements ResponseWriter {
  constructor(private readonly level = 6) {}

  async write(output: OutputSink, content: ContentCallback): Promise<void> {
    const buffer = new BufferedOutput();

    await content(buffer);

    output.write(await gzipAsync(buffer.toBuffer(), { level: this.level }));
  }
}
