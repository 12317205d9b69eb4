import type { IncomingMessage } from 'node:http';

import { PayloadTooLargeError } from '../errors';
import { SwitchyardRequest } from '../http/request';

export const DEFAULT_BODY_LIMIT = 1024 * 1024;

export interface CreateRequestOptions {
  /** Largest accepted body, in bytes. @default 1 MiB */
  readonly bodyLimit?: number;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }

  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }

  return Buffer.from(String(chunk), 'utf8');
}

/**
 * Reads an incoming message, body included, into a request the kernel can handle.
 */
export async function createRequest(incoming: IncomingMessage, options: CreateRequestOptions = {}): Promise<SwitchyardRequest> {
  const limit = options.bodyLimit ?? DEFAULT_BODY_LIMIT;
  const declaredLength = Number(incoming.headers['content-length']);

  if (Number.isFinite(declaredLength) && declaredLength > limit) {
    throw new PayloadTooLargeError(`The request body exceeds the limit of ${limit} bytes.`);
  }

  const chunks: Buffer[] = [];
  let received = 0;

  for await (const chunk of incoming) {
    const buffer = toBuffer(chunk);

    received += buffer.length;

    if (received > limit) {
      throw new PayloadTooLargeError(`The request body exceeds the limit of ${limit} bytes.`);
    }

    chunks.push(buffer);
  }

  return new SwitchyardRequest({
    method: incoming.method ?? 'GET',
    url: incoming.url ?? '/',
    headers: incoming.headers,
    body: Buffer.concat(chunks).toString('utf8'),
  });
}
