import { StatusCodes } from 'http-status-codes';

import { HeaderField, HttpMethod, KernelStage } from '../enums';
import type { EventSubscriber, SubscribedEvents } from '../events/interfaces';
import type { ResponseReadyEvent } from '../events/kernel-events';
import { GzipWriter } from '../http/writers';

export const COMPRESSION_LISTENER_PRIORITY = -256;

export interface CompressionListenerOptions {
  /** zlib compression level, 0 to 9. @default 6 */
  readonly level?: number;
}

function acceptsGzip(header: string | null): boolean {
  if (header === null) {
    return false;
  }

  return header.split(',').some(part => {
    const [coding = '', ...params] = part.split(';').map(piece => piece.trim().toLowerCase());
    const disabled = params.some(param => param.startsWith('q=') && Number(param.slice(2)) === 0);

    return coding === 'gzip' && !disabled;
  });
}

/**
 * Gzips response bodies for clients that accept it.
 */
export class CompressionListener implements EventSubscriber {
  private readonly level: number;

  constructor(options: CompressionListenerOptions = {}) {
    this.level = options.level ?? 6;
  }

  subscribedEvents(): SubscribedEvents {
    return {
      [KernelStage.ResponseReady]: {
        listener: event => {
          this.onResponseReady(event);
        },
        priority: COMPRESSION_LISTENER_PRIORITY,
      },
    };
  }

  onResponseReady(event: ResponseReadyEvent): void {
    const { request, response } = event;

    if (
      request.method === HttpMethod.Head ||
      response.status === StatusCodes.NO_CONTENT ||
      response.status === StatusCodes.NOT_MODIFIED ||
      response.getHeader(HeaderField.ContentEncoding) !== null ||
      !acceptsGzip(request.headers.get(HeaderField.AcceptEncoding))
    ) {
      return;
    }

    response.setWriter(new GzipWriter(this.level));
    response.setHeader(HeaderField.ContentEncoding, 'gzip');
    response.removeHeader(HeaderField.ContentLength);

    const vary = response.getHeader(HeaderField.Vary);

    if (vary === null) {
      response.setHeader(HeaderField.Vary, HeaderField.AcceptEncoding);
    } else if (!vary.toLowerCase().includes(HeaderField.AcceptEncoding)) {
      response.setHeader(HeaderField.Vary, `${vary}, ${HeaderField.AcceptEncoding}`);
    }
  }
}
