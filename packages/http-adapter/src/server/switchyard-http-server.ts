import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';

import { toError } from '@switchyard/common';
import { Logger, type LoggerLike } from '@switchyard/logger';

import { DefaultErrorRenderer, type ErrorRenderer } from '../errors/error-renderer';
import { RequestAbortedError } from '../errors/request-aborted.error';
import type { SwitchyardRequest } from '../http/request';
import type { HttpKernel } from '../kernel/http-kernel';

import { createRequest, DEFAULT_BODY_LIMIT } from './node-request';
import { NodeResponseSink } from './node-response-sink';

export interface SwitchyardHttpServerOptions {
  /** @default 1 MiB */
  readonly bodyLimit?: number;
  /** Renders failures that happen before the kernel sees the request. */
  readonly errorRenderer?: ErrorRenderer;
  readonly logger?: LoggerLike;
}

/**
 * Serves a kernel over `node:http`. Each request gets an abort signal that fires when the
 * connection closes before the response is complete.
 */
export class SwitchyardHttpServer {
  private readonly server: Server;
  private readonly bodyLimit: number;
  private readonly errorRenderer: ErrorRenderer;
  private readonly logger: LoggerLike;

  constructor(
    private readonly kernel: HttpKernel,
    options: SwitchyardHttpServerOptions = {},
  ) {
    this.bodyLimit = options.bodyLimit ?? DEFAULT_BODY_LIMIT;
    this.errorRenderer = options.errorRenderer ?? new DefaultErrorRenderer();
    this.logger = options.logger ?? new Logger(SwitchyardHttpServer.name);
    this.server = createServer((incoming, outgoing) => {
      this.handle(incoming, outgoing).catch((error: unknown) => {
        this.logger.log('fatal', 'Unhandled failure while serving a request', toError(error));
      });
    });
  }

  listen(port: number, host = '0.0.0.0'): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, host, () => {
        this.server.off('error', reject);

        const address = this.server.address();

        if (address === null || typeof address === 'string') {
          reject(new Error('The server is not listening on a TCP address.'));

          return;
        }

        this.logger.log('info', 'Server listening', { host: address.address, port: address.port });
        resolve(address);
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close(error => {
        if (error) {
          reject(error);

          return;
        }

        this.logger.log('info', 'Server closed');
        resolve();
      });
    });
  }

  async handle(incoming: IncomingMessage, outgoing: ServerResponse): Promise<void> {
    const controller = new AbortController();

    outgoing.once('close', () => {
      if (!outgoing.writableFinished) {
        controller.abort();
      }
    });

    let request: SwitchyardRequest;

    try {
      request = await createRequest(incoming, { bodyLimit: this.bodyLimit });
    } catch (error) {
      const failure = toError(error);

      this.logger.log('warn', `Rejected request: ${failure.message}`, { method: incoming.method, url: incoming.url });

      const response = this.errorRenderer.render(failure);
      const sink = new NodeResponseSink(outgoing);

      sink.begin(response);
      await response.write(sink);
      sink.end();

      return;
    }

    try {
      await this.kernel.serve(request, new NodeResponseSink(outgoing), { signal: controller.signal });
    } catch (error) {
      if (error instanceof RequestAbortedError) {
        this.logger.log('debug', error.message, { method: request.method, path: request.path });

        return;
      }

      this.logger.log('error', 'Request failed outside the exception stage', toError(error));

      if (!outgoing.headersSent) {
        outgoing.writeHead(500, { 'content-type': 'application/json; charset=utf-8' });
        outgoing.end('{"code":500,"message":"Internal Server Error"}');
      } else {
        outgoing.end();
      }
    }
  }
}
