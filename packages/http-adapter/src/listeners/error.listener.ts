import { Logger, type LoggerLike, type LogLevel } from '@switchyard/logger';
import { StatusCodes } from 'http-status-codes';

import { KernelStage } from '../enums';
import type { ErrorRenderer } from '../errors/error-renderer';
import { HttpError } from '../errors/http.errors';
import { ValidationError } from '../errors/resolution.errors';
import type { EventSubscriber, SubscribedEvents } from '../events/interfaces';
import type { ExceptionEvent } from '../events/kernel-events';

export const ERROR_LISTENER_PRIORITY = -50;

function levelFor(error: Error): LogLevel {
  if (!(error instanceof HttpError) || !error.isClientError()) {
    return 'error';
  }

  if (error instanceof ValidationError) {
    return 'notice';
  }

  if (error.statusCode === StatusCodes.NOT_FOUND || error.statusCode === StatusCodes.METHOD_NOT_ALLOWED) {
    return 'info';
  }

  return 'warn';
}

/**
 * Logs request failures and answers them with the rendered error response.
 */
export class ErrorListener implements EventSubscriber {
  constructor(
    private readonly renderer: ErrorRenderer,
    private readonly logger: LoggerLike = new Logger(ErrorListener.name),
  ) {}

  subscribedEvents(): SubscribedEvents {
    return {
      [KernelStage.Exception]: {
        listener: event => {
          this.onException(event);
        },
        priority: ERROR_LISTENER_PRIORITY,
      },
    };
  }

  onException(event: ExceptionEvent): void {
    const { error, request } = event;
    const level = levelFor(error);
    const metadata = { method: request.method, path: request.path };

    if (level === 'error') {
      this.logger.log(level, `Uncaught ${error.name}: ${error.message}`, metadata, error);
    } else {
      this.logger.log(level, `${error.name}: ${error.message}`, metadata);
    }

    event.setResponse(this.renderer.render(error));
  }
}
