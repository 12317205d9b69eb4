import { SwitchyardError } from '@switchyard/common';
import { StatusCodes } from 'http-status-codes';

export interface HttpErrorOptions extends ErrorOptions {
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * A failure the client is allowed to see: its status and message are rendered as is.
 */
export class HttpError extends SwitchyardError {
  readonly statusCode: StatusCodes;
  readonly headers: Readonly<Record<string, string>>;

  constructor(statusCode: StatusCodes, message: string, options: HttpErrorOptions = {}) {
    super(message, options);

    this.statusCode = statusCode;
    this.headers = options.headers ?? {};
  }

  isClientError(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500;
  }
}

export class BadRequestError extends HttpError {
  constructor(message = 'Bad Request', options?: HttpErrorOptions) {
    super(StatusCodes.BAD_REQUEST, message, options);
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = 'Forbidden', options?: HttpErrorOptions) {
    super(StatusCodes.FORBIDDEN, message, options);
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Not Found', options?: HttpErrorOptions) {
    super(StatusCodes.NOT_FOUND, message, options);
  }
}

export class MethodNotAllowedError extends HttpError {
  readonly allowedMethods: readonly string[];

  constructor(allowedMethods: readonly string[], message = 'Method Not Allowed', options: HttpErrorOptions = {}) {
    super(StatusCodes.METHOD_NOT_ALLOWED, message, {
      ...options,
      headers: { ...options.headers, allow: allowedMethods.join(', ') },
    });

    this.allowedMethods = allowedMethods;
  }
}

export class NotAcceptableError extends HttpError {
  constructor(message = 'Not Acceptable', options?: HttpErrorOptions) {
    super(StatusCodes.NOT_ACCEPTABLE, message, options);
  }
}

export class ConflictError extends HttpError {
  constructor(message = 'Conflict', options?: HttpErrorOptions) {
    super(StatusCodes.CONFLICT, message, options);
  }
}

export class PayloadTooLargeError extends HttpError {
  constructor(message = 'Payload Too Large', options?: HttpErrorOptions) {
    super(StatusCodes.REQUEST_TOO_LONG, message, options);
  }
}

export class UnprocessableEntityError extends HttpError {
  constructor(message = 'Unprocessable Entity', options?: HttpErrorOptions) {
    super(StatusCodes.UNPROCESSABLE_ENTITY, message, options);
  }
}

export class InternalServerError extends HttpError {
  constructor(message = 'Internal Server Error', options?: HttpErrorOptions) {
    super(StatusCodes.INTERNAL_SERVER_ERROR, message, options);
  }
}
