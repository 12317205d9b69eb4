import { StatusCodes } from 'http-status-codes';

import { JsonResponse } from '../http/json-response';
import type { SwitchyardResponse } from '../http/response';

import { HttpError } from './http.errors';
import { ValidationError } from './resolution.errors';

export interface ErrorRenderer {
  render(error: Error): SwitchyardResponse;
}

export interface ErrorRendererOptions {
  /** Exposes the message and stack of unexpected errors. */
  readonly debug?: boolean;
}

interface ErrorBody {
  readonly code: number;
  readonly message: string;
  readonly errors?: readonly { readonly property: string; readonly message: string }[];
  readonly exception?: { readonly name: string; readonly trace: readonly string[] };
}

export class DefaultErrorRenderer implements ErrorRenderer {
  private readonly debug: boolean;

  constructor(options: ErrorRendererOptions = {}) {
    this.debug = options.debug ?? false;
  }

  render(error: Error): SwitchyardResponse {
    if (error instanceof HttpError) {
      return new JsonResponse(this.httpErrorBody(error), error.statusCode, error.headers);
    }

    const body: ErrorBody = this.debug
      ? { code: StatusCodes.INTERNAL_SERVER_ERROR, message: error.message, exception: { name: error.name, trace: stackTrace(error) } }
      : { code: StatusCodes.INTERNAL_SERVER_ERROR, message: 'Internal Server Error' };

    return new JsonResponse(body, StatusCodes.INTERNAL_SERVER_ERROR);
  }

  private httpErrorBody(error: HttpError): ErrorBody {
    if (error instanceof ValidationError) {
      return {
        code: error.statusCode,
        message: error.message,
        errors: error.violations.map(({ property, message }) => ({ property, message })),
      };
    }

    return { code: error.statusCode, message: error.message };
  }
}

function stackTrace(error: Error): string[] {
  return (error.stack ?? '')
    .split('\n')
    .slice(1)
    .map(line => line.trim())
    .filter(line => line !== '');
}
