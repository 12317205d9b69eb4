import { LogicError } from '@switchyard/common';
import { StatusCodes } from 'http-status-codes';

import type { RequestContext } from '../context/request-context';
import { NotAcceptableError } from '../errors';
import { SwitchyardResponse } from '../http/response';
import type { Action } from '../route/action';

import type { FormatHandlerRegistry } from './format-handler-registry';
import type { FormatNegotiator } from './format-negotiator';
import { View } from './view';

/**
 * Converts whatever an action returned into a response.
 */
export class ResponseBuilder {
  constructor(
    private readonly registry: FormatHandlerRegistry,
    private readonly negotiator: FormatNegotiator,
  ) {}

  build(result: unknown, context: RequestContext, action: Action): SwitchyardResponse {
    if (result instanceof SwitchyardResponse) {
      return result;
    }

    if (action.returns === 'response') {
      throw new LogicError(`Action '${action.name}' must return a response, got ${describe(result)}.`);
    }

    if (result === undefined || action.returns === 'void') {
      return new SwitchyardResponse(null, StatusCodes.NO_CONTENT);
    }

    const view = result instanceof View ? result : new View(result);
    const format = view.format ?? this.negotiator.negotiate(context);
    const handler = this.registry.get(format);

    if (handler === undefined) {
      throw new NotAcceptableError(`The format '${format}' is not supported.`);
    }

    return handler.render(view, context.request, format);
  }
}

function describe(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  return Array.isArray(value) ? 'array' : typeof value;
}
