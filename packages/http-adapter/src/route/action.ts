import type { ParamDescriptor } from '../arguments/interfaces';

/**
 * How the response builder treats the value an action returns.
 * - `data`: any value, rendered through the negotiated format handler
 * - `response`: the action builds its own response
 * - `void`: nothing to render, answered with 204
 */
export type ReturnHint = 'data' | 'response' | 'void';

export interface Action {
  readonly name: string;
  readonly parameters: readonly ParamDescriptor[];
  readonly returns: ReturnHint;
  handle(...args: unknown[]): unknown;
}

export interface ActionInit {
  readonly name: string;
  readonly parameters?: readonly ParamDescriptor[];
  readonly returns?: ReturnHint;
  handle(...args: unknown[]): unknown;
}

export function defineAction(init: ActionInit): Action {
  return Object.freeze({
    name: init.name,
    parameters: Object.freeze([...(init.parameters ?? [])]),
    returns: init.returns ?? 'data',
    handle: init.handle,
  });
}
