import { toError } from '@switchyard/common';

import type { Action } from '../route/action';

export type InvocationResult = { readonly ok: true; readonly value: unknown } | { readonly ok: false; readonly error: Error };

/**
 * Calls an action with its resolved arguments. Failures, thrown or rejected, come back as
 * results instead of propagating.
 */
export class ActionInvoker {
  async invoke(action: Action, args: readonly unknown[]): Promise<InvocationResult> {
    try {
      const value: unknown = await action.handle(...args);

      return { ok: true, value };
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }
}
