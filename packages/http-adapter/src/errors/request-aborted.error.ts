import { SwitchyardError } from '@switchyard/common';

/**
 * The client went away; nothing is left to answer.
 */
export class RequestAbortedError extends SwitchyardError {
  constructor(readonly stage: string) {
    super(`Request aborted during '${stage}'.`);
  }
}
