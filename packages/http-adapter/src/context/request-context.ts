import { RequestAbortedError } from '../errors';
import type { SwitchyardRequest } from '../http/request';
import type { SwitchyardResponse } from '../http/response';

import { AttributeBag } from './attribute-bag';

const NEVER_ABORTED = new AbortController().signal;

/**
 * State of one request as it travels through the kernel. Never shared between requests.
 */
export class RequestContext {
  readonly attributes = new AttributeBag();
  private currentResponse: SwitchyardResponse | undefined;
  private exceptionDispatched = false;

  constructor(
    readonly request: SwitchyardRequest,
    readonly signal: AbortSignal = NEVER_ABORTED,
  ) {}

  get response(): SwitchyardResponse | undefined {
    return this.currentResponse;
  }

  setResponse(response: SwitchyardResponse): void {
    this.currentResponse = response;
  }

  hasResponse(): boolean {
    return this.currentResponse !== undefined;
  }

  isAborted(): boolean {
    return this.signal.aborted;
  }

  throwIfAborted(stage: string): void {
    if (this.signal.aborted) {
      throw new RequestAbortedError(stage);
    }
  }

  /**
   * Marks the exception stage as used; returns false when it already ran for this request.
   */
  claimExceptionStage(): boolean {
    if (this.exceptionDispatched) {
      return false;
    }

    this.exceptionDispatched = true;

    return true;
  }
}
