import type { RequestContext } from '../context/request-context';
import { KernelStage } from '../enums';
import type { SwitchyardRequest } from '../http/request';
import type { SwitchyardResponse } from '../http/response';
import type { Action } from '../route/action';
import type { Route } from '../route/interfaces';
import type { RouteParams } from '../route/types';

export abstract class KernelEvent {
  private propagationStopped = false;

  constructor(readonly context: RequestContext) {}

  get request(): SwitchyardRequest {
    return this.context.request;
  }

  stopPropagation(): void {
    this.propagationStopped = true;
  }

  isPropagationStopped(): boolean {
    return this.propagationStopped;
  }
}

/**
 * An event raised before the action runs. Setting a response answers the request right
 * away: later listeners and the remaining stages are skipped.
 */
export abstract class ShortCircuitEvent extends KernelEvent {
  get response(): SwitchyardResponse | undefined {
    return this.context.response;
  }

  hasResponse(): boolean {
    return this.context.hasResponse();
  }

  setResponse(response: SwitchyardResponse): void {
    this.context.setResponse(response);
    this.stopPropagation();
  }
}

export class RequestStartEvent extends ShortCircuitEvent {}

export class RouteMatchedEvent extends ShortCircuitEvent {
  constructor(
    context: RequestContext,
    readonly route: Route,
    readonly params: RouteParams,
  ) {
    super(context);
  }
}

export class ArgumentsResolvingEvent extends ShortCircuitEvent {
  private currentAction: Action;

  constructor(
    context: RequestContext,
    readonly route: Route,
    action: Action,
  ) {
    super(context);

    this.currentAction = action;
  }

  get action(): Action {
    return this.currentAction;
  }

  /**
   * Swaps the action that will be invoked; its parameters drive argument resolution.
   */
  setAction(action: Action): void {
    this.currentAction = action;
  }
}

export class ActionInvokingEvent extends ShortCircuitEvent {
  constructor(
    context: RequestContext,
    readonly action: Action,
    readonly args: unknown[],
  ) {
    super(context);
  }

  setArgument(index: number, value: unknown): void {
    this.args[index] = value;
  }
}

export class ResponseReadyEvent extends KernelEvent {
  private currentResponse: SwitchyardResponse;

  constructor(context: RequestContext, response: SwitchyardResponse) {
    super(context);

    this.currentResponse = response;
  }

  get response(): SwitchyardResponse {
    return this.currentResponse;
  }

  setResponse(response: SwitchyardResponse): void {
    this.currentResponse = response;
    this.context.setResponse(response);
  }
}

export class ExceptionEvent extends KernelEvent {
  private currentError: Error;
  private currentResponse: SwitchyardResponse | undefined;

  constructor(context: RequestContext, error: Error) {
    super(context);

    this.currentError = error;
  }

  get error(): Error {
    return this.currentError;
  }

  setError(error: Error): void {
    this.currentError = error;
  }

  get response(): SwitchyardResponse | undefined {
    return this.currentResponse;
  }

  hasResponse(): boolean {
    return this.currentResponse !== undefined;
  }

  setResponse(response: SwitchyardResponse): void {
    this.currentResponse = response;
    this.stopPropagation();
  }
}

export class RequestEndEvent extends KernelEvent {
  constructor(
    context: RequestContext,
    readonly response: SwitchyardResponse,
  ) {
    super(context);
  }
}

export interface KernelEventMap {
  [KernelStage.RequestStart]: RequestStartEvent;
  [KernelStage.RouteMatched]: RouteMatchedEvent;
  [KernelStage.ArgumentsResolving]: ArgumentsResolvingEvent;
  [KernelStage.ActionInvoking]: ActionInvokingEvent;
  [KernelStage.ResponseReady]: ResponseReadyEvent;
  [KernelStage.Exception]: ExceptionEvent;
  [KernelStage.RequestEnd]: RequestEndEvent;
}
