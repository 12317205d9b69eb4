import { toError } from '@switchyard/common';
import { LogContext, Logger, type LoggerLike } from '@switchyard/logger';

import { ArgumentResolver } from '../arguments/argument-resolver';
import { RequestAttribute } from '../context/attribute-bag';
import { RequestContext } from '../context/request-context';
import { KernelStage } from '../enums';
import { DefaultErrorRenderer, type ErrorRenderer } from '../errors/error-renderer';
import { MethodNotAllowedError, NotFoundError } from '../errors/http.errors';
import { RequestAbortedError } from '../errors/request-aborted.error';
import { EventDispatcher } from '../events/event-dispatcher';
import {
  ActionInvokingEvent,
  ArgumentsResolvingEvent,
  ExceptionEvent,
  RequestEndEvent,
  RequestStartEvent,
  ResponseReadyEvent,
  RouteMatchedEvent,
} from '../events/kernel-events';
import type { ResponseSink } from '../http/output';
import type { SwitchyardRequest } from '../http/request';
import type { SwitchyardResponse } from '../http/response';
import { ActionInvoker } from '../invoker/action-invoker';
import { Matcher } from '../router/matcher';
import { FormatHandlerRegistry } from '../view/format-handler-registry';
import { FormatNegotiator } from '../view/format-negotiator';
import { ResponseBuilder } from '../view/response-builder';

import type { HandleOptions, HttpKernelInit } from './interfaces';

/**
 * Carries a request through routing, argument resolution, invocation and response
 * building, broadcasting each stage to the event dispatcher.
 */
export class HttpKernel {
  readonly dispatcher: EventDispatcher;
  private readonly matcher: Matcher;
  private readonly resolver: ArgumentResolver;
  private readonly invoker: ActionInvoker;
  private readonly responseBuilder: ResponseBuilder;
  private readonly errorRenderer: ErrorRenderer;
  private readonly logger: LoggerLike;
  private readonly contexts = new WeakMap<SwitchyardRequest, RequestContext>();

  constructor(init: HttpKernelInit) {
    const options = init.options ?? {};
    const formats = init.formats ?? FormatHandlerRegistry.withDefaults();

    this.logger = init.logger ?? new Logger(HttpKernel.name);
    this.matcher = new Matcher(init.routes);
    this.dispatcher = init.dispatcher ?? new EventDispatcher();
    this.resolver = init.resolver ?? new ArgumentResolver();
    this.invoker = init.invoker ?? new ActionInvoker();
    this.responseBuilder = init.responseBuilder ?? new ResponseBuilder(formats, new FormatNegotiator(formats, options.defaultFormat));
    this.errorRenderer = init.errorRenderer ?? new DefaultErrorRenderer({ debug: options.debug });
  }

  /**
   * Produces the response for a request. Failures are turned into responses by the
   * exception stage; only an aborted request or a failing exception listener rejects.
   */
  handle(request: SwitchyardRequest, options: HandleOptions = {}): Promise<SwitchyardResponse> {
    return LogContext.run(request.requestId, () => this.handleInContext(request, options));
  }

  /**
   * Broadcasts the end of the request, once its response went out.
   */
  terminate(request: SwitchyardRequest, response: SwitchyardResponse): Promise<void> {
    return LogContext.run(request.requestId, () => this.terminateInContext(request, response));
  }

  /**
   * Handles the request, writes the prepared response to the sink and terminates.
   */
  async serve(request: SwitchyardRequest, output: ResponseSink, options: HandleOptions = {}): Promise<SwitchyardResponse> {
    const response = await this.handle(request, options);

    response.prepare(request);

    if (options.signal?.aborted) {
      this.logger.log('debug', 'Client disconnected before the response was written', { status: response.status });
    } else {
      output.begin?.(response);
      await response.write(output);
      output.end?.();
    }

    await this.terminate(request, response);

    return response;
  }

  private async handleInContext(request: SwitchyardRequest, options: HandleOptions): Promise<SwitchyardResponse> {
    const context = new RequestContext(request, options.signal);

    this.contexts.set(request, context);

    let response: SwitchyardResponse;

    try {
      response = await this.dispatchRequest(context);
    } catch (error) {
      response = await this.handleException(context, toError(error));
    }

    return this.finishResponse(context, response);
  }

  private async dispatchRequest(context: RequestContext): Promise<SwitchyardResponse> {
    const { request } = context;

    context.throwIfAborted(KernelStage.RequestStart);
    await this.dispatcher.dispatch(KernelStage.RequestStart, new RequestStartEvent(context));

    if (context.response) {
      return context.response;
    }

    const match = this.matcher.match(request.method, request.path);

    if (match.kind === 'no-match') {
      throw new NotFoundError(`No route found for '${request.method} ${request.path}'`);
    }

    if (match.kind === 'method-not-allowed') {
      const allowed = match.allowedMethods.join(', ');

      throw new MethodNotAllowedError(
        match.allowedMethods,
        `No route found for '${request.method} ${request.path}': Method Not Allowed (Allow: ${allowed})`,
      );
    }

    const { route, params } = match;

    context.attributes
      .set(RequestAttribute.Route, { kind: 'route', value: route })
      .set(RequestAttribute.RouteName, { kind: 'string', value: route.name })
      .set(RequestAttribute.RouteParams, { kind: 'params', value: params })
      .set(RequestAttribute.Action, { kind: 'action', value: route.action });

    if (route.format !== undefined) {
      context.attributes.set(RequestAttribute.Format, { kind: 'string', value: route.format });
    }

    this.logger.log('debug', 'Route matched', { route: route.name, method: request.method, path: request.path });

    context.throwIfAborted(KernelStage.RouteMatched);
    await this.dispatcher.dispatch(KernelStage.RouteMatched, new RouteMatchedEvent(context, route, params));

    if (context.response) {
      return context.response;
    }

    context.throwIfAborted(KernelStage.ArgumentsResolving);

    const resolving = await this.dispatcher.dispatch(
      KernelStage.ArgumentsResolving,
      new ArgumentsResolvingEvent(context, route, route.action),
    );

    if (context.response) {
      return context.response;
    }

    const action = resolving.action;

    context.attributes.set(RequestAttribute.Action, { kind: 'action', value: action });

    const args = await this.resolver.resolve(route, context, action);

    context.throwIfAborted(KernelStage.ActionInvoking);

    const invoking = await this.dispatcher.dispatch(KernelStage.ActionInvoking, new ActionInvokingEvent(context, action, args));

    if (context.response) {
      return context.response;
    }

    context.throwIfAborted(KernelStage.ActionInvoking);

    const result = await this.invoker.invoke(action, invoking.args);

    if (!result.ok) {
      throw result.error;
    }

    return this.responseBuilder.build(result.value, context, action);
  }

  /**
   * Runs the response-ready stage. A failure there goes through the exception stage if it
   * has not run yet; the response it yields is final.
   */
  private async finishResponse(context: RequestContext, response: SwitchyardResponse): Promise<SwitchyardResponse> {
    context.setResponse(response);

    try {
      context.throwIfAborted(KernelStage.ResponseReady);

      const event = await this.dispatcher.dispatch(KernelStage.ResponseReady, new ResponseReadyEvent(context, response));

      return event.response;
    } catch (error) {
      const fallback = await this.handleException(context, toError(error));

      context.setResponse(fallback);

      return fallback;
    }
  }

  private async handleException(context: RequestContext, error: Error): Promise<SwitchyardResponse> {
    if (error instanceof RequestAbortedError) {
      throw error;
    }

    if (!context.claimExceptionStage()) {
      this.logger.log('error', 'Exception raised after the exception stage ran', error);

      return this.errorRenderer.render(error);
    }

    const event = new ExceptionEvent(context, error);

    try {
      await this.dispatcher.dispatch(KernelStage.Exception, event);
    } catch (listenerError) {
      const failure = toError(listenerError);

      if (!(failure instanceof RequestAbortedError)) {
        this.logger.log('error', 'Exception raised when handling an exception', { original: `${error.name}: ${error.message}` }, failure);
      }

      throw failure;
    }

    return event.response ?? this.errorRenderer.render(event.error);
  }

  private async terminateInContext(request: SwitchyardRequest, response: SwitchyardResponse): Promise<void> {
    const context = this.contexts.get(request) ?? new RequestContext(request);

    try {
      await this.dispatcher.dispatch(KernelStage.RequestEnd, new RequestEndEvent(context, response));
    } catch (error) {
      if (!(error instanceof RequestAbortedError)) {
        throw error;
      }

      this.logger.log('debug', 'Request end listeners skipped: the client disconnected');
    } finally {
      this.contexts.delete(request);
    }
  }
}
