import type { LoggerLike } from '@switchyard/logger';

import type { ArgumentResolver } from '../arguments/argument-resolver';
import type { ErrorRenderer } from '../errors/error-renderer';
import type { EventDispatcher } from '../events/event-dispatcher';
import type { ActionInvoker } from '../invoker/action-invoker';
import type { RouteTable } from '../route/route-table';
import type { RouterOptions } from '../router/router-options';
import type { FormatHandlerRegistry } from '../view/format-handler-registry';
import type { ResponseBuilder } from '../view/response-builder';

export interface KernelOptions {
  /** Exposes unexpected error details in rendered responses. @default false */
  readonly debug?: boolean;
  /** Format used when neither the route nor the `Accept` header decides. @default 'json' */
  readonly defaultFormat?: string;
  /** Applied by whoever builds the route table. */
  readonly router?: RouterOptions;
}

export interface ResolvedKernelOptions {
  readonly debug: boolean;
  readonly defaultFormat: string;
  readonly router: RouterOptions;
}

export interface HttpKernelInit {
  readonly routes: RouteTable;
  readonly dispatcher?: EventDispatcher;
  readonly resolver?: ArgumentResolver;
  readonly invoker?: ActionInvoker;
  readonly formats?: FormatHandlerRegistry;
  readonly responseBuilder?: ResponseBuilder;
  readonly errorRenderer?: ErrorRenderer;
  readonly logger?: LoggerLike;
  readonly options?: KernelOptions;
}

export interface HandleOptions {
  /** Aborted when the client goes away. */
  readonly signal?: AbortSignal;
}
