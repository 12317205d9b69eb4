import {
  CompressionListener,
  DefaultErrorRenderer,
  ErrorListener,
  EventDispatcher,
  HttpKernel,
  type KernelOptions,
  RouteTable,
} from '@switchyard/http-adapter';
import type { LoggerLike } from '@switchyard/logger';

import { type AppServices, createAppServices, registerAppRoutes } from './app.routes';

export interface CreateAppParams {
  readonly options?: KernelOptions;
  readonly services?: AppServices;
  readonly compression?: boolean;
  readonly logger?: LoggerLike;
}

export interface App {
  readonly kernel: HttpKernel;
  readonly routes: RouteTable;
  readonly errorRenderer: DefaultErrorRenderer;
}

export function createApp(params: CreateAppParams = {}): App {
  const { options = {}, services = createAppServices(), compression = true, logger } = params;
  const routes = new RouteTable({ router: options.router, logger });

  registerAppRoutes(routes, services);

  const errorRenderer = new DefaultErrorRenderer({ debug: options.debug });
  const dispatcher = new EventDispatcher(logger);

  dispatcher.addSubscriber(new ErrorListener(errorRenderer, logger));

  if (compression) {
    dispatcher.addSubscriber(new CompressionListener());
  }

  const kernel = new HttpKernel({ routes, dispatcher, errorRenderer, logger, options });

  return { kernel, routes, errorRenderer };
}
