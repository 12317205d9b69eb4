import { LogicError } from '@switchyard/common';

/**
 * The route table was declared or used incorrectly. Raised while the application boots,
 * never while serving a request.
 */
export class RoutingConfigurationError extends LogicError {}

export class DuplicateRouteNameError extends RoutingConfigurationError {
  constructor(readonly routeName: string) {
    super(`A route named '${routeName}' is already registered.`);
  }
}

export class ImmutableTableError extends RoutingConfigurationError {
  constructor(routeName: string) {
    super(`Cannot register route '${routeName}': the route table is already compiled.`);
  }
}

export class InvalidRouteError extends RoutingConfigurationError {
  constructor(
    readonly routeName: string,
    reason: string,
  ) {
    super(`Route '${routeName}' is invalid: ${reason}`);
  }
}

export class RouteConflictError extends RoutingConfigurationError {
  constructor(
    readonly routeName: string,
    readonly conflictingRouteName: string,
    path: string,
  ) {
    super(
      `Route '${routeName}' conflicts with '${conflictingRouteName}': both declare '${path}' for the same method at the same priority.`,
    );
  }
}

export class UnknownRouteError extends RoutingConfigurationError {
  constructor(readonly routeName: string) {
    super(`No route named '${routeName}' exists.`);
  }
}

export class MissingParameterError extends RoutingConfigurationError {
  constructor(
    readonly routeName: string,
    readonly parameter: string,
  ) {
    super(`Cannot generate a URL for route '${routeName}': missing a value for parameter '${parameter}'.`);
  }
}

export class InvalidParameterValueError extends RoutingConfigurationError {
  constructor(
    readonly routeName: string,
    readonly parameter: string,
    readonly value: string,
  ) {
    super(`Cannot generate a URL for route '${routeName}': '${value}' does not satisfy the requirement of parameter '${parameter}'.`);
  }
}
