import { Logger, type LoggerLike } from '@switchyard/logger';
import qs from 'qs';

import type { HttpMethod } from '../enums';
import {
  DuplicateRouteNameError,
  ImmutableTableError,
  InvalidParameterValueError,
  InvalidRouteError,
  MissingParameterError,
  RouteConflictError,
  UnknownRouteError,
} from '../errors';
import { normalizeRouterOptions, type NormalizedRouterOptions, type RouterOptions } from '../router/router-options';

import { CompiledRoutes } from './compiled-routes';
import type { Route, RouteDefinition, RouteGroupOptions, RouteRegistrar } from './interfaces';
import { joinPaths, parsePattern, patternSignature, placeholderNames, satisfiesConstraint } from './route-pattern';
import type { RouteSegment, UrlParamValue } from './types';

export interface RouteTableOptions {
  readonly router?: RouterOptions;
  readonly logger?: LoggerLike;
}

/**
 * Collects route declarations and compiles them once into the structure the matcher reads.
 * Registration is closed after `compile()`.
 */
export class RouteTable implements RouteRegistrar {
  readonly options: NormalizedRouterOptions;
  private readonly logger: LoggerLike;
  private readonly byName = new Map<string, Route>();
  private readonly declared: Route[] = [];
  private compiled: CompiledRoutes | undefined;

  constructor(options: RouteTableOptions = {}) {
    this.options = normalizeRouterOptions(options.router);
    this.logger = options.logger ?? new Logger(RouteTable.name);
  }

  register(definition: RouteDefinition): Route {
    if (this.compiled) {
      throw new ImmutableTableError(definition.name);
    }

    if (this.byName.has(definition.name)) {
      throw new DuplicateRouteNameError(definition.name);
    }

    const route = this.buildRoute(definition, this.declared.length);

    this.byName.set(route.name, route);
    this.declared.push(route);

    this.logger.log('debug', 'Route registered', { name: route.name, methods: route.methods.join(','), path: route.path });

    return route;
  }

  group(options: RouteGroupOptions, declare: (group: RouteRegistrar) => void): void {
    declare(new RouteGroup(this, options));
  }

  /**
   * Freezes the table. Later calls return the same compiled routes.
   */
  compile(): CompiledRoutes {
    if (this.compiled) {
      return this.compiled;
    }

    const ordered = [...this.declared].sort(
      (a, b) => b.priority - a.priority || a.declarationIndex - b.declarationIndex,
    );

    this.assertNoConflicts(ordered);
    this.compiled = new CompiledRoutes(Object.freeze(ordered), this.options.caseSensitive);

    this.logger.log('debug', 'Route table compiled', { routes: ordered.length });

    return this.compiled;
  }

  isCompiled(): boolean {
    return this.compiled !== undefined;
  }

  get(name: string): Route | undefined {
    return this.byName.get(name);
  }

  routes(): readonly Route[] {
    return [...this.declared];
  }

  /**
   * Builds the path of a named route. Values for names the pattern does not use go to the query string.
   */
  resolveByName(name: string, params: Readonly<Record<string, UrlParamValue>> = {}): string {
    const route = this.byName.get(name);

    if (route === undefined) {
      throw new UnknownRouteError(name);
    }

    const parts: string[] = [];
    const omittable: boolean[] = [];

    route.segments.forEach((segment, index) => {
      if (segment.kind === 'literal') {
        parts.push(segment.declared);
        omittable.push(false);

        return;
      }

      const supplied = params[segment.name];
      const value = supplied === undefined ? route.defaults[segment.name] : String(supplied);

      if (value === undefined) {
        throw new MissingParameterError(route.name, segment.name);
      }

      if (!satisfiesConstraint(segment.constraint, value)) {
        throw new InvalidParameterValueError(route.name, segment.name, value);
      }

      parts.push(encodeURIComponent(value));
      omittable.push(index >= route.minSegments && value === route.defaults[segment.name]);
    });

    while (omittable.at(-1) === true) {
      omittable.pop();
      parts.pop();
    }

    const extra: Record<string, UrlParamValue> = {};

    for (const [key, value] of Object.entries(params)) {
      if (!route.placeholders.includes(key)) {
        extra[key] = value;
      }
    }

    const query = qs.stringify(extra);
    const path = '/' + parts.join('/');

    return query === '' ? path : `${path}?${query}`;
  }

  private buildRoute(definition: RouteDefinition, declarationIndex: number): Route {
    const { name } = definition;
    const methods = this.normalizeMethods(definition);
    const path = joinPaths('', definition.path);
    const { segments, placeholders } = parsePattern({
      routeName: name,
      path,
      requirements: definition.requirements ?? {},
      options: this.options,
    });
    const defaults = { ...definition.defaults };

    for (const [key, value] of Object.entries(defaults)) {
      const segment = segments.find(candidate => candidate.kind === 'placeholder' && candidate.name === key);

      if (segment === undefined) {
        throw new InvalidRouteError(name, `default '${key}' does not match any placeholder`);
      }

      if (segment.kind === 'placeholder' && !satisfiesConstraint(segment.constraint, value)) {
        throw new InvalidRouteError(name, `default '${value}' of '${key}' does not satisfy its requirement`);
      }
    }

    return Object.freeze({
      name,
      methods,
      methodSet: new Set<string>(methods),
      path,
      segments: Object.freeze(segments),
      placeholders: Object.freeze(placeholders),
      defaults: Object.freeze(defaults),
      minSegments: this.countRequiredSegments(segments, defaults),
      priority: definition.priority ?? 0,
      declarationIndex,
      format: definition.format,
      action: definition.action,
    });
  }

  private normalizeMethods(definition: RouteDefinition): readonly HttpMethod[] {
    const list: readonly HttpMethod[] = typeof definition.methods === 'string' ? [definition.methods] : definition.methods;
    const methods = [...new Set(list)];

    if (methods.length === 0) {
      throw new InvalidRouteError(definition.name, 'no HTTP method declared');
    }

    return Object.freeze(methods);
  }

  private countRequiredSegments(segments: readonly RouteSegment[], defaults: Readonly<Record<string, string>>): number {
    let required = segments.length;

    for (let index = segments.length - 1; index >= 0; index--) {
      const segment = segments[index];

      if (segment?.kind !== 'placeholder' || defaults[segment.name] === undefined) {
        break;
      }

      required = index;
    }

    return required;
  }

  private assertNoConflicts(ordered: readonly Route[]): void {
    const seen = new Map<string, Route[]>();

    for (const route of ordered) {
      const signature = patternSignature(route.segments, route.minSegments);
      const previous = seen.get(signature) ?? [];
      const conflict = previous.find(
        other => other.priority === route.priority && other.methods.some(method => route.methodSet.has(method)),
      );

      if (conflict !== undefined) {
        throw new RouteConflictError(route.name, conflict.name, route.path);
      }

      previous.push(route);
      seen.set(signature, previous);
    }
  }
}

/**
 * Registers routes under a shared path prefix, name prefix, defaults and requirements.
 * Nesting composes prefixes from the outside in.
 */
class RouteGroup implements RouteRegistrar {
  constructor(
    private readonly parent: RouteRegistrar,
    private readonly options: RouteGroupOptions,
  ) {}

  register(definition: RouteDefinition): Route {
    const path = joinPaths(this.options.prefix, definition.path);
    const names = placeholderNames(path);

    return this.parent.register({
      ...definition,
      name: `${this.options.namePrefix ?? ''}${definition.name}`,
      path,
      defaults: { ...this.pick(this.options.defaults, names), ...definition.defaults },
      requirements: { ...this.pick(this.options.requirements, names), ...definition.requirements },
      priority: definition.priority ?? this.options.priority,
    });
  }

  group(options: RouteGroupOptions, declare: (group: RouteRegistrar) => void): void {
    declare(new RouteGroup(this, options));
  }

  private pick<T>(source: Readonly<Record<string, T>> | undefined, names: readonly string[]): Record<string, T> {
    const picked: Record<string, T> = {};

    for (const name of names) {
      const value = source?.[name];

      if (value !== undefined) {
        picked[name] = value;
      }
    }

    return picked;
  }
}
