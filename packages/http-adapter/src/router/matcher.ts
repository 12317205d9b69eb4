import { HttpMethod } from '../enums';
import type { CompiledRoutes } from '../route/compiled-routes';
import type { Route } from '../route/interfaces';
import { satisfiesConstraint } from '../route/route-pattern';
import type { RouteTable } from '../route/route-table';

import type { MatchResult } from './interfaces';
import { MatchCache } from './match-cache';
import { decodeURIComponentSafe } from './processor/decoder';
import { Processor } from './processor/processor';
import type { NormalizedRouterOptions } from './router-options';

const NO_MATCH: MatchResult = Object.freeze({ kind: 'no-match' });

/**
 * Resolves a method and path against a compiled route table. Results depend only on the
 * input and the table, which cannot change once compiled.
 */
export class Matcher {
  private readonly routes: CompiledRoutes;
  private readonly options: NormalizedRouterOptions;
  private readonly processor: Processor;
  private readonly cache: MatchCache<MatchResult> | undefined;

  constructor(table: RouteTable) {
    this.routes = table.compile();
    this.options = table.options;
    this.processor = new Processor(this.options);
    this.cache = this.options.enableCache ? new MatchCache(this.options.cacheSize) : undefined;
  }

  match(method: string, path: string): MatchResult {
    const { normalized, segments } = this.processor.normalize(path);
    const key = `${method} ${normalized}`;
    const cached = this.cache?.get(key);

    if (cached !== undefined) {
      return cached;
    }

    const result = this.lookup(method, segments);

    this.cache?.set(key, result);

    return result;
  }

  private lookup(method: string, segments: readonly string[]): MatchResult {
    const allowed: HttpMethod[] = [];

    for (const route of this.routes.candidates(segments)) {
      const params = this.matchSegments(route, segments);

      if (params === undefined) {
        continue;
      }

      if (this.allows(route, method)) {
        return Object.freeze({ kind: 'matched', route, params: Object.freeze(params) });
      }

      for (const candidate of route.methods) {
        if (!allowed.includes(candidate)) {
          allowed.push(candidate);
        }
      }
    }

    const getIndex = allowed.indexOf(HttpMethod.Get);

    if (getIndex !== -1 && !allowed.includes(HttpMethod.Head)) {
      allowed.splice(getIndex + 1, 0, HttpMethod.Head);
    }

    if (allowed.length > 0) {
      return Object.freeze({ kind: 'method-not-allowed', allowedMethods: Object.freeze(allowed) });
    }

    return NO_MATCH;
  }

  private allows(route: Route, method: string): boolean {
    return route.methodSet.has(method) || (method === HttpMethod.Head && route.methodSet.has(HttpMethod.Get));
  }

  private matchSegments(route: Route, segments: readonly string[]): Record<string, string> | undefined {
    if (segments.length < route.minSegments || segments.length > route.segments.length) {
      return undefined;
    }

    const params: Record<string, string> = {};

    for (const [index, segment] of route.segments.entries()) {
      const value = segments[index];

      if (segment.kind === 'literal') {
        const candidate = this.options.caseSensitive ? value : value?.toLowerCase();

        if (candidate !== segment.value) {
          return undefined;
        }

        continue;
      }

      if (value === undefined) {
        const fallback = route.defaults[segment.name];

        if (fallback === undefined) {
          return undefined;
        }

        params[segment.name] = fallback;

        continue;
      }

      const decoded = this.options.decodeParams ? decodeURIComponentSafe(value) : value;

      if (decoded === '' || !satisfiesConstraint(segment.constraint, decoded)) {
        return undefined;
      }

      params[segment.name] = decoded;
    }

    return params;
  }
}
