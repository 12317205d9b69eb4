import type { HttpMethod } from '../enums';

import type { Action } from './action';
import type { MethodList, PlaceholderRequirement, RouteSegment } from './types';

export interface RouteDefinition {
  /** Unique across the table; reverse routing looks routes up by it. */
  readonly name: string;
  readonly methods: MethodList;
  /**
   * Literal segments and `:name` placeholders. A placeholder may carry an inline
   * requirement, as in `/users/:id{\d+}`.
   */
  readonly path: string;
  readonly action: Action;
  readonly requirements?: Readonly<Record<string, PlaceholderRequirement>>;
  /** Values for placeholders; trailing placeholders with a default may be left out of the path. */
  readonly defaults?: Readonly<Record<string, string>>;
  /** Higher wins when several routes match the same path. @default 0 */
  readonly priority?: number;
  /** Fixed response format, bypassing negotiation. */
  readonly format?: string;
}

export interface Route {
  readonly name: string;
  readonly methods: readonly HttpMethod[];
  readonly methodSet: ReadonlySet<string>;
  readonly path: string;
  readonly segments: readonly RouteSegment[];
  readonly placeholders: readonly string[];
  readonly defaults: Readonly<Record<string, string>>;
  /** Fewest path segments the route accepts once defaulted trailing placeholders are dropped. */
  readonly minSegments: number;
  readonly priority: number;
  readonly declarationIndex: number;
  readonly format?: string;
  readonly action: Action;
}

export interface RouteGroupOptions {
  readonly prefix: string;
  readonly namePrefix?: string;
  readonly defaults?: Readonly<Record<string, string>>;
  readonly requirements?: Readonly<Record<string, PlaceholderRequirement>>;
  readonly priority?: number;
}

/**
 * Where route declarations go; a table or a prefix group of one.
 */
export interface RouteRegistrar {
  register(definition: RouteDefinition): Route;
  group(options: RouteGroupOptions, declare: (group: RouteRegistrar) => void): void;
}
