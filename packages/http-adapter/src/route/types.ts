import type { HttpMethod } from '../enums';

/**
 * A regex (source string or RegExp) the whole placeholder value must match, or the list of accepted values.
 */
export type PlaceholderRequirement = RegExp | string | readonly string[];

export type RouteParams = Readonly<Record<string, string>>;

export type UrlParamValue = string | number | boolean;

export type MethodList = HttpMethod | readonly HttpMethod[];

export type SegmentConstraint =
  | { readonly kind: 'pattern'; readonly source: string; readonly test: (value: string) => boolean }
  | { readonly kind: 'enum'; readonly values: readonly string[] };

export type RouteSegment =
  /** `value` is folded for matching when routing is case-insensitive; `declared` keeps the path as written. */
  | { readonly kind: 'literal'; readonly value: string; readonly declared: string }
  | { readonly kind: 'placeholder'; readonly name: string; readonly constraint?: SegmentConstraint };
