import type { HttpMethod } from '../enums';
import type { Route } from '../route/interfaces';
import type { RouteParams } from '../route/types';

export type MatchResult =
  | { readonly kind: 'matched'; readonly route: Route; readonly params: RouteParams }
  | { readonly kind: 'method-not-allowed'; readonly allowedMethods: readonly HttpMethod[] }
  | { readonly kind: 'no-match' };
