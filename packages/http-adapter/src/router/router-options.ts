import type { RegexSafetyOptions } from './regex-guard';

export interface RouterOptions {
  /** @default true */
  caseSensitive?: boolean;
  /** Treat `/users/` like `/users`. @default true */
  ignoreTrailingSlash?: boolean;
  /** Treat `//a///b` like `/a/b`. @default true */
  collapseSlashes?: boolean;
  /** Resolve `.` and `..` segments before matching. @default true */
  blockTraversal?: boolean;
  /** Percent-decode placeholder values before constraint checks. @default true */
  decodeParams?: boolean;
  /** Memoize match results per method and normalized path. @default false */
  enableCache?: boolean;
  /** @default 1000 */
  cacheSize?: number;
  /** Guard applied to regex requirements at registration; `false` disables it. */
  regexSafety?: Partial<RegexSafetyOptions> | false;
}

export interface NormalizedRouterOptions {
  readonly caseSensitive: boolean;
  readonly ignoreTrailingSlash: boolean;
  readonly collapseSlashes: boolean;
  readonly blockTraversal: boolean;
  readonly decodeParams: boolean;
  readonly enableCache: boolean;
  readonly cacheSize: number;
  readonly regexSafety: RegexSafetyOptions | false;
}

const DEFAULT_REGEX_SAFETY: RegexSafetyOptions = {
  maxLength: 256,
  forbidNestedQuantifiers: true,
  forbidBackreferences: true,
};

export function normalizeRouterOptions(options: RouterOptions = {}): NormalizedRouterOptions {
  return {
    caseSensitive: options.caseSensitive ?? true,
    ignoreTrailingSlash: options.ignoreTrailingSlash ?? true,
    collapseSlashes: options.collapseSlashes ?? true,
    blockTraversal: options.blockTraversal ?? true,
    decodeParams: options.decodeParams ?? true,
    enableCache: options.enableCache ?? false,
    cacheSize: Math.max(1, options.cacheSize ?? 1000),
    regexSafety: options.regexSafety === false ? false : { ...DEFAULT_REGEX_SAFETY, ...options.regexSafety },
  };
}
