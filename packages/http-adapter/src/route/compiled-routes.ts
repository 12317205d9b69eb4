import type { Route } from './interfaces';

/**
 * Read-only lookup structure produced by `RouteTable.compile()`. Routes are bucketed by
 * their first literal segment; routes starting with a placeholder are checked for every path.
 */
export class CompiledRoutes {
  private readonly literalBuckets = new Map<string, Route[]>();
  private readonly dynamicRoutes: Route[] = [];
  private readonly rank = new Map<Route, number>();

  constructor(
    readonly routes: readonly Route[],
    private readonly caseSensitive: boolean,
  ) {
    routes.forEach((route, index) => {
      const first = route.segments[0];

      this.rank.set(route, index);

      if (first?.kind === 'literal' && route.minSegments > 0) {
        const bucket = this.literalBuckets.get(first.value) ?? [];

        bucket.push(route);
        this.literalBuckets.set(first.value, bucket);
      } else {
        this.dynamicRoutes.push(route);
      }
    });
  }

  /**
   * Routes that may match a path starting with these segments, in match order.
   */
  candidates(segments: readonly string[]): readonly Route[] {
    const first = segments[0];

    if (first === undefined) {
      return this.dynamicRoutes;
    }

    const bucket = this.literalBuckets.get(this.caseSensitive ? first : first.toLowerCase());

    if (bucket === undefined) {
      return this.dynamicRoutes;
    }

    if (this.dynamicRoutes.length === 0) {
      return bucket;
    }

    return this.merge(bucket, this.dynamicRoutes);
  }

  private merge(left: readonly Route[], right: readonly Route[]): Route[] {
    const merged: Route[] = [];
    let i = 0;
    let j = 0;

    while (i < left.length || j < right.length) {
      const a = left[i];
      const b = right[j];

      if (b === undefined || (a !== undefined && this.rankOf(a) < this.rankOf(b))) {
        if (a !== undefined) {
          merged.push(a);
        }

        i++;
      } else {
        merged.push(b);
        j++;
      }
    }

    return merged;
  }

  private rankOf(route: Route): number {
    return this.rank.get(route) ?? Number.MAX_SAFE_INTEGER;
  }
}
