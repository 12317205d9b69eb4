import type { JsonValue } from '@switchyard/common';

import type { Action } from '../route/action';
import type { Route } from '../route/interfaces';
import type { RouteParams } from '../route/types';

export type AttributeValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'params'; readonly value: RouteParams }
  | { readonly kind: 'route'; readonly value: Route }
  | { readonly kind: 'action'; readonly value: Action }
  | { readonly kind: 'json'; readonly value: JsonValue };

export type AttributeKind = AttributeValue['kind'];

export type AttributeOf<K extends AttributeKind> = Extract<AttributeValue, { kind: K }>['value'];

/**
 * Keys the kernel fills once routing succeeds.
 */
export const RequestAttribute = {
  Route: '_route',
  RouteName: '_route_name',
  RouteParams: '_route_params',
  Action: '_action',
  Format: '_format',
} as const;

function isKind<K extends AttributeKind>(entry: AttributeValue, kind: K): entry is Extract<AttributeValue, { kind: K }> {
  return entry.kind === kind;
}

/**
 * Per-request attributes. Every value carries its kind, and reads name the kind they expect.
 */
export class AttributeBag {
  private readonly entries = new Map<string, AttributeValue>();

  set(key: string, attribute: AttributeValue): this {
    this.entries.set(key, attribute);

    return this;
  }

  /**
   * The value under `key` when it holds `kind`, otherwise undefined.
   */
  get<K extends AttributeKind>(key: string, kind: K): AttributeOf<K> | undefined {
    const entry = this.entries.get(key);

    if (entry === undefined || !isKind(entry, kind)) {
      return undefined;
    }

    return entry.value;
  }

  raw(key: string): AttributeValue | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}
