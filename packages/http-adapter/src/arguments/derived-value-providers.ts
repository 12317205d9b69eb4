import type { DerivedValueProvider } from './interfaces';

export const DerivedValueToken = {
  Request: 'request',
  Context: 'context',
} as const;

/**
 * Providers for `derived` parameters, looked up by token. The request and its context are
 * always available.
 */
export class DerivedValueProviderRegistry {
  private readonly providers = new Map<string, DerivedValueProvider>([
    [DerivedValueToken.Request, context => context.request],
    [DerivedValueToken.Context, context => context],
  ]);

  register(token: string, provider: DerivedValueProvider): this {
    this.providers.set(token, provider);

    return this;
  }

  get(token: string): DerivedValueProvider | undefined {
    return this.providers.get(token);
  }

  has(token: string): boolean {
    return this.providers.has(token);
  }
}
