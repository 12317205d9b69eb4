import { JsonFormatHandler, TextFormatHandler } from './handlers';
import type { FormatHandler } from './interfaces';

export class FormatHandlerRegistry {
  private readonly handlers = new Map<string, FormatHandler>();

  static withDefaults(): FormatHandlerRegistry {
    return new FormatHandlerRegistry().register(new JsonFormatHandler()).register(new TextFormatHandler());
  }

  register(handler: FormatHandler): this {
    this.handlers.set(handler.format, handler);

    return this;
  }

  get(format: string): FormatHandler | undefined {
    return this.handlers.get(format);
  }

  has(format: string): boolean {
    return this.handlers.has(format);
  }

  formats(): string[] {
    return [...this.handlers.keys()];
  }

  /**
   * The format serving `mimeType`, the first registered one on a tie. `type/*` ranges match any subtype.
   */
  formatFor(mimeType: string): string | undefined {
    const normalized = mimeType.toLowerCase();
    const wildcardType = normalized.endsWith('/*') ? normalized.slice(0, -1) : undefined;

    for (const handler of this.handlers.values()) {
      const served = handler.mimeTypes.some(candidate =>
        wildcardType === undefined ? candidate === normalized : candidate.startsWith(wildcardType),
      );

      if (served) {
        return handler.format;
      }
    }

    return undefined;
  }
}
