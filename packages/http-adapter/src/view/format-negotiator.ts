import { RequestAttribute } from '../context/attribute-bag';
import type { RequestContext } from '../context/request-context';
import { HeaderField } from '../enums';
import { NotAcceptableError } from '../errors';

import type { FormatHandlerRegistry } from './format-handler-registry';

interface MediaRange {
  readonly type: string;
  readonly quality: number;
}

function parseAccept(header: string): MediaRange[] {
  const ranges: MediaRange[] = [];

  for (const part of header.split(',')) {
    const [type = '', ...params] = part.split(';').map(piece => piece.trim());

    if (type === '') {
      continue;
    }

    const qualityParam = params.find(param => param.toLowerCase().startsWith('q='));
    const quality = qualityParam === undefined ? 1 : Number(qualityParam.slice(2));

    ranges.push({ type: type.toLowerCase(), quality: Number.isFinite(quality) ? quality : 0 });
  }

  return ranges.sort((a, b) => b.quality - a.quality);
}

/**
 * Picks the response format: the route's fixed format, then the `Accept` header, then the default.
 */
export class FormatNegotiator {
  constructor(
    private readonly registry: FormatHandlerRegistry,
    private readonly defaultFormat = 'json',
  ) {}

  negotiate(context: RequestContext): string {
    const fixed = context.attributes.get(RequestAttribute.Format, 'string');

    if (fixed !== undefined) {
      if (!this.registry.has(fixed)) {
        throw new NotAcceptableError(`The format '${fixed}' is not supported.`);
      }

      return fixed;
    }

    const accept = context.request.headers.get(HeaderField.Accept);

    if (accept === null || accept.trim() === '') {
      return this.defaultFormat;
    }

    for (const range of parseAccept(accept)) {
      if (range.quality <= 0) {
        continue;
      }

      if (range.type === '*/*') {
        return this.defaultFormat;
      }

      const format = this.registry.formatFor(range.type);

      if (format !== undefined) {
        return format;
      }
    }

    throw new NotAcceptableError(`None of the accepted media types (${accept}) can be produced.`);
  }
}
