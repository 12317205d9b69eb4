import { randomUUID } from 'node:crypto';

import qs, { type IParseOptions, type ParsedQs } from 'qs';

import { ContentType, HeaderField } from '../enums';
import { BadRequestError } from '../errors/http.errors';

export type RequestHeadersInit = Headers | Readonly<Record<string, string | readonly string[] | undefined>>;

export interface SwitchyardRequestInit {
  readonly method: string;
  /** Origin-form (`/path?query`) or absolute URL. */
  readonly url: string;
  readonly headers?: RequestHeadersInit;
  readonly body?: string;
  readonly requestId?: string;
}

export const PARAMETER_LIMIT = 1000;

// A key may repeat as often as the parameter limit allows and still parse as a list.
const QUERY_PARSE_OPTIONS = {
  depth: 5,
  arrayLimit: PARAMETER_LIMIT,
  parameterLimit: PARAMETER_LIMIT,
} satisfies IParseOptions;

function parseEncoded(source: string, label: string): ParsedQs {
  const pairs = source.split('&').filter(pair => pair !== '').length;

  if (pairs > PARAMETER_LIMIT) {
    throw new BadRequestError(`The ${label} has ${pairs} parameters; at most ${PARAMETER_LIMIT} are accepted.`);
  }

  return qs.parse(source, QUERY_PARSE_OPTIONS);
}

const ABSOLUTE_URL_PATTERN = /^[a-z][a-z0-9+.-]*:\/\/[^/?#]*/i;

/**
 * The transport-neutral request the kernel dispatches. Query and form bodies are parsed on first access.
 */
export class SwitchyardRequest {
  public readonly requestId: string;
  public readonly method: string;
  public readonly url: string;
  public readonly path: string;
  public readonly queryString: string;
  public readonly headers: Headers;
  public readonly body: string;
  private parsedQuery: ParsedQs | undefined;
  private parsedBody: ParsedQs | undefined;

  constructor(init: SwitchyardRequestInit) {
    const target = init.url.replace(ABSOLUTE_URL_PATTERN, '');
    const hashIndex = target.indexOf('#');
    const withoutHash = hashIndex === -1 ? target : target.slice(0, hashIndex);
    const queryIndex = withoutHash.indexOf('?');

    this.method = init.method.toUpperCase();
    this.url = init.url;
    this.path = (queryIndex === -1 ? withoutHash : withoutHash.slice(0, queryIndex)) || '/';
    this.queryString = queryIndex === -1 ? '' : withoutHash.slice(queryIndex + 1);
    this.headers = toHeaders(init.headers);
    this.body = init.body ?? '';
    this.requestId = init.requestId ?? this.headers.get(HeaderField.RequestId) ?? randomUUID();
  }

  get query(): ParsedQs {
    this.parsedQuery ??= parseEncoded(this.queryString, 'query string');

    return this.parsedQuery;
  }

  /**
   * Fields of a form-encoded body; empty for other content types.
   */
  get requestData(): ParsedQs {
    if (this.parsedBody === undefined) {
      const contentType = this.contentType;
      const isForm = contentType === undefined || contentType === ContentType.FormUrlEncoded;

      this.parsedBody = isForm && this.body !== '' ? parseEncoded(this.body, 'request body') : {};
    }

    return this.parsedBody;
  }

  /**
   * Media type of the body without parameters, lower-cased.
   */
  get contentType(): string | undefined {
    const header = this.headers.get(HeaderField.ContentType);

    if (header === null) {
      return undefined;
    }

    return header.split(';')[0]?.trim().toLowerCase();
  }
}

function toHeaders(init: RequestHeadersInit | undefined): Headers {
  if (init instanceof Headers) {
    return new Headers(init);
  }

  const headers = new Headers();

  for (const [name, value] of Object.entries(init ?? {})) {
    if (value === undefined) {
      continue;
    }

    if (typeof value === 'string') {
      headers.append(name, value);
    } else {
      for (const item of value) {
        headers.append(name, item);
      }
    }
  }

  return headers;
}
