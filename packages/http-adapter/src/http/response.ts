import { getReasonPhrase, StatusCodes } from 'http-status-codes';

import { ContentType, HeaderField, HttpMethod } from '../enums';

import { BufferedOutput, type OutputSink } from './output';
import type { SwitchyardRequest } from './request';
import { type ContentCallback, DirectWriter, type ResponseWriter } from './writers';

export type ResponseHeadersInit = Headers | Readonly<Record<string, string>>;

export type ResponseContent = string | ContentCallback | null;

const EMPTY_CONTENT: ContentCallback = () => undefined;

function reasonPhrase(status: number): string {
  try {
    return getReasonPhrase(status);
  } catch (error) {
    if (error instanceof Error) {
      return '';
    }

    throw error;
  }
}

/**
 * Status, headers and a callback that produces the body. The body is produced when the
 * response is written, through its writer, at most once.
 */
export class SwitchyardResponse {
  readonly headers: Headers;
  private _status: number;
  private _statusText: string;
  private contentCallback: ContentCallback = EMPTY_CONTENT;
  private cachedContent: string | undefined;
  private writer: ResponseWriter = new DirectWriter();
  private written = false;
  private pendingWrite: Promise<void> | undefined;

  constructor(content: ResponseContent = null, status: number = StatusCodes.OK, headers: ResponseHeadersInit = {}) {
    this.headers = new Headers(headers);
    this._status = status;
    this._statusText = reasonPhrase(status);
    this.replaceContent(content);
  }

  get status(): number {
    return this._status;
  }

  get statusText(): string {
    return this._statusText;
  }

  setStatus(status: number, statusText?: string): this {
    this._status = status;
    this._statusText = statusText ?? reasonPhrase(status);

    return this;
  }

  getHeader(name: string): string | null {
    return this.headers.get(name);
  }

  setHeader(name: string, value: string): this {
    this.headers.set(name, value);

    return this;
  }

  appendHeader(name: string, value: string): this {
    this.headers.append(name, value);

    return this;
  }

  removeHeader(name: string): this {
    this.headers.delete(name);

    return this;
  }

  getContentType(): string | null {
    return this.getHeader(HeaderField.ContentType);
  }

  setContentType(contentType: string): this {
    return this.setHeader(HeaderField.ContentType, `${contentType}; charset=utf-8`);
  }

  /**
   * Replaces the content. The only way to change it after construction.
   */
  setContent(content: ResponseContent): this {
    this.replaceContent(content);

    return this;
  }

  /**
   * The body as a string, produced once by running the content callback without the writer.
   */
  async getContent(): Promise<string> {
    if (this.cachedContent === undefined) {
      const buffer = new BufferedOutput();

      await this.contentCallback(buffer);
      this.cachedContent = buffer.toString();
    }

    return this.cachedContent;
  }

  getWriter(): ResponseWriter {
    return this.writer;
  }

  setWriter(writer: ResponseWriter): this {
    this.writer = writer;

    return this;
  }

  isWritten(): boolean {
    return this.written;
  }

  /**
   * Writes the content to the sink through the writer. Calls after the first successful write
   * are no-ops; calls made while a write is in flight share it. A failed write may be retried.
   */
  write(output: OutputSink): Promise<void> {
    if (this.written) {
      return Promise.resolve();
    }

    this.pendingWrite ??= this.runWrite(output).finally(() => {
      this.pendingWrite = undefined;
    });

    return this.pendingWrite;
  }

  /**
   * Adjusts the response to the request before it is written: no body for HEAD, 1xx, 204
   * and 304; a content type when none was set.
   */
  prepare(request: SwitchyardRequest): this {
    if (this.isInformational() || this._status === StatusCodes.NO_CONTENT || this._status === StatusCodes.NOT_MODIFIED) {
      this.replaceContent(null);
      this.removeHeader(HeaderField.ContentType);
      this.removeHeader(HeaderField.ContentLength);

      return this;
    }

    if (!this.getContentType()) {
      this.setContentType(ContentType.Text);
    }

    if (request.method === HttpMethod.Head) {
      this.replaceContent(null);
    }

    return this;
  }

  isInformational(): boolean {
    return this._status >= 100 && this._status < 200;
  }

  isSuccessful(): boolean {
    return this._status >= 200 && this._status < 300;
  }

  isRedirect(): boolean {
    return this._status >= 300 && this._status < 400;
  }

  isClientError(): boolean {
    return this._status >= 400 && this._status < 500;
  }

  isServerError(): boolean {
    return this._status >= 500 && this._status < 600;
  }

  /* -------------------------------------------------------------------------- */
  /*                                   Caching                                  */
  /* -------------------------------------------------------------------------- */

  setPublic(): this {
    return this.setCacheDirectives(['public'], ['private']);
  }

  setPrivate(): this {
    return this.setCacheDirectives(['private'], ['public']);
  }

  setMaxAge(seconds: number): this {
    return this.setCacheDirectives([`max-age=${Math.max(0, Math.floor(seconds))}`], ['max-age']);
  }

  get etag(): string | null {
    return this.getHeader(HeaderField.ETag);
  }

  setEtag(etag: string | null, weak = false): this {
    if (etag === null) {
      return this.removeHeader(HeaderField.ETag);
    }

    const quoted = etag.startsWith('"') ? etag : `"${etag}"`;

    return this.setHeader(HeaderField.ETag, weak ? `W/${quoted}` : quoted);
  }

  get lastModified(): Date | undefined {
    const value = this.getHeader(HeaderField.LastModified);

    return value === null ? undefined : new Date(value);
  }

  setLastModified(date: Date | null): this {
    if (date === null) {
      return this.removeHeader(HeaderField.LastModified);
    }

    return this.setHeader(HeaderField.LastModified, date.toUTCString());
  }

  private setCacheDirectives(add: readonly string[], remove: readonly string[]): this {
    const current = (this.getHeader(HeaderField.CacheControl) ?? '')
      .split(',')
      .map(directive => directive.trim())
      .filter(directive => directive !== '')
      .filter(directive => !remove.some(name => directive.toLowerCase().split('=')[0] === name));

    return this.setHeader(HeaderField.CacheControl, [...current, ...add].join(', '));
  }

  private async runWrite(output: OutputSink): Promise<void> {
    await this.writer.write(output, this.contentCallback);
    this.written = true;
  }

  private replaceContent(content: ResponseContent): void {
    this.cachedContent = undefined;

    if (content === null) {
      this.contentCallback = EMPTY_CONTENT;
    } else if (typeof content === 'string') {
      this.contentCallback = output => {
        output.write(content);
      };
      this.cachedContent = content;
    } else {
      this.contentCallback = content;
    }
  }
}
