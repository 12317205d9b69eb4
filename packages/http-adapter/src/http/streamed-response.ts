import { LogicError } from '@switchyard/common';
import { StatusCodes } from 'http-status-codes';

import { type ResponseContent, type ResponseHeadersInit, SwitchyardResponse } from './response';
import type { ContentCallback } from './writers';

/**
 * A response whose body is produced straight into the sink while it is written. The
 * callback is fixed at construction.
 */
export class StreamedResponse extends SwitchyardResponse {
  constructor(callback: ContentCallback | null = null, status: number = StatusCodes.OK, headers: ResponseHeadersInit = {}) {
    super(callback, status, headers);
  }

  override setContent(content: ResponseContent): this {
    if (content !== null) {
      throw new LogicError('The content cannot be set on a StreamedResponse instance.');
    }

    return super.setContent(null);
  }

  override getContent(): Promise<string> {
    return Promise.resolve('');
  }
}
