import { StatusCodes } from 'http-status-codes';

import { ContentType } from '../enums';

import { type ResponseHeadersInit, SwitchyardResponse } from './response';

/**
 * JSON-encoded data. `undefined` encodes as `null`.
 */
export class JsonResponse extends SwitchyardResponse {
  constructor(data: unknown = null, status: number = StatusCodes.OK, headers: ResponseHeadersInit = {}) {
    super(JsonResponse.encode(data), status, headers);

    this.setContentType(ContentType.Json);
  }

  setData(data: unknown): this {
    return this.setContent(JsonResponse.encode(data));
  }

  private static encode(data: unknown): string {
    return JSON.stringify(data) ?? 'null';
  }
}
