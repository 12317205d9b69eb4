import { StatusCodes } from 'http-status-codes';

import { HeaderField } from '../enums';

import { type ResponseHeadersInit, SwitchyardResponse } from './response';

export class RedirectResponse extends SwitchyardResponse {
  constructor(
    readonly targetUrl: string,
    status: number = StatusCodes.MOVED_TEMPORARILY,
    headers: ResponseHeadersInit = {},
  ) {
    super(null, status, headers);

    this.setHeader(HeaderField.Location, targetUrl);
  }
}
