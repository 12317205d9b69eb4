import { StatusCodes } from 'http-status-codes';

/**
 * Data an action returns together with how it wants it answered. The format handler
 * turns it into a response.
 */
export class View<T = unknown> {
  constructor(
    readonly data: T,
    readonly status: number = StatusCodes.OK,
    readonly headers: Readonly<Record<string, string>> = {},
    /** Overrides content negotiation. */
    readonly format?: string,
  ) {}
}
