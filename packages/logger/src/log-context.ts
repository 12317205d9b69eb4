import { AsyncLocalStorage } from 'node:async_hooks';

export class LogContext {
  private static storage = new AsyncLocalStorage<string>();

  /**
   * Runs the callback with `reqId` attached to every record logged inside it.
   */
  static run<R>(reqId: string, callback: () => R): R {
    return this.storage.run(reqId, callback);
  }

  static getRequestId(): string | undefined {
    return this.storage.getStore();
  }
}
