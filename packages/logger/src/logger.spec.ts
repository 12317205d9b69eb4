import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { LogMessage, Transport } from './interfaces';
import { LogContext } from './log-context';
import { Logger } from './logger';

class RecordingTransport implements Transport {
  readonly messages: LogMessage[] = [];

  log(message: LogMessage): void {
    this.messages.push(message);
  }
}

describe('Logger', () => {
  let transport: RecordingTransport;

  beforeEach(() => {
    transport = new RecordingTransport();
    Logger.configure({ level: 'info', transport });
  });

  afterEach(() => {
    Logger.configure({ level: 'info', transport: undefined, format: 'pretty' });
  });

  it('should record the level, message and context', () => {
    new Logger('Bootstrap').info('started');

    expect(transport.messages).toHaveLength(1);
    expect(transport.messages[0]).toMatchObject({ level: 'info', msg: 'started', context: 'Bootstrap' });
  });

  it('should take the context name from a class', () => {
    class RouteTable {}

    new Logger(RouteTable).warn('careful');

    expect(transport.messages[0]?.context).toBe('RouteTable');
  });

  it('should drop records below the configured level', () => {
    const logger = new Logger('Filter');

    logger.debug('hidden');
    logger.notice('shown');

    expect(transport.messages.map(message => message.msg)).toEqual(['shown']);
  });

  it('should rank notice between info and warn', () => {
    Logger.configure({ level: 'notice', transport });

    const logger = new Logger('Levels');

    logger.info('dropped');
    logger.notice('kept');
    logger.warn('kept too');

    expect(transport.messages.map(message => message.level)).toEqual(['notice', 'warn']);
  });

  it('should merge metadata, errors and loggables into the record', () => {
    const error = new Error('boom');

    new Logger('Meta').log('error', 'failed', { stage: 'invoke' }, error, { toLog: () => ({ route: 'users.show' }) });

    expect(transport.messages[0]).toMatchObject({ stage: 'invoke', route: 'users.show', err: error });
  });

  it('should stamp the request id of the active log context', () => {
    LogContext.run('req-1', () => {
      new Logger('Scoped').info('inside');
    });
    new Logger('Scoped').info('outside');

    expect(transport.messages.map(message => message.reqId)).toEqual(['req-1', undefined]);
  });
});
