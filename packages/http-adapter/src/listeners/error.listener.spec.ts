import type { LogArgument, LoggerLike, LogLevel } from '@switchyard/logger';
import { describe, expect, it } from 'vitest';

import { RequestContext } from '../context/request-context';
import { KernelStage } from '../enums';
import { BadRequestError, MethodNotAllowedError, NotFoundError, ValidationError } from '../errors';
import { DefaultErrorRenderer } from '../errors/error-renderer';
import { EventDispatcher } from '../events/event-dispatcher';
import { ExceptionEvent } from '../events/kernel-events';
import { SwitchyardRequest } from '../http/request';

import { ErrorListener } from './error.listener';

class CapturingLogger implements LoggerLike {
  readonly records: { level: LogLevel; msg: string; args: LogArgument[] }[] = [];

  log(level: LogLevel, msg: string, ...args: LogArgument[]): void {
    this.records.push({ level, msg, args });
  }
}

async function handle(error: Error): Promise<{ event: ExceptionEvent; logger: CapturingLogger }> {
  const logger = new CapturingLogger();
  const dispatcher = new EventDispatcher().addSubscriber(new ErrorListener(new DefaultErrorRenderer(), logger));
  const context = new RequestContext(new SwitchyardRequest({ method: 'GET', url: '/orders/9' }));
  const event = await dispatcher.dispatch(KernelStage.Exception, new ExceptionEvent(context, error));

  return { event, logger };
}

describe('ErrorListener', () => {
  it('should set the rendered response and stop propagation', async () => {
    const { event } = await handle(new NotFoundError('gone'));

    expect(event.response?.status).toBe(404);
    expect(event.isPropagationStopped()).toBe(true);
  });

  it.each([
    ['routing misses at info', new NotFoundError(), 'info'],
    ['disallowed methods at info', new MethodNotAllowedError(['GET']), 'info'],
    ['validation failures at notice', new ValidationError([]), 'notice'],
    ['other client errors at warn', new BadRequestError(), 'warn'],
    ['unexpected errors at error', new Error('boom'), 'error'],
  ] as const)('should log %s', async (_label, error, level) => {
    const { logger } = await handle(error);

    expect(logger.records.map(record => record.level)).toEqual([level]);
  });

  it('should attach the error itself only to server failures', async () => {
    const failure = new Error('boom');
    const { logger } = await handle(failure);

    expect(logger.records[0]?.msg).toBe('Uncaught Error: boom');
    expect(logger.records[0]?.args).toEqual([{ method: 'GET', path: '/orders/9' }, failure]);
  });

  it('should register on the exception stage at priority -50', () => {
    const events = new ErrorListener(new DefaultErrorRenderer(), new CapturingLogger()).subscribedEvents();

    expect(events[KernelStage.Exception]).toMatchObject({ priority: -50 });
  });
});
