import { describe, expect, it } from 'vitest';

import { HttpMethod, KernelStage } from '../../src/enums';
import { ConflictError } from '../../src/errors';
import { JsonResponse } from '../../src/http';
import { defineAction } from '../../src/route';
import { createKernelHarness, sendRequest } from '../http-test-kit';
import type { KernelHarness } from '../interfaces';

function createHarness(options: { debug?: boolean; withErrorListener?: boolean } = {}): KernelHarness {
  return createKernelHarness({
    options: { debug: options.debug },
    withErrorListener: options.withErrorListener,
    declare: routes => {
      routes.register({
        name: 'crash',
        methods: HttpMethod.Get,
        path: '/crash',
        action: defineAction({
          name: 'crash',
          handle: () => {
            throw new TypeError('database password leaked in message');
          },
        }),
      });
      routes.register({
        name: 'conflict',
        methods: HttpMethod.Post,
        path: '/conflict',
        action: defineAction({
          name: 'conflict',
          handle: async () => {
            throw new ConflictError('Order already shipped.');
          },
        }),
      });
      routes.register({
        name: 'fine',
        methods: HttpMethod.Get,
        path: '/fine',
        action: defineAction({ name: 'fine', handle: () => 'fine' }),
      });
    },
  });
}

describe('HttpKernel exception stage', () => {
  it('should hide unexpected action failures behind a 500 and log them as errors', async () => {
    const harness = createHarness();
    const { status, body } = await sendRequest({ harness, method: 'GET', url: '/crash' });

    expect(status).toBe(500);
    expect(body).toBe('{"code":500,"message":"Internal Server Error"}');
    expect(harness.logger.at('error').map(record => record.msg)).toEqual(['Uncaught TypeError: database password leaked in message']);
  });

  it('should expose the failure in debug mode', async () => {
    const { body } = await sendRequest({ harness: createHarness({ debug: true }), method: 'GET', url: '/crash' });

    expect(JSON.parse(body)).toMatchObject({ code: 500, message: 'database password leaked in message', exception: { name: 'TypeError' } });
  });

  it('should keep the status and message of client errors', async () => {
    const harness = createHarness();
    const { status, body } = await sendRequest({ harness, method: 'POST', url: '/conflict' });

    expect(status).toBe(409);
    expect(body).toBe('{"code":409,"message":"Order already shipped."}');
    expect(harness.logger.at('warn').map(record => record.msg)).toEqual(['ConflictError: Order already shipped.']);
  });

  it('should use the response of a listener that runs before the error listener', async () => {
    const harness = createHarness();

    harness.dispatcher.addListener(KernelStage.Exception, event => {
      event.setResponse(new JsonResponse({ failed: event.error.name }, 503));
    });

    const { status, body } = await sendRequest({ harness, method: 'GET', url: '/crash' });

    expect(status).toBe(503);
    expect(body).toBe('{"failed":"TypeError"}');
    expect(harness.logger.at('error')).toEqual([]);
  });

  it('should render the error itself when no listener answers', async () => {
    const { status, body } = await sendRequest({ harness: createHarness({ withErrorListener: false }), method: 'POST', url: '/conflict' });

    expect(status).toBe(409);
    expect(body).toBe('{"code":409,"message":"Order already shipped."}');
  });

  it('should render the replacement error set by a listener', async () => {
    const harness = createHarness({ withErrorListener: false });

    harness.dispatcher.addListener(KernelStage.Exception, event => {
      event.setError(new ConflictError('Translated.'));
    });

    expect((await sendRequest({ harness, method: 'GET', url: '/crash' })).body).toBe('{"code":409,"message":"Translated."}');
  });

  it('should route listener failures from earlier stages into the exception stage', async () => {
    const harness = createHarness();

    harness.dispatcher.addListener(KernelStage.RouteMatched, () => {
      throw new ConflictError('Locked.');
    });

    const { status } = await sendRequest({ harness, method: 'GET', url: '/fine' });

    expect(status).toBe(409);
  });

  it('should log and rethrow a failure raised by an exception listener', async () => {
    const harness = createHarness();
    const listenerFailure = new Error('listener broke');

    harness.dispatcher.addListener(
      KernelStage.Exception,
      () => {
        throw listenerFailure;
      },
      100,
    );

    await expect(sendRequest({ harness, method: 'GET', url: '/crash' })).rejects.toBe(listenerFailure);

    const [record] = harness.logger.at('error');

    expect(record?.msg).toBe('Exception raised when handling an exception');
    expect(record?.args).toEqual([{ original: 'TypeError: database password leaked in message' }, listenerFailure]);
  });

  it('should enter the exception stage once when the response-ready stage fails', async () => {
    const harness = createHarness();
    let exceptionDispatches = 0;
    let responseReadyDispatches = 0;

    harness.dispatcher.addListener(
      KernelStage.Exception,
      () => {
        exceptionDispatches += 1;
      },
      100,
    );
    harness.dispatcher.addListener(KernelStage.ResponseReady, () => {
      responseReadyDispatches += 1;

      throw new ConflictError('Too late.');
    });

    const { status, body } = await sendRequest({ harness, method: 'GET', url: '/fine' });

    expect(status).toBe(409);
    expect(body).toBe('{"code":409,"message":"Too late."}');
    expect(exceptionDispatches).toBe(1);
    expect(responseReadyDispatches).toBe(1);
  });

  it('should render a response-ready failure directly once the exception stage already ran', async () => {
    const harness = createHarness();
    let exceptionDispatches = 0;

    harness.dispatcher.addListener(
      KernelStage.Exception,
      () => {
        exceptionDispatches += 1;
      },
      100,
    );
    harness.dispatcher.addListener(KernelStage.ResponseReady, () => {
      throw new ConflictError('Also broken.');
    });

    const { status, body } = await sendRequest({ harness, method: 'GET', url: '/crash' });

    expect(exceptionDispatches).toBe(1);
    expect(status).toBe(409);
    expect(body).toBe('{"code":409,"message":"Also broken."}');
    expect(harness.logger.at('error').map(record => record.msg)).toEqual([
      'Uncaught TypeError: database password leaked in message',
      'Exception raised after the exception stage ran',
    ]);
  });
});
