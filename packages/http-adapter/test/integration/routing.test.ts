import { describe, expect, it } from 'vitest';

import { HttpMethod } from '../../src/enums';
import { defineAction } from '../../src/route';
import { createKernelHarness, sendRequest } from '../http-test-kit';

function createHarness(): ReturnType<typeof createKernelHarness> {
  return createKernelHarness({
    declare: routes => {
      routes.register({
        name: 'items.show',
        methods: HttpMethod.Get,
        path: '/items/:id',
        action: defineAction({ name: 'items.show', handle: () => ({ ok: true }) }),
      });
      routes.register({
        name: 'items.update',
        methods: HttpMethod.Put,
        path: '/items/:id',
        action: defineAction({ name: 'items.update', handle: () => ({ updated: true }) }),
      });
      routes.register({
        name: 'posts.show',
        methods: HttpMethod.Get,
        path: '/posts/:slug',
        action: defineAction({ name: 'posts.show', handle: () => 'post' }),
      });
      routes.register({
        name: 'posts.latest',
        methods: HttpMethod.Get,
        path: '/posts/latest',
        priority: 10,
        action: defineAction({ name: 'posts.latest', handle: () => 'latest' }),
      });
      routes.register({
        name: 'health',
        methods: HttpMethod.Get,
        path: '/health',
        format: 'text',
        action: defineAction({ name: 'health', handle: () => 'up' }),
      });
    },
  });
}

describe('HttpKernel routing', () => {
  it('should dispatch a matching request to its action', async () => {
    const { status, body, response } = await sendRequest({ harness: createHarness(), method: 'GET', url: '/items/1' });

    expect(status).toBe(200);
    expect(body).toBe('{"ok":true}');
    expect(response.getContentType()).toBe('application/json; charset=utf-8');
  });

  it('should answer unknown paths with 404', async () => {
    const harness = createHarness();
    const { status, body } = await sendRequest({ harness, method: 'GET', url: '/nope' });

    expect(status).toBe(404);
    expect(body).toBe(`{"code":404,"message":"No route found for 'GET /nope'"}`);
    expect(harness.logger.at('error')).toEqual([]);
  });

  it('should answer a known path with the wrong method with 405 and the allowed methods', async () => {
    const { status, body, response } = await sendRequest({ harness: createHarness(), method: 'POST', url: '/items/1' });

    expect(status).toBe(405);
    expect(response.getHeader('allow')).toBe('GET, HEAD, PUT');
    expect(body).toBe(`{"code":405,"message":"No route found for 'POST /items/1': Method Not Allowed (Allow: GET, HEAD, PUT)"}`);
  });

  it('should serve HEAD requests from GET routes without a body', async () => {
    const { status, body, response } = await sendRequest({ harness: createHarness(), method: 'HEAD', url: '/items/1' });

    expect(status).toBe(200);
    expect(body).toBe('');
    expect(response.getContentType()).toBe('application/json; charset=utf-8');
  });

  it('should ignore a trailing slash by default', async () => {
    const { status } = await sendRequest({ harness: createHarness(), method: 'GET', url: '/items/1/' });

    expect(status).toBe(200);
  });

  it('should respect a strict trailing slash when configured', async () => {
    const harness = createKernelHarness({
      router: { ignoreTrailingSlash: false },
      declare: routes => {
        routes.register({ name: 'a', methods: HttpMethod.Get, path: '/a', action: defineAction({ name: 'a', handle: () => 'a' }) });
      },
    });

    expect((await sendRequest({ harness, method: 'GET', url: '/a/' })).status).toBe(404);
  });

  it('should prefer the route with the higher priority', async () => {
    const harness = createHarness();

    expect((await sendRequest({ harness, method: 'GET', url: '/posts/latest' })).body).toBe('"latest"');
    expect((await sendRequest({ harness, method: 'GET', url: '/posts/hello' })).body).toBe('"post"');
  });

  it('should render a route with a fixed format regardless of Accept', async () => {
    const { body, response } = await sendRequest({
      harness: createHarness(),
      method: 'GET',
      url: '/health',
      headers: { accept: 'application/json' },
    });

    expect(body).toBe('up');
    expect(response.getContentType()).toBe('text/plain; charset=utf-8');
  });

  it('should negotiate the format from the Accept header', async () => {
    const harness = createHarness();

    expect((await sendRequest({ harness, method: 'GET', url: '/posts/hello', headers: { accept: 'text/plain' } })).body).toBe('post');
    expect((await sendRequest({ harness, method: 'GET', url: '/posts/hello', headers: { accept: 'application/xml' } })).status).toBe(406);
  });
});
