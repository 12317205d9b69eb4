import { LogicError } from '@switchyard/common';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { RequestAttribute } from '../context/attribute-bag';
import { RequestContext } from '../context/request-context';
import { HttpMethod } from '../enums';
import { IncompatibleParametersError, MissingRequiredParameterError, TypeMismatchError, ValidationError } from '../errors';
import { SwitchyardRequest, type SwitchyardRequestInit } from '../http/request';
import { defineAction } from '../route/action';
import type { Route } from '../route/interfaces';
import { RouteTable } from '../route/route-table';
import type { RouteParams } from '../route/types';

import { ArgumentResolver } from './argument-resolver';
import { DerivedValueProviderRegistry } from './derived-value-providers';
import type { ParamDescriptor } from './interfaces';
import { param, ParamTypes } from './param';

interface Fixture {
  readonly route: Route;
  readonly context: RequestContext;
}

function createFixture(parameters: ParamDescriptor[], request: Partial<SwitchyardRequestInit> = {}, params: RouteParams = {}): Fixture {
  const table = new RouteTable();
  const route = table.register({
    name: 'subject',
    methods: HttpMethod.Get,
    path: '/subject',
    action: defineAction({ name: 'subject', parameters, handle: () => undefined }),
  });
  const context = new RequestContext(new SwitchyardRequest({ method: 'GET', url: '/subject', ...request }));

  context.attributes.set(RequestAttribute.RouteParams, { kind: 'params', value: params });

  return { route, context };
}

async function resolve(parameters: ParamDescriptor[], request: Partial<SwitchyardRequestInit> = {}, params: RouteParams = {}): Promise<unknown[]> {
  const { route, context } = createFixture(parameters, request, params);

  return new ArgumentResolver().resolve(route, context);
}

describe('ArgumentResolver', () => {
  it('should read and coerce path placeholders', async () => {
    await expect(resolve([param.path('id', ParamTypes.integer)], {}, { id: '42' })).resolves.toEqual([42]);
  });

  it('should gather every value of a repeated query key for list types', async () => {
    const args = await resolve([param.query('tags', ParamTypes.list(ParamTypes.string))], { url: '/subject?tags=a&tags=b' });

    expect(args).toEqual([['a', 'b']]);
  });

  it('should take the first value of a repeated key for scalar types', async () => {
    const args = await resolve([param.query('page', ParamTypes.integer)], { url: '/subject?page=2&page=3' });

    expect(args).toEqual([2]);
  });

  it('should keep the declared order with one value per parameter', async () => {
    const args = await resolve(
      [param.query('b'), param.path('a'), param.query('c', ParamTypes.boolean, { default: false })],
      { url: '/subject?b=bee' },
      { a: 'ay' },
    );

    expect(args).toEqual(['bee', 'ay', false]);
  });

  it('should reject a missing strict parameter', async () => {
    const result = resolve([param.query('page', ParamTypes.integer)]);

    await expect(result).rejects.toBeInstanceOf(MissingRequiredParameterError);
    await expect(result).rejects.toThrow("Missing required parameter 'page'.");
  });

  it('should fall back to the default without coercing it', async () => {
    const args = await resolve([param.query('page', ParamTypes.integer, { default: '5' }), param.query('size', ParamTypes.integer, { strict: false })]);

    expect(args).toEqual(['5', null]);
  });

  it('should answer an absent non-strict list with an empty list', async () => {
    await expect(resolve([param.query('tags', ParamTypes.list(ParamTypes.integer), { strict: false })])).resolves.toEqual([[]]);
  });

  it('should name the parameter and the expected type when coercion fails', async () => {
    const result = resolve([param.query('page', ParamTypes.integer)], { url: '/subject?page=abc' });

    await expect(result).rejects.toBeInstanceOf(TypeMismatchError);
    await expect(result).rejects.toThrow("Parameter 'page' with value 'abc' could not be converted into a valid integer.");
  });

  it('should reject a list containing a value of the wrong type', async () => {
    const result = resolve([param.query('ids', ParamTypes.list(ParamTypes.integer))], { url: '/subject?ids=1&ids=x' });

    await expect(result).rejects.toThrow("Parameter 'ids' with value 'x' could not be converted into a valid list of integer.");
  });

  it('should reject nested query structures', async () => {
    const result = resolve([param.query('filter')], { url: '/subject?filter[a]=1' });

    await expect(result).rejects.toThrow(`Parameter 'filter' with value '{"a":"1"}' could not be converted into a valid string.`);
  });

  it('should reject parameters present together with an incompatible one', async () => {
    const result = resolve(
      [param.query('id', ParamTypes.string, { strict: false, incompatibles: ['slug'] }), param.query('slug', ParamTypes.string, { strict: false })],
      { url: '/subject?id=1&slug=x' },
    );

    await expect(result).rejects.toBeInstanceOf(IncompatibleParametersError);
    await expect(result).rejects.toThrow("Parameter 'id' is incompatible with parameter 'slug'.");
  });

  it('should accept an incompatible parameter on its own', async () => {
    const args = await resolve(
      [param.query('id', ParamTypes.string, { strict: false, incompatibles: ['slug'] }), param.query('slug', ParamTypes.string, { strict: false })],
      { url: '/subject?slug=x' },
    );

    expect(args).toEqual([null, 'x']);
  });

  it('should validate coerced values and collect the violations of every parameter', async () => {
    const error = await resolve(
      [
        param.query('limit', ParamTypes.integer, { constraints: [z.number().max(50)] }),
        param.query('name', ParamTypes.string, { constraints: [z.string().min(3)] }),
      ],
      { url: '/subject?limit=100&name=al' },
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError ? error.violations : []).toMatchObject([
      { property: 'limit', code: 'too_big' },
      { property: 'name', code: 'too_small' },
    ]);
  });

  it('should split list headers on commas', async () => {
    const args = await resolve([param.header('X-Tags', ParamTypes.list(ParamTypes.string)), param.header('x-debug', ParamTypes.boolean)], {
      headers: { 'x-tags': 'a, b,,c', 'X-Debug': 'on' },
    });

    expect(args).toEqual([['a', 'b', 'c'], true]);
  });

  it('should read form-encoded body fields', async () => {
    const args = await resolve([param.body('name'), param.body('age', ParamTypes.integer)], {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: 'name=ada&age=36',
    });

    expect(args).toEqual(['ada', 36]);
  });

  it('should provide the request and the context as derived values', async () => {
    const { route, context } = createFixture([param.derived('request', 'request'), param.derived('context', 'context')]);
    const args = await new ArgumentResolver().resolve(route, context);

    expect(args[0]).toBe(context.request);
    expect(args[1]).toBe(context);
  });

  it('should use registered derived value providers', async () => {
    const providers = new DerivedValueProviderRegistry().register('tenant', async context => context.request.headers.get('x-tenant'));
    const { route, context } = createFixture([param.derived('tenant', 'tenant')], { headers: { 'x-tenant': 'acme' } });

    await expect(new ArgumentResolver({ providers }).resolve(route, context)).resolves.toEqual(['acme']);
  });

  it('should fail as a server fault when a derived provider is missing', async () => {
    await expect(resolve([param.derived('user', 'current-user')])).rejects.toBeInstanceOf(LogicError);
  });

  it('should resolve the parameters of a replacement action', async () => {
    const { route, context } = createFixture([param.query('unused')], { url: '/subject?q=term' });
    const replacement = defineAction({ name: 'replacement', parameters: [param.query('q')], handle: () => undefined });

    await expect(new ArgumentResolver().resolve(route, context, replacement)).resolves.toEqual(['term']);
  });
});
