import type { ParsedQs } from 'qs';

import { RequestAttribute } from '../context/attribute-bag';
import type { RequestContext } from '../context/request-context';
import { TypeMismatchError } from '../errors';

import type { ValueParamDescriptor, ValueReader } from './interfaces';
import { describeParamType } from './param';
import type { RawValue, ValueParamSource } from './types';

type ParsedQsValue = ParsedQs[string];

function isStringList(value: readonly unknown[]): value is readonly string[] {
  return value.every(item => typeof item === 'string');
}

const INDEX_KEY = /^(?:0|[1-9]\d*)$/;

/**
 * qs turns indices above its array limit into object keys; puts such an object back in index order.
 */
function fromIndexedObject(value: ParsedQs): string[] | undefined {
  const entries = Object.entries(value);

  if (entries.length === 0) {
    return undefined;
  }

  const items: Array<[number, string]> = [];

  for (const [key, item] of entries) {
    if (!INDEX_KEY.test(key) || typeof item !== 'string') {
      return undefined;
    }

    items.push([Number(key), item]);
  }

  return items.sort(([a], [b]) => a - b).map(([, item]) => item);
}

/**
 * Reads a key of a qs-parsed structure. Nested objects are not parameter values.
 */
function fromParsed(param: ValueParamDescriptor, value: ParsedQsValue): RawValue {
  if (value === undefined || typeof value === 'string') {
    return value;
  }

  if (Array.isArray(value)) {
    if (isStringList(value)) {
      return value;
    }
  } else {
    const list = fromIndexedObject(value);

    if (list !== undefined) {
      return list;
    }
  }

  throw new TypeMismatchError(param.name, describeParamType(param.type), JSON.stringify(value));
}

export class PathValueReader implements ValueReader {
  read(param: ValueParamDescriptor, context: RequestContext): RawValue {
    const params = context.attributes.get(RequestAttribute.RouteParams, 'params');

    return params?.[param.key];
  }
}

export class QueryValueReader implements ValueReader {
  read(param: ValueParamDescriptor, context: RequestContext): RawValue {
    return fromParsed(param, context.request.query[param.key]);
  }
}

export class BodyValueReader implements ValueReader {
  read(param: ValueParamDescriptor, context: RequestContext): RawValue {
    return fromParsed(param, context.request.requestData[param.key]);
  }
}

export class HeaderValueReader implements ValueReader {
  read(param: ValueParamDescriptor, context: RequestContext): RawValue {
    const value = context.request.headers.get(param.key);

    if (value === null) {
      return undefined;
    }

    if (param.type.kind !== 'list') {
      return value;
    }

    return value
      .split(',')
      .map(item => item.trim())
      .filter(item => item !== '');
  }
}

export function createDefaultReaders(): Record<ValueParamSource, ValueReader> {
  return {
    path: new PathValueReader(),
    query: new QueryValueReader(),
    body: new BodyValueReader(),
    header: new HeaderValueReader(),
  };
}
