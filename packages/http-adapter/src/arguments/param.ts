import type { DerivedParamDescriptor, ParamOptions, ValueParamDescriptor } from './interfaces';
import type { ListParamType, ParamType, ScalarParamType, ValueParamSource } from './types';

export const ParamTypes = {
  string: { kind: 'string' },
  integer: { kind: 'integer' },
  float: { kind: 'float' },
  boolean: { kind: 'boolean' },
  enum: (values: readonly string[]): ScalarParamType => ({ kind: 'enum', values: Object.freeze([...values]) }),
  list: (item: ScalarParamType): ListParamType => ({ kind: 'list', item }),
} as const satisfies Record<string, ScalarParamType | ((...args: never[]) => ParamType)>;

function valueParam(source: ValueParamSource, name: string, type: ParamType, options: ParamOptions): ValueParamDescriptor {
  const defaultValue = options.default ?? null;

  return Object.freeze({
    name,
    source,
    key: options.key ?? name,
    type,
    strict: options.strict ?? options.default === undefined,
    default: defaultValue,
    incompatibles: Object.freeze([...(options.incompatibles ?? [])]),
    constraints: Object.freeze([...(options.constraints ?? [])]),
    description: options.description,
  });
}

/**
 * Builders for action parameter descriptors.
 *
 * @example
 * param.query('tags', ParamTypes.list(ParamTypes.string), { strict: false })
 */
export const param = {
  path: (name: string, type: ParamType = ParamTypes.string, options: ParamOptions = {}): ValueParamDescriptor =>
    valueParam('path', name, type, options),
  query: (name: string, type: ParamType = ParamTypes.string, options: ParamOptions = {}): ValueParamDescriptor =>
    valueParam('query', name, type, options),
  body: (name: string, type: ParamType = ParamTypes.string, options: ParamOptions = {}): ValueParamDescriptor =>
    valueParam('body', name, type, options),
  header: (name: string, type: ParamType = ParamTypes.string, options: ParamOptions = {}): ValueParamDescriptor =>
    valueParam('header', name, type, { ...options, key: (options.key ?? name).toLowerCase() }),
  derived: (name: string, provider: string, description?: string): DerivedParamDescriptor =>
    Object.freeze({ name, source: 'derived', provider, description }),
};

export function describeParamType(type: ParamType): string {
  switch (type.kind) {
    case 'enum':
      return `value (one of ${type.values.map(value => `'${value}'`).join(', ')})`;
    case 'list':
      return `list of ${describeParamType(type.item)}`;
    default:
      return type.kind;
  }
}
