import type { MaybePromise } from '@switchyard/common';

import type { RequestContext } from '../context/request-context';

import type { ConstraintSchema, ParamDefault, ParamType, RawValue, ValueParamSource } from './types';

interface ParamDescriptorBase {
  /** Argument name; also how incompatibilities refer to it. */
  readonly name: string;
  readonly description?: string;
}

export interface ValueParamDescriptor extends ParamDescriptorBase {
  readonly source: ValueParamSource;
  /** Request key to read; defaults to the name. */
  readonly key: string;
  readonly type: ParamType;
  /** Absent values fail resolution instead of falling back to `default`. */
  readonly strict: boolean;
  readonly default: ParamDefault;
  readonly incompatibles: readonly string[];
  readonly constraints: readonly ConstraintSchema[];
}

export interface DerivedParamDescriptor extends ParamDescriptorBase {
  readonly source: 'derived';
  /** Token of the `DerivedValueProvider` that supplies the value. */
  readonly provider: string;
}

export type ParamDescriptor = ValueParamDescriptor | DerivedParamDescriptor;

export interface ParamOptions {
  readonly key?: string;
  readonly strict?: boolean;
  readonly default?: ParamDefault;
  readonly incompatibles?: readonly string[];
  readonly constraints?: readonly ConstraintSchema[];
  readonly description?: string;
}

export interface ConstraintViolation {
  readonly message: string;
  readonly code: string;
}

export interface ConstraintValidator {
  validate(value: unknown, constraints: readonly ConstraintSchema[]): readonly ConstraintViolation[];
}

export interface ValueReader {
  read(param: ValueParamDescriptor, context: RequestContext): RawValue;
}

export type DerivedValueProvider = (context: RequestContext) => MaybePromise<unknown>;
