import { LogicError } from '@switchyard/common';
import { Logger, type LoggerLike } from '@switchyard/logger';

import type { RequestContext } from '../context/request-context';
import { IncompatibleParametersError, MissingRequiredParameterError, TypeMismatchError, ValidationError, type Violation } from '../errors';
import type { Action } from '../route/action';
import type { Route } from '../route/interfaces';

import { coerceScalar } from './coercion';
import { ZodConstraintValidator } from './constraint-validator';
import { DerivedValueProviderRegistry } from './derived-value-providers';
import type { ConstraintValidator, DerivedParamDescriptor, ValueParamDescriptor, ValueReader } from './interfaces';
import { describeParamType } from './param';
import type { ParamType, RawValue, ScalarParamType, ScalarValue, ValueParamSource } from './types';
import { createDefaultReaders } from './value-readers';

export interface ArgumentResolverOptions {
  readonly validator?: ConstraintValidator;
  readonly providers?: DerivedValueProviderRegistry;
  readonly readers?: Partial<Record<ValueParamSource, ValueReader>>;
  readonly logger?: LoggerLike;
}

/**
 * Turns an action's parameter descriptors into the argument list it is invoked with.
 */
export class ArgumentResolver {
  private readonly logger: LoggerLike;
  private readonly validator: ConstraintValidator;
  private readonly providers: DerivedValueProviderRegistry;
  private readonly readers: Record<ValueParamSource, ValueReader>;

  constructor(options: ArgumentResolverOptions = {}) {
    this.validator = options.validator ?? new ZodConstraintValidator();
    this.providers = options.providers ?? new DerivedValueProviderRegistry();
    this.readers = { ...createDefaultReaders(), ...options.readers };
    this.logger = options.logger ?? new Logger(ArgumentResolver.name);
  }

  get derivedValueProviders(): DerivedValueProviderRegistry {
    return this.providers;
  }

  /**
   * One value per parameter, in declaration order. Validation violations of every
   * parameter are collected into a single `ValidationError`.
   */
  async resolve(route: Route, context: RequestContext, action: Action = route.action): Promise<unknown[]> {
    const raw = new Map<string, RawValue>();

    for (const param of action.parameters) {
      if (param.source !== 'derived') {
        raw.set(param.name, this.readers[param.source].read(param, context));
      }
    }

    const present = (name: string): boolean => isPresent(raw.get(name));
    const args: unknown[] = [];
    const violations: Violation[] = [];

    for (const param of action.parameters) {
      if (param.source === 'derived') {
        args.push(await this.resolveDerived(param, context));
        continue;
      }

      const value = this.resolveValue(param, raw.get(param.name), present);

      for (const violation of this.validator.validate(value, param.constraints)) {
        violations.push({ property: param.name, ...violation });
      }

      args.push(value);
    }

    if (violations.length > 0) {
      throw new ValidationError(violations);
    }

    this.logger.log('trace', 'Arguments resolved', { route: route.name, action: action.name, count: args.length });

    return args;
  }

  private resolveValue(param: ValueParamDescriptor, raw: RawValue, present: (name: string) => boolean): unknown {
    if (!isPresent(raw)) {
      if (param.strict) {
        throw new MissingRequiredParameterError(param.name);
      }

      if (param.default === null && param.type.kind === 'list') {
        return [];
      }

      return param.default;
    }

    const conflict = param.incompatibles.find(present);

    if (conflict !== undefined) {
      throw new IncompatibleParametersError(param.name, conflict);
    }

    return coerce(param, param.type, raw);
  }

  private async resolveDerived(param: DerivedParamDescriptor, context: RequestContext): Promise<unknown> {
    const provider = this.providers.get(param.provider);

    if (provider === undefined) {
      throw new LogicError(`No derived value provider is registered for '${param.provider}' (parameter '${param.name}').`);
    }

    return provider(context);
  }
}

function isPresent(raw: RawValue): raw is string | readonly string[] {
  if (raw === undefined) {
    return false;
  }

  return typeof raw === 'string' || raw.length > 0;
}

function coerce(param: ValueParamDescriptor, type: ParamType, raw: string | readonly string[]): ScalarValue | ScalarValue[] {
  if (type.kind === 'list') {
    const items = typeof raw === 'string' ? [raw] : raw;

    return items.map(item => coerceOne(param, type.item, item));
  }

  const first = typeof raw === 'string' ? raw : raw[0];

  return coerceOne(param, type, first ?? '');
}

function coerceOne(param: ValueParamDescriptor, type: ScalarParamType, raw: string): ScalarValue {
  const result = coerceScalar(raw, type);

  if (!result.ok) {
    throw new TypeMismatchError(param.name, describeParamType(param.type), raw);
  }

  return result.value;
}
