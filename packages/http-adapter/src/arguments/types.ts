import type { ZodTypeAny } from 'zod';

export type ParamSource = 'path' | 'query' | 'body' | 'header' | 'derived';

export type ValueParamSource = Exclude<ParamSource, 'derived'>;

export type ScalarParamType =
  | { readonly kind: 'string' }
  | { readonly kind: 'integer' }
  | { readonly kind: 'float' }
  | { readonly kind: 'boolean' }
  | { readonly kind: 'enum'; readonly values: readonly string[] };

export type ListParamType = { readonly kind: 'list'; readonly item: ScalarParamType };

export type ParamType = ScalarParamType | ListParamType;

export type ScalarValue = string | number | boolean;

export type ParamDefault = ScalarValue | readonly ScalarValue[] | null;

/**
 * Raw request input for one parameter: absent, one value, or every value of a repeated key.
 */
export type RawValue = string | readonly string[] | undefined;

export type ConstraintSchema = ZodTypeAny;
