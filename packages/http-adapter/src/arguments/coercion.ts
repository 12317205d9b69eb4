import type { ScalarParamType, ScalarValue } from './types';

export type CoercionResult = { readonly ok: true; readonly value: ScalarValue } | { readonly ok: false };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

const FAILED: CoercionResult = { ok: false };

export function coerceScalar(raw: string, type: ScalarParamType): CoercionResult {
  switch (type.kind) {
    case 'string':
      return { ok: true, value: raw };
    case 'integer': {
      if (!INTEGER_PATTERN.test(raw)) {
        return FAILED;
      }

      const value = Number(raw);

      return Number.isSafeInteger(value) ? { ok: true, value } : FAILED;
    }
    case 'float': {
      if (!FLOAT_PATTERN.test(raw)) {
        return FAILED;
      }

      const value = Number(raw);

      return Number.isFinite(value) ? { ok: true, value } : FAILED;
    }
    case 'boolean': {
      const normalized = raw.toLowerCase();

      if (TRUE_VALUES.has(normalized)) {
        return { ok: true, value: true };
      }

      return FALSE_VALUES.has(normalized) ? { ok: true, value: false } : FAILED;
    }
    case 'enum':
      return type.values.includes(raw) ? { ok: true, value: raw } : FAILED;
    default:
      return FAILED;
  }
}
