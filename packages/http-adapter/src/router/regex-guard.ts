export interface RegexSafetyOptions {
  readonly maxLength: number;
  /** Rejects a quantified group that itself contains `*` or `+`, as in `(a+)+`. */
  readonly forbidNestedQuantifiers: boolean;
  readonly forbidBackreferences: boolean;
}

const BACKREFERENCE = /\\(?:[1-9]\d*|k<[^>]+>)/;
const NESTED_QUANTIFIER = /\((?:[^()\\]|\\.)*[+*](?:[^()\\]|\\.)*\)[*+{]/;

/**
 * Checks a requirement source against the guard; returns why it is rejected, or `undefined` when it passes.
 */
export function findRegexHazard(source: string, options: RegexSafetyOptions): string | undefined {
  if (source.length > options.maxLength) {
    return `pattern length ${source.length} exceeds ${options.maxLength}`;
  }

  if (options.forbidBackreferences && BACKREFERENCE.test(source)) {
    return 'backreferences are not allowed';
  }

  if (options.forbidNestedQuantifiers && NESTED_QUANTIFIER.test(source)) {
    return 'nested unlimited quantifiers are not allowed';
  }

  return undefined;
}
