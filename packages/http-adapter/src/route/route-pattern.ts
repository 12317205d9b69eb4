import { InvalidRouteError } from '../errors';
import { buildPatternTester } from '../router/pattern-tester';
import { findRegexHazard } from '../router/regex-guard';
import type { NormalizedRouterOptions } from '../router/router-options';

import type { PlaceholderRequirement, RouteSegment, SegmentConstraint } from './types';

const PLACEHOLDER_PATTERN = /^:([A-Za-z_][A-Za-z0-9_]*)(?:\{(.+)\})?$/;

export interface ParsedPattern {
  readonly segments: readonly RouteSegment[];
  readonly placeholders: readonly string[];
}

export function joinPaths(prefix: string, path: string): string {
  const parts = [prefix, path].flatMap(part => splitPattern(part)).filter(part => part !== '');

  return '/' + parts.join('/');
}

export function parsePattern(params: {
  readonly routeName: string;
  readonly path: string;
  readonly requirements: Readonly<Record<string, PlaceholderRequirement>>;
  readonly options: NormalizedRouterOptions;
}): ParsedPattern {
  const { routeName, path, requirements, options } = params;
  const segments: RouteSegment[] = [];
  const placeholders: string[] = [];

  for (const raw of splitPattern(path)) {
    if (raw === '') {
      continue;
    }

    if (!raw.startsWith(':')) {
      segments.push({ kind: 'literal', value: options.caseSensitive ? raw : raw.toLowerCase(), declared: raw });

      continue;
    }

    const match = PLACEHOLDER_PATTERN.exec(raw);
    const name = match?.[1];

    if (match === null || name === undefined) {
      throw new InvalidRouteError(routeName, `malformed placeholder '${raw}'`);
    }

    if (placeholders.includes(name)) {
      throw new InvalidRouteError(routeName, `placeholder '${name}' appears more than once`);
    }

    const inline = match[2];
    const requirement = requirements[name] ?? inline;

    placeholders.push(name);
    segments.push({
      kind: 'placeholder',
      name,
      constraint: requirement === undefined ? undefined : compileConstraint({ routeName, name, requirement, options }),
    });
  }

  for (const name of Object.keys(requirements)) {
    if (!placeholders.includes(name)) {
      throw new InvalidRouteError(routeName, `requirement '${name}' does not match any placeholder`);
    }
  }

  return { segments, placeholders };
}

/**
 * Splits on `/` outside of inline requirements, so `:path{[^/]+}` stays one segment.
 */
export function splitPattern(path: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';

  for (const char of path) {
    if (char === '/' && depth === 0) {
      parts.push(current);
      current = '';

      continue;
    }

    if (char === '{') {
      depth++;
    } else if (char === '}' && depth > 0) {
      depth--;
    }

    current += char;
  }

  parts.push(current);

  return parts;
}

export function compileConstraint(params: {
  readonly routeName: string;
  readonly name: string;
  readonly requirement: PlaceholderRequirement;
  readonly options: NormalizedRouterOptions;
}): SegmentConstraint {
  const { routeName, name, requirement, options } = params;

  if (typeof requirement !== 'string' && !(requirement instanceof RegExp)) {
    if (requirement.length === 0) {
      throw new InvalidRouteError(routeName, `requirement of '${name}' lists no accepted values`);
    }

    return { kind: 'enum', values: Object.freeze([...requirement]) };
  }

  const source = typeof requirement === 'string' ? requirement : requirement.source;
  const flags = typeof requirement === 'string' ? '' : requirement.flags;

  if (options.regexSafety !== false) {
    const hazard = findRegexHazard(source, options.regexSafety);

    if (hazard !== undefined) {
      throw new InvalidRouteError(routeName, `requirement of '${name}' is rejected: ${hazard}`);
    }
  }

  try {
    return { kind: 'pattern', source, test: buildPatternTester(source, flags) };
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new InvalidRouteError(routeName, `requirement of '${name}' is not a valid regex: ${error.message}`);
    }

    throw error;
  }
}

export function satisfiesConstraint(constraint: SegmentConstraint | undefined, value: string): boolean {
  if (constraint === undefined) {
    return true;
  }

  return constraint.kind === 'enum' ? constraint.values.includes(value) : constraint.test(value);
}

/**
 * Identity of a pattern under matching: two routes with equal signatures accept exactly the same paths.
 */
export function patternSignature(segments: readonly RouteSegment[], minSegments: number): string {
  const parts = segments.map(segment => {
    if (segment.kind === 'literal') {
      return `=${segment.value}`;
    }

    if (segment.constraint === undefined) {
      return '*';
    }

    return segment.constraint.kind === 'enum'
      ? `{${[...segment.constraint.values].sort().join('|')}}`
      : `(${segment.constraint.source})`;
  });

  return `${minSegments}:${parts.join('/')}`;
}

export function placeholderNames(path: string): string[] {
  return splitPattern(path).flatMap(raw => {
    const name = PLACEHOLDER_PATTERN.exec(raw)?.[1];

    return name === undefined ? [] : [name];
  });
}
