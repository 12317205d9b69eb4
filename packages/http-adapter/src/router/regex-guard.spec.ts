import { describe, expect, it } from 'vitest';

import { buildPatternTester } from './pattern-tester';
import { findRegexHazard } from './regex-guard';

const options = { maxLength: 16, forbidNestedQuantifiers: true, forbidBackreferences: true };

describe('findRegexHazard', () => {
  it('should pass plain requirements', () => {
    expect(findRegexHazard('\\d+', options)).toBeUndefined();
    expect(findRegexHazard('(en|fr)-[a-z]+', options)).toBeUndefined();
  });

  it('should reject patterns over the length limit', () => {
    expect(findRegexHazard('a'.repeat(17), options)).toBe('pattern length 17 exceeds 16');
  });

  it('should reject backreferences', () => {
    expect(findRegexHazard('(a)\\1', options)).toBe('backreferences are not allowed');
    expect(findRegexHazard('(a)\\1', { ...options, forbidBackreferences: false })).toBeUndefined();
  });

  it('should reject quantified groups with an inner unlimited quantifier', () => {
    expect(findRegexHazard('(a+)+', options)).toBe('nested unlimited quantifiers are not allowed');
    expect(findRegexHazard('(a*)*', options)).toBe('nested unlimited quantifiers are not allowed');
    expect(findRegexHazard('(a+)', options)).toBeUndefined();
  });
});

describe('buildPatternTester', () => {
  it('should test the whole value', () => {
    const test = buildPatternTester('\\d:\\d:\\d');

    expect(test('4:5:6')).toBe(true);
    expect(test('4:a:6')).toBe(false);
    expect(test('14:5:6')).toBe(false);
  });

  it('should agree with the regex for character class shortcuts', () => {
    expect(buildPatternTester('\\d+')('123')).toBe(true);
    expect(buildPatternTester('\\d+')('')).toBe(false);
    expect(buildPatternTester('\\w+')('a_1')).toBe(true);
    expect(buildPatternTester('\\w+')('a-1')).toBe(false);
    expect(buildPatternTester('[A-Za-z0-9_-]+')('a-1')).toBe(true);
    expect(buildPatternTester('[^/]+')('a/b')).toBe(false);
  });

  it('should honor flags', () => {
    expect(buildPatternTester('[a-z]+', 'i')('ABC')).toBe(true);
  });

  it('should throw SyntaxError for an invalid source', () => {
    expect(() => buildPatternTester('[a-')).toThrow(SyntaxError);
  });
});
