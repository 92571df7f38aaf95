import { describe, expect, it } from 'vitest';

import { buildConstraintTester, compileConstraint } from '../src/pattern-tester';

const tester = (source: string) => buildConstraintTester(source, compileConstraint(source));

describe('PatternTester :: compileConstraint', () => {
  it('should anchor the body as a full match', () => {
    const regex = compileConstraint('a|b');

    expect(regex.source).toBe('^(?:a|b)$');
    expect(regex.test('ab')).toBe(false);
    expect(regex.test('b')).toBe(true);
  });
});

describe('PatternTester :: buildConstraintTester', () => {
  it('should test digits without the regex engine', () => {
    const digits = tester('\\d+');

    expect(digits('123')).toBe(true);
    expect(digits('12a')).toBe(false);
    expect(digits('')).toBe(false);
  });

  it('should test letters', () => {
    expect(tester('[A-Za-z]+')('Abc')).toBe(true);
    expect(tester('[A-Za-z]+')('Ab1')).toBe(false);
  });

  it('should test alphanumerics with and without dashes', () => {
    expect(tester('[A-Za-z0-9_-]+')('a-b_1')).toBe(true);
    expect(tester('[A-Za-z0-9_-]+')('a.b')).toBe(false);
    expect(tester('\\w+')('a_1')).toBe(true);
    expect(tester('\\w+')('a-b')).toBe(false);
  });

  it('should fall back to the compiled regex', () => {
    const pair = tester('[a-c]{2}');

    expect(pair('ab')).toBe(true);
    expect(pair('abc')).toBe(false);
  });
});
