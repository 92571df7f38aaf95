import { describe, expect, it } from 'vitest';

import { formatPattern } from '../src/compiled-pattern';
import { PatternCompiler } from '../src/compiler/pattern-compiler';
import { SegmentKind } from '../src/enums';
import { noMatch } from '../src/match-result';
import {
  extractSegmentVariables,
  formatSegment,
  isMultiWildcard,
  literalSegment,
  segmentMatches,
  segmentWeight,
  variableSegment,
  wildcardSegment,
} from '../src/segment';

describe('Segment :: segmentMatches', () => {
  it('should compare literals by case policy', () => {
    const segment = literalSegment('Users');

    expect(segmentMatches(segment, 'Users', false)).toBe(true);
    expect(segmentMatches(segment, 'users', false)).toBe(false);
    expect(segmentMatches(segment, 'USERS', true)).toBe(true);
  });

  it('should accept any non-empty component for a bare variable', () => {
    const segment = variableSegment('id');

    expect(segmentMatches(segment, 'x', false)).toBe(true);
    expect(segmentMatches(segment, '', false)).toBe(false);
  });

  it('should keep constraints case-sensitive', () => {
    const segment = variableSegment('code', '[a-z]+');

    expect(segmentMatches(segment, 'abc', true)).toBe(true);
    expect(segmentMatches(segment, 'ABC', true)).toBe(false);
  });

  it('should accept any component for wildcards', () => {
    expect(segmentMatches(wildcardSegment(false), 'x', false)).toBe(true);
    expect(isMultiWildcard(wildcardSegment(true))).toBe(true);
    expect(isMultiWildcard(wildcardSegment(false))).toBe(false);
  });

  it('should throw the regex error for an invalid constraint', () => {
    expect(() => variableSegment('x', '(')).toThrow(SyntaxError);
  });
});

describe('Segment :: helpers', () => {
  it('should extract variables only from variable segments', () => {
    expect(extractSegmentVariables(variableSegment('id'), '42')).toEqual({ id: '42' });
    expect(extractSegmentVariables(literalSegment('id'), '42')).toEqual({});
  });

  it('should format segments as pattern text', () => {
    expect(formatSegment(literalSegment('a*b'))).toBe('a\\*b');
    expect(formatSegment(variableSegment('id'))).toBe('{id}');
    expect(formatSegment(variableSegment('id', '\\d+'))).toBe('{id:\\d+}');
    expect(formatSegment(wildcardSegment(true))).toBe('**');
  });

  it('should weight segment kinds', () => {
    expect(segmentWeight(literalSegment('a'))).toBe(1000);
    expect(segmentWeight(variableSegment('a', '\\d+'))).toBe(150);
    expect(segmentWeight(variableSegment('a'))).toBe(100);
    expect(segmentWeight(wildcardSegment(false))).toBe(10);
    expect(segmentWeight(wildcardSegment(true))).toBe(1);
  });

  it('should freeze built segments', () => {
    const segment = literalSegment('a');

    expect(Object.isFrozen(segment)).toBe(true);
    expect(segment).toEqual({ kind: SegmentKind.Literal, value: 'a', folded: 'a' });
  });
});

describe('CompiledPattern :: formatPattern', () => {
  it('should rebuild canonical pattern text', () => {
    const pattern = new PatternCompiler().compile('/users/{ id : \\d+ }/**/');

    expect(formatPattern(pattern)).toBe('/users/{id:\\d+}/**/');
    expect(Object.isFrozen(pattern)).toBe(true);
  });
});

describe('MatchResult :: noMatch', () => {
  it('should carry the path and pattern', () => {
    expect(noMatch('/x', '/y')).toEqual({
      matched: false,
      variables: {},
      matchedSegments: [],
      wildcards: [],
      path: '/x',
      pattern: '/y',
    });
  });
});
