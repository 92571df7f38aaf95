import { describe, expect, it } from 'vitest';

import { findUnescaped, tokenizePattern, unescapeLiteral } from '../../src/compiler/pattern-tokenizer';

describe('PatternTokenizer :: tokenizePattern', () => {
  it('should split on separators and record offsets', () => {
    expect(tokenizePattern('/api/{id}/*')).toEqual({
      segments: [
        { text: 'api', offset: 1 },
        { text: '{id}', offset: 5 },
        { text: '*', offset: 10 },
      ],
      trailingSlash: false,
    });
  });

  it('should return no segments for the root pattern', () => {
    expect(tokenizePattern('/')).toEqual({ segments: [], trailingSlash: false });
  });

  it('should report a trailing separator', () => {
    expect(tokenizePattern('/a/')).toEqual({ segments: [{ text: 'a', offset: 1 }], trailingSlash: true });
  });

  it('should keep escapes in the raw text and ignore escaped braces', () => {
    expect(tokenizePattern('/\\{x\\}/b').segments).toEqual([
      { text: '\\{x\\}', offset: 1 },
      { text: 'b', offset: 7 },
    ]);
  });
});

describe('PatternTokenizer :: helpers', () => {
  it('should resolve escapes', () => {
    expect(unescapeLiteral('a\\*b\\\\c')).toBe('a*b\\c');
    expect(unescapeLiteral('plain')).toBe('plain');
  });

  it('should find unescaped characters only', () => {
    expect(findUnescaped('a*\\*b*', '*')).toEqual([1, 5]);
    expect(findUnescaped('{x}', '{}')).toEqual([0, 2]);
  });
});
