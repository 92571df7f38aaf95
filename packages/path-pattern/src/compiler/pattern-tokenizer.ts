import { PATH_SEPARATOR } from '../constants';
import { InvalidPatternReason } from '../enums';
import { InvalidPatternError } from '../errors/errors';

export interface RawSegment {
  /** Segment text as written, escapes still in place. */
  text: string;
  /** Offset of the segment's first character within the pattern. */
  offset: number;
}

export interface TokenizedPattern {
  segments: RawSegment[];
  trailingSlash: boolean;
}

const BACKSLASH = '\\';

/**
 * Structural pass over a trimmed pattern: leading separator, doubled separators, brace balance and
 * escapes. Splits on `/` outside braces; a `/` inside a constraint stays part of its segment.
 */
export function tokenizePattern(pattern: string): TokenizedPattern {
  if (!pattern.startsWith(PATH_SEPARATOR)) {
    throw new InvalidPatternError(
      InvalidPatternReason.MissingLeadingSeparator,
      `Pattern must start with '${PATH_SEPARATOR}'`,
      pattern,
      0,
    );
  }

  const doubled = pattern.indexOf(PATH_SEPARATOR + PATH_SEPARATOR);
  if (doubled !== -1) {
    throw new InvalidPatternError(InvalidPatternReason.DoubleSeparator, 'Double slashes are not allowed', pattern, doubled);
  }

  const segments: RawSegment[] = [];
  let current = '';
  let offset = 1;
  let openBrace = -1;

  for (let i = 1; i < pattern.length; i++) {
    const char = pattern[i];

    if (char === BACKSLASH) {
      const next = pattern[i + 1];
      if (next === undefined) {
        throw new InvalidPatternError(InvalidPatternReason.DanglingEscape, 'Pattern ends with a dangling escape', pattern, i);
      }
      current += char + next;
      i++;
      continue;
    }

    if (char === '{') {
      if (openBrace !== -1) {
        throw new InvalidPatternError(InvalidPatternReason.NestedBrace, 'Nested variable patterns are not allowed', pattern, i);
      }
      openBrace = i;
    } else if (char === '}') {
      if (openBrace === -1) {
        throw new InvalidPatternError(InvalidPatternReason.UnmatchedClosingBrace, 'Unmatched closing brace', pattern, i);
      }
      openBrace = -1;
    } else if (char === PATH_SEPARATOR && openBrace === -1) {
      segments.push({ text: current, offset });
      current = '';
      offset = i + 1;
      continue;
    }

    current += char;
  }

  if (openBrace !== -1) {
    throw new InvalidPatternError(InvalidPatternReason.UnmatchedOpeningBrace, 'Unmatched opening brace', pattern, openBrace);
  }

  // The last piece is empty for the root pattern and for a trailing separator.
  const trailingSlash = current === '' && segments.length > 0;
  if (current !== '') {
    segments.push({ text: current, offset });
  }

  return { segments, trailingSlash };
}

/**
 * Resolves `\x` escapes to `x`.
 */
export function unescapeLiteral(text: string): string {
  if (text.indexOf(BACKSLASH) === -1) {
    return text;
  }
  let result = '';
  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char === BACKSLASH && i + 1 < text.length) {
      result += text[i + 1];
      i++;
      continue;
    }
    result += char;
  }
  return result;
}

/**
 * Offsets of unescaped occurrences of any of `chars`.
 */
export function findUnescaped(text: string, chars: string): number[] {
  const positions: number[] = [];
  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char === BACKSLASH) {
      i++;
      continue;
    }
    if (char !== undefined && chars.includes(char)) {
      positions.push(i);
    }
  }
  return positions;
}
