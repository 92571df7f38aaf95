import { PATH_SEPARATOR } from './constants';
import { SegmentKind } from './enums';
import { formatSegment, segmentWeight, type Segment } from './segment';

export interface CompiledPattern {
  readonly source: string;
  readonly segments: ReadonlyArray<Segment>;
  readonly isStatic: boolean;
  readonly hasWildcard: boolean;
  readonly hasVariables: boolean;
  readonly caseInsensitive: boolean;
  readonly optionalTrailingSlash: boolean;
  /** Whether the source ends with a separator (the root pattern never does). */
  readonly trailingSlash: boolean;
  readonly specificityRank: number;
  readonly multiWildcardCount: number;
  readonly variableNames: ReadonlyArray<string>;
  /** Canonical `/a/b` form of a static pattern, folded when case-insensitive. */
  readonly staticKey?: string;
}

export interface CompiledPatternOptions {
  caseInsensitive: boolean;
  optionalTrailingSlash: boolean;
  trailingSlash: boolean;
}

export function createCompiledPattern(
  source: string,
  segments: ReadonlyArray<Segment>,
  options: CompiledPatternOptions,
): CompiledPattern {
  let hasWildcard = false;
  let hasVariables = false;
  let multiWildcardCount = 0;
  const variableNames: string[] = [];

  for (const segment of segments) {
    if (segment.kind === SegmentKind.Wildcard) {
      hasWildcard = true;
      if (segment.multiSegment) {
        multiWildcardCount++;
      }
    } else if (segment.kind === SegmentKind.Variable) {
      hasVariables = true;
      if (!variableNames.includes(segment.name)) {
        variableNames.push(segment.name);
      }
    }
  }

  const isStatic = !hasWildcard && !hasVariables;

  const pattern: CompiledPattern = {
    source,
    segments: Object.freeze([...segments]),
    isStatic,
    hasWildcard,
    hasVariables,
    caseInsensitive: options.caseInsensitive,
    optionalTrailingSlash: options.optionalTrailingSlash,
    trailingSlash: options.trailingSlash,
    specificityRank: computeSpecificityRank(segments),
    multiWildcardCount,
    variableNames: Object.freeze(variableNames),
    staticKey: isStatic ? toStaticKey(segments, options.caseInsensitive) : undefined,
  };

  return Object.freeze(pattern);
}

export function computeSpecificityRank(segments: ReadonlyArray<Segment>): number {
  let rank = 0;
  for (const segment of segments) {
    rank += segmentWeight(segment);
  }
  return rank;
}

function toStaticKey(segments: ReadonlyArray<Segment>, caseInsensitive: boolean): string {
  const parts: string[] = [];
  for (const segment of segments) {
    if (segment.kind === SegmentKind.Literal) {
      parts.push(caseInsensitive ? segment.folded : segment.value);
    }
  }
  return PATH_SEPARATOR + parts.join(PATH_SEPARATOR);
}

/**
 * Canonical pattern text rebuilt from the segments. Equal for patterns that differ only in escaping
 * or surrounding whitespace.
 */
export function formatPattern(pattern: CompiledPattern): string {
  const body = pattern.segments.map(formatSegment).join(PATH_SEPARATOR);
  return PATH_SEPARATOR + body + (pattern.trailingSlash ? PATH_SEPARATOR : '');
}
