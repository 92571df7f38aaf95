import type { CompiledPattern } from '../compiled-pattern';
import { PATH_SEPARATOR } from '../constants';
import { SegmentKind } from '../enums';
import { matchSuccess, noMatch, type MatchResult } from '../match-result';
import type { ProcessedPath } from '../processor/context';
import { PathProcessor } from '../processor/processor';
import { extractSegmentVariables, segmentMatches } from '../segment';

import type { MatchFrame } from './match-frame';

export interface BestMatch {
  pattern: CompiledPattern;
  result: MatchResult;
}

/**
 * Matches request paths against compiled patterns.
 *
 * Single-component segments are tested in order. A `**` in the middle of a pattern pushes a
 * {@link MatchFrame} and tries the shortest span first; when the rest of the pattern fails, the walk
 * pops the frame and retries with a span one component longer.
 */
export class Matcher {
  private readonly processor: PathProcessor;

  constructor(processor: PathProcessor = new PathProcessor()) {
    this.processor = processor;
  }

  match(path: string, pattern: CompiledPattern): MatchResult {
    const processed = this.processor.process(path);
    if (!processed) {
      return noMatch(path, pattern.source);
    }
    return this.matchProcessed(path, processed, pattern);
  }

  /**
   * First match among the patterns in precedence order: static patterns, then fewer `**`, then higher
   * specificity rank, then input order. Returns a failed result with an empty pattern when none match.
   */
  matchBest(path: string, patterns: ReadonlyArray<CompiledPattern>): MatchResult {
    return this.findBest(path, patterns)?.result ?? noMatch(path, '');
  }

  findBest(path: string, patterns: ReadonlyArray<CompiledPattern>): BestMatch | null {
    if (!patterns.length) {
      return null;
    }
    const processed = this.processor.process(path);
    if (!processed) {
      return null;
    }

    for (const pattern of orderByPrecedence(patterns)) {
      const result = this.matchProcessed(path, processed, pattern);
      if (result.matched) {
        return { pattern, result };
      }
    }

    return null;
  }

  private matchProcessed(path: string, processed: ProcessedPath, pattern: CompiledPattern): MatchResult {
    if (!pattern.optionalTrailingSlash && processed.hadTrailingSlash !== pattern.trailingSlash) {
      return noMatch(path, pattern.source);
    }

    if (pattern.staticKey !== undefined) {
      return this.matchStatic(path, processed, pattern, pattern.staticKey);
    }

    return this.walk(path, processed.segments, pattern);
  }

  private matchStatic(path: string, processed: ProcessedPath, pattern: CompiledPattern, staticKey: string): MatchResult {
    if (processed.segments.length !== pattern.segments.length) {
      return noMatch(path, pattern.source);
    }
    const candidate = pattern.caseInsensitive ? processed.normalized.toLowerCase() : processed.normalized;
    if (candidate !== staticKey) {
      return noMatch(path, pattern.source);
    }
    return matchSuccess(path, pattern.source, processed.segments, Object.create(null), []);
  }

  private walk(path: string, components: ReadonlyArray<string>, pattern: CompiledPattern): MatchResult {
    const segments = pattern.segments;
    const total = components.length;
    const stack: MatchFrame[] = [];
    const bindings: Array<Record<string, string>> = [];
    const captures: string[] = [];

    let segmentIndex = 0;
    let pathIndex = 0;

    for (;;) {
      let advanced = false;

      if (segmentIndex === segments.length) {
        if (pathIndex === total) {
          return matchSuccess(path, pattern.source, components, toVariables(bindings), captures);
        }
      } else {
        const segment = segments[segmentIndex];

        if (segment === undefined) {
          break;
        }

        if (segment.kind === SegmentKind.Wildcard && segment.multiSegment) {
          const lastEnd = total - (segments.length - segmentIndex - 1);

          if (segmentIndex === segments.length - 1) {
            if (pathIndex < total) {
              captures.push(components.slice(pathIndex).join(PATH_SEPARATOR));
              return matchSuccess(path, pattern.source, components, toVariables(bindings), captures);
            }
          } else if (pathIndex + 1 <= lastEnd) {
            stack.push({
              segmentIndex,
              pathIndex,
              nextEnd: pathIndex + 2,
              lastEnd,
              bindingBase: bindings.length,
              captureBase: captures.length,
            });
            captures.push(components.slice(pathIndex, pathIndex + 1).join(PATH_SEPARATOR));
            segmentIndex++;
            pathIndex++;
            advanced = true;
          }
        } else {
          const component = components[pathIndex];

          if (component !== undefined && segmentMatches(segment, component, pattern.caseInsensitive)) {
            if (segment.kind === SegmentKind.Variable) {
              bindings.push(extractSegmentVariables(segment, component));
            } else if (segment.kind === SegmentKind.Wildcard) {
              captures.push(component);
            }
            segmentIndex++;
            pathIndex++;
            advanced = true;
          }
        }
      }

      if (advanced) {
        continue;
      }

      const frame = this.resume(stack);
      if (!frame) {
        break;
      }

      const end = frame.nextEnd;
      frame.nextEnd++;
      bindings.length = frame.bindingBase;
      captures.length = frame.captureBase;
      captures.push(components.slice(frame.pathIndex, end).join(PATH_SEPARATOR));
      segmentIndex = frame.segmentIndex + 1;
      pathIndex = end;
    }

    return noMatch(path, pattern.source);
  }

  /**
   * Top choice point that still has a span left to try; exhausted frames are discarded.
   */
  private resume(stack: MatchFrame[]): MatchFrame | undefined {
    for (;;) {
      const frame = stack[stack.length - 1];
      if (!frame) {
        return undefined;
      }
      if (frame.nextEnd <= frame.lastEnd) {
        return frame;
      }
      stack.pop();
    }
  }
}

/**
 * Stable precedence order: static first, fewer `**`, higher rank, then input order.
 */
export function orderByPrecedence(patterns: ReadonlyArray<CompiledPattern>): CompiledPattern[] {
  return patterns
    .map((pattern, index) => ({ pattern, index }))
    .sort((a, b) => {
      if (a.pattern.isStatic !== b.pattern.isStatic) {
        return a.pattern.isStatic ? -1 : 1;
      }
      if (a.pattern.multiWildcardCount !== b.pattern.multiWildcardCount) {
        return a.pattern.multiWildcardCount - b.pattern.multiWildcardCount;
      }
      if (a.pattern.specificityRank !== b.pattern.specificityRank) {
        return b.pattern.specificityRank - a.pattern.specificityRank;
      }
      return a.index - b.index;
    })
    .map(entry => entry.pattern);
}

function toVariables(bindings: ReadonlyArray<Record<string, string>>): Record<string, string> {
  const variables: Record<string, string> = Object.create(null);
  for (const binding of bindings) {
    Object.assign(variables, binding);
  }
  return variables;
}
