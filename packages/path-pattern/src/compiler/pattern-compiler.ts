import { Logger } from '@pathmatch/logger';

import { BoundedCache, type CacheStats } from '../cache/bounded-cache';
import { createCompiledPattern, type CompiledPattern } from '../compiled-pattern';
import { DEFAULT_PARSER_CONFIGURATION, type ParserConfiguration } from '../configuration';
import { MULTI_WILDCARD, SINGLE_WILDCARD, VARIABLE_NAME_PATTERN } from '../constants';
import { InvalidPatternReason, SegmentKind } from '../enums';
import { InvalidPatternError } from '../errors/errors';
import { assessConstraint } from '../constraint-guard';
import { literalSegment, variableSegment, wildcardSegment, type Segment, type VariableSegment } from '../segment';

import { findUnescaped, tokenizePattern, unescapeLiteral, type RawSegment } from './pattern-tokenizer';

/**
 * Validates pattern strings and turns them into immutable {@link CompiledPattern}s.
 * Results are cached by the trimmed pattern text; failures are never cached.
 */
export class PatternCompiler {
  private readonly logger = new Logger(PatternCompiler);
  private readonly config: ParserConfiguration;
  private readonly cache: BoundedCache<string, CompiledPattern>;

  constructor(config: ParserConfiguration = DEFAULT_PARSER_CONFIGURATION) {
    this.config = config;
    this.cache = new BoundedCache(config.cacheCapacity, config.cachePolicy);
  }

  get configuration(): ParserConfiguration {
    return this.config;
  }

  get size(): number {
    return this.cache.size;
  }

  compile(pattern: string): CompiledPattern {
    const source = pattern.trim();
    const cached = this.cache.get(source);
    if (cached) {
      return cached;
    }

    const compiled = this.build(source);
    this.cache.set(source, compiled);

    this.logger.debug('Compiled pattern', {
      pattern: source,
      segments: compiled.segments.length,
      rank: compiled.specificityRank,
    });

    return compiled;
  }

  /**
   * Variable names declared by a pattern, or an empty set when the pattern is invalid.
   */
  extractVariables(pattern: string): Set<string> {
    try {
      return new Set(this.compile(pattern).variableNames);
    } catch (error) {
      if (error instanceof InvalidPatternError) {
        return new Set();
      }
      throw error;
    }
  }

  clear(): void {
    this.cache.clear();
  }

  stats(): CacheStats {
    return this.cache.stats();
  }

  private build(source: string): CompiledPattern {
    const { segments: raw, trailingSlash } = tokenizePattern(source);

    if (raw.length > this.config.maxSegments) {
      throw new InvalidPatternError(
        InvalidPatternReason.TooManySegments,
        `Pattern has ${raw.length} segments, the limit is ${this.config.maxSegments}`,
        source,
      );
    }

    const segments: Segment[] = [];
    const names = new Set<string>();

    for (const part of raw) {
      const segment = this.classify(source, part);
      if (segment.kind === SegmentKind.Variable) {
        if (names.has(segment.name) && this.config.strict) {
          throw new InvalidPatternError(
            InvalidPatternReason.DuplicateVariableName,
            `Variable '${segment.name}' is declared more than once`,
            source,
            part.offset,
          );
        }
        names.add(segment.name);
      }
      segments.push(segment);
    }

    return createCompiledPattern(source, segments, {
      caseInsensitive: this.config.caseInsensitive,
      optionalTrailingSlash: this.config.optionalTrailingSlash,
      trailingSlash,
    });
  }

  private classify(source: string, part: RawSegment): Segment {
    const { text, offset } = part;

    if (text === MULTI_WILDCARD) {
      return wildcardSegment(true);
    }
    if (text === SINGLE_WILDCARD) {
      return wildcardSegment(false);
    }

    const braces = findUnescaped(text, '{}');
    if (braces.length > 0) {
      const [open, close] = braces;
      if (braces.length !== 2 || open !== 0 || close !== text.length - 1) {
        throw new InvalidPatternError(
          InvalidPatternReason.PartialVariable,
          'A variable must span the whole segment',
          source,
          offset + (open ?? 0),
        );
      }
      return this.parseVariable(source, text.slice(1, -1), offset);
    }

    if (this.config.strict) {
      const stars = findUnescaped(text, '*');
      const [star] = stars;
      if (star !== undefined) {
        throw new InvalidPatternError(
          InvalidPatternReason.UnescapedWildcard,
          `Unescaped '*' inside literal segment '${text}'`,
          source,
          offset + star,
        );
      }
    }

    return literalSegment(unescapeLiteral(text));
  }

  private parseVariable(source: string, body: string, offset: number): VariableSegment {
    const colon = body.indexOf(':');
    const name = (colon === -1 ? body : body.slice(0, colon)).trim();

    if (!name) {
      throw new InvalidPatternError(InvalidPatternReason.EmptyVariableName, 'Variable name must not be empty', source, offset);
    }
    if (!VARIABLE_NAME_PATTERN.test(name)) {
      throw new InvalidPatternError(InvalidPatternReason.InvalidVariableName, `Invalid variable name '${name}'`, source, offset);
    }
    if (colon === -1) {
      return variableSegment(name);
    }

    const constraint = body.slice(colon + 1).trim();
    if (!constraint) {
      throw new InvalidPatternError(
        InvalidPatternReason.EmptyConstraint,
        `Variable '${name}' has an empty constraint`,
        source,
        offset + colon + 2,
      );
    }

    const assessment = assessConstraint(constraint, this.config);
    if (!assessment.safe) {
      if (this.config.strict) {
        throw new InvalidPatternError(
          InvalidPatternReason.UnsafeConstraint,
          `Unsafe constraint for '${name}': ${assessment.reason}`,
          source,
          offset + colon + 2,
        );
      }
      this.logger.warn('Constraint may backtrack heavily', {
        pattern: source,
        variable: name,
        hazard: assessment.hazard,
        reason: assessment.reason,
      });
    }

    try {
      return variableSegment(name, constraint);
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new InvalidPatternError(
          InvalidPatternReason.InvalidConstraint,
          `Invalid constraint for '${name}': ${error.message}`,
          source,
          offset + colon + 2,
        );
      }
      throw error;
    }
  }
}
