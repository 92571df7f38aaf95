import { Logger } from '@pathmatch/logger';

import { BoundedCache, type CacheStats } from './cache/bounded-cache';
import type { CompiledPattern } from './compiled-pattern';
import { PatternCompiler } from './compiler/pattern-compiler';
import {
  readParserConfiguration,
  resolveParserConfiguration,
  withConfiguration,
  type ParserConfiguration,
  type ParserConfigurationInput,
} from './configuration';
import { InvalidPatternError } from './errors/errors';
import type { MatchResult } from './match-result';
import { Matcher, type BestMatch } from './matcher/matcher';

export type PatternInput = string | CompiledPattern;

export interface ParserStats {
  patterns: CacheStats;
  matches: CacheStats;
}

/**
 * Entry point tying a configuration to its compiler, matcher and match-result cache.
 *
 * String patterns are compiled with the parser's configuration. Already compiled patterns are used
 * as they are, so their own case and trailing-slash flags apply.
 *
 * @example
 * const parser = new PathPatternParser({ caseInsensitive: true });
 * parser.match('/API/users/42', '/api/users/{id}').variables.id; // '42'
 */
export class PathPatternParser {
  private readonly logger = new Logger(PathPatternParser);
  private readonly matcher = new Matcher();
  private config: ParserConfiguration;
  private compiler: PatternCompiler;
  private matchCache: BoundedCache<string, MatchResult>;

  constructor(config: ParserConfigurationInput = {}) {
    this.config = resolveParserConfiguration(config);
    this.compiler = new PatternCompiler(this.config);
    this.matchCache = new BoundedCache(this.config.cacheCapacity, this.config.cachePolicy);
  }

  static fromEnv(env: Record<string, string | undefined> = process.env): PathPatternParser {
    return new PathPatternParser(readParserConfiguration(env));
  }

  compile(pattern: string): CompiledPattern {
    return this.compiler.compile(pattern);
  }

  parsePattern(pattern: string): CompiledPattern {
    return this.compile(pattern);
  }

  /**
   * Throws {@link InvalidPatternError} when a string pattern does not compile; never throws for
   * a path that does not match.
   */
  match(path: string, pattern: PatternInput): MatchResult {
    const compiled = this.resolve(pattern);
    const key = JSON.stringify([flagsOf(compiled), compiled.source, path]);

    return this.matchCache.getOrCreate(key, () => this.matcher.match(path, compiled));
  }

  matchBest(path: string, patterns: ReadonlyArray<PatternInput>): MatchResult {
    return this.matcher.matchBest(path, patterns.map(pattern => this.resolve(pattern)));
  }

  findBest(path: string, patterns: ReadonlyArray<PatternInput>): BestMatch | null {
    return this.matcher.findBest(path, patterns.map(pattern => this.resolve(pattern)));
  }

  /**
   * Like {@link match}, but an invalid pattern counts as a non-match.
   */
  matches(path: string, pattern: string): boolean {
    try {
      return this.match(path, pattern).matched;
    } catch (error) {
      if (error instanceof InvalidPatternError) {
        return false;
      }
      throw error;
    }
  }

  extractVariables(pattern: string): Set<string> {
    return this.compiler.extractVariables(pattern);
  }

  caseInsensitive(value: boolean): this {
    return this.reconfigure({ caseInsensitive: value });
  }

  optionalTrailingSlash(value: boolean): this {
    return this.reconfigure({ optionalTrailingSlash: value });
  }

  strict(value: boolean): this {
    return this.reconfigure({ strict: value });
  }

  getConfig(): ParserConfiguration {
    return this.config;
  }

  clearCaches(): void {
    this.compiler.clear();
    this.matchCache.clear();
  }

  stats(): ParserStats {
    return {
      patterns: this.compiler.stats(),
      matches: this.matchCache.stats(),
    };
  }

  private resolve(pattern: PatternInput): CompiledPattern {
    return typeof pattern === 'string' ? this.compiler.compile(pattern) : pattern;
  }

  private reconfigure(patch: ParserConfigurationInput): this {
    this.config = withConfiguration(this.config, patch);
    this.compiler = new PatternCompiler(this.config);
    this.matchCache = new BoundedCache(this.config.cacheCapacity, this.config.cachePolicy);

    this.logger.debug('Parser reconfigured', {
      caseInsensitive: this.config.caseInsensitive,
      optionalTrailingSlash: this.config.optionalTrailingSlash,
      strict: this.config.strict,
    });

    return this;
  }
}

function flagsOf(pattern: CompiledPattern): string {
  return `${pattern.caseInsensitive ? 'i' : '-'}${pattern.optionalTrailingSlash ? 't' : '-'}`;
}
