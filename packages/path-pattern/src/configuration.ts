import { z } from 'zod';

import { DEFAULT_CACHE_CAPACITY, DEFAULT_CONSTRAINT_MAX_LENGTH, DEFAULT_MAX_SEGMENTS, MAX_SEGMENTS_LIMIT } from './constants';
import { CachePolicy } from './enums';

const envFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

export const parserConfigurationSchema = z
  .object({
    caseInsensitive: z.boolean().default(false),
    optionalTrailingSlash: z.boolean().default(false),
    // Stricter compile-time validation; see PatternCompiler.
    strict: z.boolean().default(false),
    maxSegments: z.number().int().positive().max(MAX_SEGMENTS_LIMIT).default(DEFAULT_MAX_SEGMENTS),
    maxConstraintLength: z.number().int().positive().default(DEFAULT_CONSTRAINT_MAX_LENGTH),
    cacheCapacity: z.number().int().nonnegative().default(DEFAULT_CACHE_CAPACITY),
    cachePolicy: z.nativeEnum(CachePolicy).default(CachePolicy.Lru),
  })
  .strict();

export type ParserConfiguration = Readonly<z.output<typeof parserConfigurationSchema>>;

export type ParserConfigurationInput = z.input<typeof parserConfigurationSchema>;

export const DEFAULT_PARSER_CONFIGURATION: ParserConfiguration = Object.freeze(parserConfigurationSchema.parse({}));

/**
 * Validates a partial configuration and fills in the defaults. Throws a `ZodError` on bad input.
 */
export function resolveParserConfiguration(input: ParserConfigurationInput = {}): ParserConfiguration {
  return Object.freeze(parserConfigurationSchema.parse(input));
}

export function withConfiguration(base: ParserConfiguration, patch: ParserConfigurationInput): ParserConfiguration {
  return resolveParserConfiguration({ ...base, ...patch });
}

const envSchema = z.object({
  PATHMATCH_CASE_INSENSITIVE: envFlag.optional(),
  PATHMATCH_OPTIONAL_TRAILING_SLASH: envFlag.optional(),
  PATHMATCH_STRICT: envFlag.optional(),
  PATHMATCH_MAX_SEGMENTS: z.coerce.number().int().positive().optional(),
  PATHMATCH_MAX_CONSTRAINT_LENGTH: z.coerce.number().int().positive().optional(),
  PATHMATCH_CACHE_CAPACITY: z.coerce.number().int().nonnegative().optional(),
  PATHMATCH_CACHE_POLICY: z.nativeEnum(CachePolicy).optional(),
});

/**
 * Reads a configuration from `PATHMATCH_*` variables. Unset variables keep their defaults.
 */
export function readParserConfiguration(source: Record<string, string | undefined>): ParserConfiguration {
  const env = envSchema.parse({
    PATHMATCH_CASE_INSENSITIVE: source.PATHMATCH_CASE_INSENSITIVE,
    PATHMATCH_OPTIONAL_TRAILING_SLASH: source.PATHMATCH_OPTIONAL_TRAILING_SLASH,
    PATHMATCH_STRICT: source.PATHMATCH_STRICT,
    PATHMATCH_MAX_SEGMENTS: source.PATHMATCH_MAX_SEGMENTS,
    PATHMATCH_MAX_CONSTRAINT_LENGTH: source.PATHMATCH_MAX_CONSTRAINT_LENGTH,
    PATHMATCH_CACHE_CAPACITY: source.PATHMATCH_CACHE_CAPACITY,
    PATHMATCH_CACHE_POLICY: source.PATHMATCH_CACHE_POLICY,
  });

  return resolveParserConfiguration({
    caseInsensitive: env.PATHMATCH_CASE_INSENSITIVE,
    optionalTrailingSlash: env.PATHMATCH_OPTIONAL_TRAILING_SLASH,
    strict: env.PATHMATCH_STRICT,
    maxSegments: env.PATHMATCH_MAX_SEGMENTS,
    maxConstraintLength: env.PATHMATCH_MAX_CONSTRAINT_LENGTH,
    cacheCapacity: env.PATHMATCH_CACHE_CAPACITY,
    cachePolicy: env.PATHMATCH_CACHE_POLICY,
  });
}
