export const PATH_SEPARATOR = '/';

export const SINGLE_WILDCARD = '*';
export const MULTI_WILDCARD = '**';

export const VARIABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Per-segment weights summed into a pattern's specificity rank.
 * Literal > constrained variable > variable > `*` > `**`.
 */
export const SEGMENT_WEIGHT = {
  literal: 1000,
  constrainedVariable: 150,
  variable: 100,
  wildcard: 10,
  multiWildcard: 1,
} as const;

export const DEFAULT_MAX_SEGMENTS = 256;
export const MAX_SEGMENTS_LIMIT = 4096;
export const DEFAULT_CACHE_CAPACITY = 1000;

export const DEFAULT_CONSTRAINT_MAX_LENGTH = 256;
