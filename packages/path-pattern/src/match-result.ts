export interface MatchResult {
  readonly matched: boolean;
  readonly variables: Readonly<Record<string, string>>;
  /** Path components the match consumed, in order. Empty on a failed match. */
  readonly matchedSegments: ReadonlyArray<string>;
  /** Text captured by each wildcard segment in pattern order; `**` captures are joined with `/`. */
  readonly wildcards: ReadonlyArray<string>;
  readonly path: string;
  readonly pattern: string;
}

const EMPTY_VARIABLES: Readonly<Record<string, string>> = Object.freeze({});
const EMPTY_LIST: ReadonlyArray<string> = Object.freeze([]);

export function noMatch(path: string, pattern: string): MatchResult {
  const result: MatchResult = {
    matched: false,
    variables: EMPTY_VARIABLES,
    matchedSegments: EMPTY_LIST,
    wildcards: EMPTY_LIST,
    path,
    pattern,
  };
  return Object.freeze(result);
}

export function matchSuccess(
  path: string,
  pattern: string,
  matchedSegments: ReadonlyArray<string>,
  variables: Record<string, string>,
  wildcards: ReadonlyArray<string>,
): MatchResult {
  const result: MatchResult = {
    matched: true,
    variables: Object.freeze(variables),
    matchedSegments: Object.freeze([...matchedSegments]),
    wildcards: Object.freeze([...wildcards]),
    path,
    pattern,
  };
  return Object.freeze(result);
}

export function getVariable(result: MatchResult, name: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(result.variables, name) ? result.variables[name] : undefined;
}
