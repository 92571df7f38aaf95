export type ConstraintTester = (value: string) => boolean;

const DIGIT_PATTERNS = new Set(['\\d+', '[0-9]+']);
const ALPHA_PATTERNS = new Set(['[a-zA-Z]+', '[A-Za-z]+']);
const ALPHANUM_DASH_PATTERNS = new Set(['[A-Za-z0-9_\\-]+', '[A-Za-z0-9_-]+', '[a-zA-Z0-9_-]+']);
const WORD_PATTERNS = new Set(['\\w+', '[A-Za-z0-9_]+', '[a-zA-Z0-9_]+']);

/**
 * Compiles a constraint body into an anchored, full-match regular expression.
 */
export function compileConstraint(source: string): RegExp {
  return new RegExp(`^(?:${source})$`);
}

/**
 * Returns a tester for a constraint body. Common bodies skip the regex engine entirely.
 */
export function buildConstraintTester(source: string, compiled: RegExp): ConstraintTester {
  if (DIGIT_PATTERNS.has(source)) {
    return isAllDigits;
  }
  if (ALPHA_PATTERNS.has(source)) {
    return isAlpha;
  }
  if (ALPHANUM_DASH_PATTERNS.has(source)) {
    return value => isAlphaNumeric(value, true);
  }
  if (WORD_PATTERNS.has(source)) {
    return value => isAlphaNumeric(value, false);
  }
  if (source === '[^/]+') {
    return value => value.length > 0 && value.indexOf('/') === -1;
  }
  return value => compiled.test(value);
}

function isAllDigits(value: string): boolean {
  if (!value.length) {
    return false;
  }
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (code < 48 || code > 57) {
      return false;
    }
  }
  return true;
}

function isAlpha(value: string): boolean {
  if (!value.length) {
    return false;
  }
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    const upper = code >= 65 && code <= 90;
    const lower = code >= 97 && code <= 122;
    if (!upper && !lower) {
      return false;
    }
  }
  return true;
}

function isAlphaNumeric(value: string, allowDash: boolean): boolean {
  if (!value.length) {
    return false;
  }
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    const upper = code >= 65 && code <= 90;
    const lower = code >= 97 && code <= 122;
    const digit = code >= 48 && code <= 57;
    if (!upper && !lower && !digit && code !== 95 && !(allowDash && code === 45)) {
      return false;
    }
  }
  return true;
}
