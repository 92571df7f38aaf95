import type { ParserConfiguration } from './configuration';

export enum ConstraintHazard {
  TooLong = 'too-long',
  Backreference = 'backreference',
  NestedQuantifier = 'nested-quantifier',
}

export type ConstraintAssessment = { safe: true } | { safe: false; hazard: ConstraintHazard; reason: string };

const BACKREFERENCE = /\\(?:[1-9]|k<)/;

/**
 * Screens a variable constraint body for shapes known to backtrack badly before it is compiled.
 */
export function assessConstraint(
  source: string,
  config: Pick<ParserConfiguration, 'maxConstraintLength'>,
): ConstraintAssessment {
  if (source.length > config.maxConstraintLength) {
    return {
      safe: false,
      hazard: ConstraintHazard.TooLong,
      reason: `Constraint length ${source.length} exceeds limit ${config.maxConstraintLength}`,
    };
  }
  if (BACKREFERENCE.test(source)) {
    return { safe: false, hazard: ConstraintHazard.Backreference, reason: 'Backreferences are not allowed in constraints' };
  }
  if (hasNestedQuantifier(source)) {
    return { safe: false, hazard: ConstraintHazard.NestedQuantifier, reason: 'Nested unlimited quantifiers detected' };
  }
  return { safe: true };
}

/**
 * Whether a group holding an unbounded `+` or `*` is itself repeated, as in `(a+)+`.
 */
function hasNestedQuantifier(source: string): boolean {
  // One flag per open group: does it repeat something without bound?
  const groups: boolean[] = [];

  for (let i = 0; i < source.length; i++) {
    const char = source[i];

    if (char === '\\') {
      i++;
    } else if (char === '[') {
      i = skipClass(source, i);
    } else if (char === '(') {
      groups.push(false);
    } else if (char === ')') {
      const repeats = groups.pop() ?? false;
      const next = source[i + 1];
      if (repeats && (next === '+' || next === '*' || next === '{')) {
        return true;
      }
      if (repeats && groups.length > 0) {
        groups[groups.length - 1] = true;
      }
    } else if ((char === '+' || char === '*') && groups.length > 0) {
      groups[groups.length - 1] = true;
    }
  }

  return false;
}

function skipClass(source: string, open: number): number {
  for (let i = open + 1; i < source.length; i++) {
    if (source[i] === '\\') {
      i++;
    } else if (source[i] === ']') {
      return i;
    }
  }
  return source.length;
}
