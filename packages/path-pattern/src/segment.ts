import { MULTI_WILDCARD, SEGMENT_WEIGHT, SINGLE_WILDCARD } from './constants';
import { SegmentKind } from './enums';
import { buildConstraintTester, compileConstraint, type ConstraintTester } from './pattern-tester';
import { escape } from './utils/path-utils';

export interface LiteralSegment {
  readonly kind: SegmentKind.Literal;
  readonly value: string;
  /** Lower-cased value, compared against folded components when matching case-insensitively. */
  readonly folded: string;
}

export interface VariableSegment {
  readonly kind: SegmentKind.Variable;
  readonly name: string;
  readonly constraint?: RegExp;
  readonly constraintSource?: string;
  readonly test?: ConstraintTester;
}

export interface WildcardSegment {
  readonly kind: SegmentKind.Wildcard;
  readonly multiSegment: boolean;
}

export type Segment = LiteralSegment | VariableSegment | WildcardSegment;

export function literalSegment(value: string): LiteralSegment {
  const segment: LiteralSegment = { kind: SegmentKind.Literal, value, folded: value.toLowerCase() };
  return Object.freeze(segment);
}

/**
 * Builds a variable segment. The constraint body is compiled here, once, and never per match.
 * Throws the `SyntaxError` of `RegExp` when the body does not compile.
 */
export function variableSegment(name: string, constraintSource?: string): VariableSegment {
  if (constraintSource === undefined) {
    const segment: VariableSegment = { kind: SegmentKind.Variable, name };
    return Object.freeze(segment);
  }
  const constraint = compileConstraint(constraintSource);
  const segment: VariableSegment = {
    kind: SegmentKind.Variable,
    name,
    constraint,
    constraintSource,
    test: buildConstraintTester(constraintSource, constraint),
  };
  return Object.freeze(segment);
}

const SINGLE_WILDCARD_SEGMENT: WildcardSegment = Object.freeze<WildcardSegment>({ kind: SegmentKind.Wildcard, multiSegment: false });
const MULTI_WILDCARD_SEGMENT: WildcardSegment = Object.freeze<WildcardSegment>({ kind: SegmentKind.Wildcard, multiSegment: true });

export function wildcardSegment(multiSegment: boolean): WildcardSegment {
  return multiSegment ? MULTI_WILDCARD_SEGMENT : SINGLE_WILDCARD_SEGMENT;
}

export function isMultiWildcard(segment: Segment): boolean {
  return segment.kind === SegmentKind.Wildcard && segment.multiSegment;
}

/**
 * Tests a single path component against a segment.
 * A multi-segment wildcard accepts any one component here; spans are the matcher's concern.
 */
export function segmentMatches(segment: Segment, component: string, caseInsensitive: boolean): boolean {
  switch (segment.kind) {
    case SegmentKind.Literal:
      return caseInsensitive ? segment.folded === component.toLowerCase() : segment.value === component;
    case SegmentKind.Variable:
      if (component.length === 0) {
        return false;
      }
      return segment.test ? segment.test(component) : true;
    case SegmentKind.Wildcard:
      return true;
    default:
      return assertNever(segment);
  }
}

export function extractSegmentVariables(segment: Segment, component: string): Record<string, string> {
  return segment.kind === SegmentKind.Variable ? { [segment.name]: component } : {};
}

export function formatSegment(segment: Segment): string {
  switch (segment.kind) {
    case SegmentKind.Literal:
      return escape(segment.value);
    case SegmentKind.Variable:
      return segment.constraintSource === undefined ? `{${segment.name}}` : `{${segment.name}:${segment.constraintSource}}`;
    case SegmentKind.Wildcard:
      return segment.multiSegment ? MULTI_WILDCARD : SINGLE_WILDCARD;
    default:
      return assertNever(segment);
  }
}

export function segmentWeight(segment: Segment): number {
  switch (segment.kind) {
    case SegmentKind.Literal:
      return SEGMENT_WEIGHT.literal;
    case SegmentKind.Variable:
      return segment.constraint ? SEGMENT_WEIGHT.constrainedVariable : SEGMENT_WEIGHT.variable;
    case SegmentKind.Wildcard:
      return segment.multiSegment ? SEGMENT_WEIGHT.multiWildcard : SEGMENT_WEIGHT.wildcard;
    default:
      return assertNever(segment);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled segment: ${JSON.stringify(value)}`);
}
