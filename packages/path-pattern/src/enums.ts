export enum SegmentKind {
  Literal = 'literal',
  Variable = 'variable',
  Wildcard = 'wildcard',
}

export enum InvalidPatternReason {
  MissingLeadingSeparator = 'missing-leading-separator',
  DoubleSeparator = 'double-separator',
  NestedBrace = 'nested-brace',
  UnmatchedOpeningBrace = 'unmatched-opening-brace',
  UnmatchedClosingBrace = 'unmatched-closing-brace',
  PartialVariable = 'partial-variable',
  EmptyVariableName = 'empty-variable-name',
  InvalidVariableName = 'invalid-variable-name',
  DuplicateVariableName = 'duplicate-variable-name',
  EmptyConstraint = 'empty-constraint',
  InvalidConstraint = 'invalid-constraint',
  UnsafeConstraint = 'unsafe-constraint',
  DanglingEscape = 'dangling-escape',
  UnescapedWildcard = 'unescaped-wildcard',
  TooManySegments = 'too-many-segments',
}

export enum CachePolicy {
  Lru = 'lru',
  Reject = 'reject',
}
