export * from './src/enums';
export * from './src/constants';
export * from './src/errors/errors';
export * from './src/segment';
export * from './src/compiled-pattern';
export * from './src/match-result';
export * from './src/configuration';
export * from './src/cache/bounded-cache';
export * from './src/constraint-guard';
export * from './src/pattern-tester';
export * from './src/compiler/pattern-compiler';
export * from './src/processor/processor';
export type { ProcessedPath } from './src/processor/context';
export * from './src/matcher/matcher';
export * from './src/parser';
export * from './src/utils/path-utils';
