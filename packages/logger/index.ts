export * from './src/logger';
export * from './src/interfaces';
export type * from './src/types';
