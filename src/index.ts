export * from './physics';
export * from './utils/units';
export { findRoot, RootFindingError } from './core/math';
export type { RootFinderOptions, RootResult, RootFindingFailure } from './core/math';
