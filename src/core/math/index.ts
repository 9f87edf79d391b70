export { findRoot, RootFindingError, DEFAULT_ROOT_FINDER_OPTIONS } from './RootFinder';
export type { RootFinderOptions, RootResult, RootFindingFailure } from './RootFinder';
