export { resolvePaths, getBaseName } from './path-resolver.js';
export type {
  OutputResolution,
  PathResolverInput,
  PathResolverOptions,
  ResolvedPaths,
} from './path-resolver.js';
