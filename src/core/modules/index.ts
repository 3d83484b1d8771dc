export {
  canonicalize,
  resolveRelative,
  moduleFileCandidates,
  rootRelativeFileCandidates,
  INVALID_TARGET,
  SOURCE_EXTENSION,
  PACKAGE_INIT,
} from './resolver.js';
export type { CanonicalizeOptions } from './resolver.js';
