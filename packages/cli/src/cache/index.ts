/**
 * Cache - Public API
 */

export {
  type CacheEnvironment,
  currentEnvironment,
  getCacheDirectory,
} from "./directory.js";
export {
  type CachedGenerateOptions,
  type CacheOutcome,
  runCachedGenerate,
} from "./gate.js";
