/**
 * Configuration module exports
 */

export { DEFAULT_CONFIG, deepMerge, isPlainObject, mergeLayers } from "./defaults";
export { ConfigError, loadProfile, parseConfigContent, parseExcludeList } from "./loader";
export { expandPath, resolvePath, resolvePaths } from "./resolver";
export { validateConfig } from "./validator";
