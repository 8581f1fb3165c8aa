export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  CONFIG_ENV_VAR,
  MONGODB_URI_ENV_VAR,
  type ResolveConfigOptions,
  type ResolvedConfig,
} from './loader.js';
export { validateConfig, type PartialBookScanConfig } from './validator.js';
export { resolvePaths, ensureDirectories, type ResolvedPaths } from './paths.js';
