/**
 * Config Module
 *
 * Re-exports everything from the loader for clean imports:
 *   import { loadConfig, DEFAULT_CONFIG } from './config/index.js';
 */

export {
  loadConfig,
  loadJsoncFile,
  loadEnvConfig,
  getConfigPaths,
  mergeConfig,
  ConfigOverridesSchema,
  DEFAULT_CONFIG,
} from './loader.js';
export type { ConfigOverrides } from './loader.js';
