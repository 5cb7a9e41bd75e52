/**
 * lexibloom Configuration
 */

export {
  DEFAULT_CONFIG,
  defineConfig,
  configFromEnv,
  resolveConfig,
  toSetOptions,
  applyLogging,
  type LexiBloomConfig,
  type Env,
} from './loader'
