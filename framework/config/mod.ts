/**
 * Configuration
 */

export {
  Config,
  loadConfig,
  configFromEnv,
  type ConfigOptions,
  type ConfigRecord,
} from './config.ts';
