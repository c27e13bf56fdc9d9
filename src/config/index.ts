/**
 * Quire — Configuration Module
 */

export {
  SourceConfigSchema,
  QuireConfigSchema,
  RuntimeSettingsSchema,
  type SourceConfig,
  type QuireConfig,
} from './schema';

export {
  defaultConfigPath,
  initWithExample,
  loadConfig,
  loadRuntimeSettings,
  parseConfig,
  type RuntimeSettings,
} from './loader';
