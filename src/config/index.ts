export { ConfigManager, ConfigError, createDefaultConfig } from './manager.js';
export {
  formatValidationErrors,
  parseConfig,
  readConfig,
  validateConfig,
  type ValidationError,
  type ValidationResult,
} from './schema.js';
