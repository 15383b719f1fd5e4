export type {
  CheckerConfig,
  CheckerConfigInput,
  LoadCheckerConfigOptions,
} from './CheckerConfig.js';
export {
  CheckerConfigDefaults,
  loadCheckerConfig,
  defaultConfig,
  validateCheckerConfig,
  readConfigFile,
  rangeOf,
  controllerBaseUrl,
} from './CheckerConfig.js';
