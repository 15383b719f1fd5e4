/**
 * @vlan-range-checker/core
 *
 * Controller client and VLAN range analysis for VLAN Range Checker
 */

// Types
export type {
  Device,
  RawVlan,
  VlanEntry,
  VlanRange,
  FindingSet,
  CheckResult,
  RangeUsage,
} from './types/index.js';
export { toDevice, deviceLabel, toRawVlan } from './types/index.js';

// Errors
export type { CheckerErrorKind } from './errors/index.js';
export {
  CheckerError,
  ConfigError,
  AuthError,
  EnumerationError,
  FetchError,
  ParseError,
  CancelledError,
  isCheckerError,
  describeError,
} from './errors/index.js';

// Logging
export type { Logger } from './logging/index.js';
export { silentLogger } from './logging/index.js';

// Configuration
export type {
  CheckerConfig,
  CheckerConfigInput,
  LoadCheckerConfigOptions,
} from './config/index.js';
export {
  CheckerConfigDefaults,
  loadCheckerConfig,
  defaultConfig,
  validateCheckerConfig,
  readConfigFile,
  rangeOf,
  controllerBaseUrl,
} from './config/index.js';

// Controller API
export type {
  NetworkController,
  RequestOptions,
  VlanFetchResult,
  ControllerClientOptions,
} from './controller/index.js';
export { ControllerClient } from './controller/index.js';

// Range checking
export type { VlanCheckerOptions } from './checker/index.js';
export {
  VlanChecker,
  isInRange,
  rangeIds,
  parseVlanNumber,
  filterVlansInRange,
  summarizeRange,
} from './checker/index.js';

// Reporting
export {
  formatBanner,
  formatReport,
  formatReportJson,
  formatIdList,
} from './report/index.js';
