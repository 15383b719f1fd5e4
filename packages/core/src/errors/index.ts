export type { CheckerErrorKind } from './CheckerError.js';
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
} from './CheckerError.js';
