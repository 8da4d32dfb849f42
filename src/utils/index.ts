export { createLogger, configureLogging, LOG_LEVELS, type LogLevel, type LoggerOptions } from './logger.js';
export {
  ScanError,
  InvalidSpecError,
  InvalidPortSpecError,
  LookupFailureError,
  classifyProbeError,
  errorMessage,
  type ScanErrorCode,
} from './errors.js';
