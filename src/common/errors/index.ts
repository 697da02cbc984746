export { SystemError } from './system-error';
export { PlatformApiError, PLATFORM_ERROR_CODES } from './platform-api-error';
export {
  SystemHealthError,
  SYSTEM_HEALTH_ERROR_CODES,
} from './system-health-error';
export { ConfigValidationError } from './config-validation-error';
export { EXECUTION_ERROR_CODES } from './execution-error-codes';
