/**
 * Error Handling
 *
 * Error classes and AWS error mapping for EC2 history runs.
 */

export { HistoryError } from './error.js';

export {
  ConfigurationError,
  InvalidWindowError,
  InvalidRegionError,
  MalformedRecordError,
  RegionFetchError,
  RegionTimeoutError,
  RunCancelledError,
  ThrottlingError,
  AccessDeniedError,
  ServiceError,
} from './categories.js';

export { mapAwsError } from './mapper.js';
