/**
 * @pkmodel/core
 *
 * Validated values shared by every resource model: length-limited strings and
 * URLs, short ids and references, plus the error, result and logging types.
 */

// Results and validation
export type { Success, Failure, Result } from './validation';
export { ok, err, unwrap, validate, safeParse, refineWith } from './validation';

// Errors
export * from './errors';

// Length-limited values
export { LimitedStr, LimitedUrl, byteLength } from './limited';

// References
export type { GenericRef, SystemRef, Uuid, Snowflake } from './references';
export {
  ShortId,
  SHORT_ID_LENGTH,
  CURRENT_SYSTEM,
  CURRENT_SYSTEM_TOKEN,
  parseUuid,
  parseSnowflake,
  genericRefFromString,
  genericRefFromShortId,
  genericRefFromUuid,
  formatGenericRef,
  systemRefFromString,
  systemRefFromShortId,
  systemRefFromUuid,
  systemRefFromSnowflake,
  formatSystemRef,
} from './references';

// Logging
export type { Logger, LogMeta } from './logger';
export { SILENT_LOGGER, createLogger, createComponentLogger } from './logger';
export type { LoggerConfig, LogLevel, LogFormat } from './config/logger-config';
export { loadLoggerConfig, LOG_LEVELS, LOG_FORMATS } from './config/logger-config';
export { ConfigurationError } from './config/configuration-error';
