// Error classes
export {
  TestsmithError,
  ValidationError,
  ConfigError,
  GenerationError,
  GenerationValidationError,
  ModelServiceError,
  ModelTimeoutError,
} from "./errors.js";

// Result type and utilities
export {
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  all,
  tryCatch,
  tryCatchAsync,
} from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger, Logger, isLogLevel } from "./logger.js";
export type { LogLevel } from "./logger.js";
