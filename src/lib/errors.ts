import type { ValidationReport } from "../validation/types.js";

/**
 * Base error class for all testsmith errors
 */
export class TestsmithError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "TestsmithError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or CLI JSON output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error for schema validation failures (config, templates, requests)
 */
export class ValidationError extends TestsmithError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends TestsmithError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * Error during test generation, before the model reply is validated
 */
export class GenerationError extends TestsmithError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "GENERATION_ERROR", context);
    this.name = "GenerationError";
  }
}

/**
 * Raised when the model reply fails validation.
 *
 * `issues` holds the final error list of the report (warnings included when
 * strict mode folded them in). The full report rides along in `report`.
 */
export class GenerationValidationError extends TestsmithError {
  constructor(
    public readonly issues: readonly string[],
    public readonly report?: ValidationReport
  ) {
    super(`Test generation failed: ${issues.join(", ")}`, "GENERATION_VALIDATION_ERROR", {
      issues: [...issues],
    });
    this.name = "GenerationValidationError";
  }
}

/**
 * Error returned by a model provider (HTTP failure, missing key, bad payload)
 */
export class ModelServiceError extends TestsmithError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "MODEL_SERVICE_ERROR", context);
    this.name = "ModelServiceError";
  }
}

/**
 * Model provider call exceeded its time budget
 */
export class ModelTimeoutError extends TestsmithError {
  constructor(public readonly timeoutMs: number, context?: Record<string, unknown>) {
    super(`Model request timed out after ${timeoutMs}ms`, "MODEL_TIMEOUT", { ...context, timeoutMs });
    this.name = "ModelTimeoutError";
  }
}
