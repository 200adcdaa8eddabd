/**
 * Validation orchestrator
 *
 * extract → safety → structure → report. A missing code block or a safety
 * violation ends the pipeline early; structure findings are merged in full.
 */

import { logger } from "../lib/logger.js";

import { extractCode } from "./extractor.js";
import { SafetyScreener } from "./safety.js";
import { checkStructure, JUNIT5_CONVENTION } from "./structure.js";

import type {
  DangerPattern,
  StructureConvention,
  ValidateOptions,
  ValidationReport,
} from "./types.js";

const log = logger.child("[validate]");

export const NO_CODE_BLOCK_ERROR = "No ```java code block found";

export interface TestValidatorOptions {
  /** Danger patterns for the safety screen (defaults to the built-in list) */
  dangerPatterns?: readonly DangerPattern[];
  /** Structural markers (defaults to JUnit 5) */
  convention?: StructureConvention;
}

/**
 * Validates raw model output as a JUnit 5 test file
 *
 * @example
 * ```typescript
 * const validator = new TestValidator();
 * const report = validator.validate(modelReply, "Calculator");
 *
 * if (report.valid) {
 *   writeFileSync("CalculatorTest.java", report.cleanCode);
 * }
 * ```
 */
export class TestValidator {
  private readonly screener: SafetyScreener;
  private readonly convention: StructureConvention;

  constructor(options: TestValidatorOptions = {}) {
    this.screener = new SafetyScreener(options.dangerPatterns);
    this.convention = options.convention ?? JUNIT5_CONVENTION;
  }

  /**
   * Run the base pipeline. Warnings never affect `valid` here.
   */
  validate(rawOutput: string, targetClassName?: string): ValidationReport {
    const code = extractCode(rawOutput);
    if (!code) {
      return buildReport("", [NO_CODE_BLOCK_ERROR], [], []);
    }

    const safety = this.screener.check(code);
    if (!safety.safe) {
      return buildReport(code, safety.reasons, [], []);
    }

    const findings = checkStructure(code, targetClassName, this.convention);
    return buildReport(code, findings.errors, findings.warnings, findings.suggestions);
  }
}

function buildReport(
  cleanCode: string,
  errors: readonly string[],
  warnings: readonly string[],
  suggestions: readonly string[]
): ValidationReport {
  return {
    valid: errors.length === 0,
    cleanCode,
    errors: [...errors],
    warnings: [...warnings],
    suggestions: [...suggestions],
  };
}

/**
 * Fold warnings into errors. Returns a new report; `cleanCode` is kept.
 */
export function applyStrictMode(report: ValidationReport): ValidationReport {
  if (report.warnings.length === 0) {
    return report;
  }

  return {
    ...report,
    valid: false,
    errors: [...report.errors, ...report.warnings],
  };
}

const defaultValidator = new TestValidator();

/**
 * Validate raw model output, strict by default.
 *
 * In strict mode any warning makes the report invalid and is appended to
 * the error list.
 */
export function validateTest(
  rawOutput: string,
  options: ValidateOptions = {},
  validator: TestValidator = defaultValidator
): ValidationReport {
  const strict = options.strict ?? true;
  const base = validator.validate(rawOutput, options.targetClassName);
  const report = strict ? applyStrictMode(base) : base;

  log.debug(
    `valid=${report.valid} errors=${report.errors.length} warnings=${report.warnings.length} suggestions=${report.suggestions.length} strict=${strict}`
  );

  return report;
}
