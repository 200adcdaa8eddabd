/**
 * Validation module
 *
 * Turns raw model output into a clean JUnit 5 test file or a list of
 * reasons why it cannot be used.
 */

export { extractCode } from "./extractor.js";
export { SafetyScreener, checkSafety, DEFAULT_DANGER_PATTERNS } from "./safety.js";
export { checkStructure, JUNIT5_CONVENTION } from "./structure.js";
export {
  TestValidator,
  validateTest,
  applyStrictMode,
  NO_CODE_BLOCK_ERROR,
  type TestValidatorOptions,
} from "./validator.js";
export type {
  ValidationReport,
  DangerPattern,
  SafetyResult,
  StructureFindings,
  StructureConvention,
  ValidateOptions,
} from "./types.js";
