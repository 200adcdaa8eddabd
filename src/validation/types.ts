/**
 * Validation types
 *
 * All checks in this module are lexical heuristics over the candidate text.
 * Nothing here parses Java.
 */

/**
 * Outcome of one validation call. Built once and never mutated.
 */
export interface ValidationReport {
  /** True iff `errors` is empty */
  readonly valid: boolean;
  /** Extracted code. Empty when no code block was found */
  readonly cleanCode: string;
  /** Fatal issues, in the order they were found */
  readonly errors: readonly string[];
  /** Non-fatal issues; folded into errors in strict mode */
  readonly warnings: readonly string[];
  /** Advisory notes, never fatal */
  readonly suggestions: readonly string[];
}

/**
 * A textual signature of code that can affect the host system
 */
export interface DangerPattern {
  readonly pattern: RegExp;
  readonly reason: string;
}

export interface SafetyResult {
  safe: boolean;
  /** Reasons for every matching pattern, in pattern-list order */
  reasons: string[];
}

export interface StructureFindings {
  errors: string[];
  warnings: string[];
  suggestions: string[];
}

/**
 * Textual markers of the JUnit 5 test-file convention
 */
export interface StructureConvention {
  /** Human label used in messages, e.g. "JUnit 5" */
  readonly frameworkLabel: string;
  /** At least one of these must appear verbatim */
  readonly frameworkImports: readonly string[];
  /** Captures the declared public type name in group 1 */
  readonly publicClassPattern: RegExp;
  /** Required suffix of the test class name */
  readonly classNameSuffix: string;
  /** Marker of a test method */
  readonly testMarkerPattern: RegExp;
  /** Display form of the test marker, e.g. "@Test" */
  readonly testMarkerLabel: string;
  /** Signature that should never appear in a test file */
  readonly entryPointSignature: string;
  /** Call markers that indicate mocking-library usage */
  readonly mockingMarkers: readonly string[];
  /** Import prefixes of the mocking library, static imports included */
  readonly mockingImportPrefixes: readonly string[];
  readonly mockingLibraryLabel: string;
}

export interface ValidateOptions {
  /** Name of the class under test, enables the naming suggestion */
  targetClassName?: string;
  /** Fold warnings into errors (default true) */
  strict?: boolean;
}
