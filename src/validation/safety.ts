/**
 * Safety screening for generated code
 *
 * Runs before any structural check. A match on any pattern rejects the
 * candidate outright.
 */

import type { DangerPattern, SafetyResult } from "./types.js";

/**
 * Default danger patterns, in reporting order
 */
export const DEFAULT_DANGER_PATTERNS: readonly DangerPattern[] = Object.freeze([
  Object.freeze({
    pattern: /\b(Runtime|ProcessBuilder)\.getRuntime\(\)/,
    reason: "Using Runtime to execute system commands is not allowed",
  }),
  Object.freeze({
    pattern: /\bexec\(/,
    reason: "Calling exec() is not allowed",
  }),
  Object.freeze({
    pattern: /new ProcessBuilder/,
    reason: "Creating processes is not allowed",
  }),
  Object.freeze({
    pattern: /System\.exit/,
    reason: "Calling System.exit() is not allowed",
  }),
]);

/**
 * Screens candidate code against an ordered danger-pattern list
 *
 * @example
 * ```typescript
 * const screener = new SafetyScreener();
 * const { safe, reasons } = screener.check('Runtime.getRuntime().exec("ls")');
 * // safe === false, reasons lists the Runtime and exec() entries
 * ```
 */
export class SafetyScreener {
  private readonly patterns: readonly DangerPattern[];

  constructor(patterns: readonly DangerPattern[] = DEFAULT_DANGER_PATTERNS) {
    // g/y flags stripped: test() must not carry lastIndex between calls
    this.patterns = patterns.map(({ pattern, reason }) => ({
      pattern: new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, "")),
      reason,
    }));
  }

  /**
   * Report every matching pattern, not just the first
   */
  check(code: string): SafetyResult {
    const reasons: string[] = [];

    for (const { pattern, reason } of this.patterns) {
      if (pattern.test(code)) {
        reasons.push(reason);
      }
    }

    return { safe: reasons.length === 0, reasons };
  }

  getPatterns(): readonly DangerPattern[] {
    return this.patterns;
  }
}

/**
 * Functional form of {@link SafetyScreener.check}
 */
export function checkSafety(
  code: string,
  patterns: readonly DangerPattern[] = DEFAULT_DANGER_PATTERNS
): SafetyResult {
  return new SafetyScreener(patterns).check(code);
}
