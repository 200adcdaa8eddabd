import { describe, it, expect, vi } from "vitest";

import {
  formatReport,
  formatReportTerminal,
  formatReportJson,
  formatGeneration,
  formatGenerationTerminal,
  formatError,
  formatWarning,
  formatSuccess,
  isValidOutputFormat,
} from "@/cli/formatters.js";
import { ModelServiceError } from "@/lib/errors.js";

import type { GenerationResult } from "@/testgen/types.js";
import type { ValidationReport } from "@/validation/types.js";

// Mock chalk to avoid color codes in test output comparisons
vi.mock("chalk", () => ({
  default: {
    red: (s: string) => `[red]${s}[/red]`,
    yellow: (s: string) => `[yellow]${s}[/yellow]`,
    green: (s: string) => `[green]${s}[/green]`,
    cyan: (s: string) => `[cyan]${s}[/cyan]`,
    gray: (s: string) => `[gray]${s}[/gray]`,
    bold: Object.assign((s: string) => `[bold]${s}[/bold]`, {
      underline: (s: string) => `[bold.underline]${s}[/bold.underline]`,
    }),
  },
}));

const RULE = `[gray]${"─".repeat(40)}[/gray]`;

const PASSED: ValidationReport = {
  valid: true,
  cleanCode: "public class CalculatorTest {}",
  errors: [],
  warnings: [],
  suggestions: [],
};

const FAILED: ValidationReport = {
  valid: false,
  cleanCode: "public class Calc {}",
  errors: ["No @Test annotated methods found"],
  warnings: ["Test class name 'Calc' should end with 'Test'"],
  suggestions: ["Consider naming the test class 'CalculatorTest' to match the class under test"],
};

const GENERATED: GenerationResult = {
  testClass: "public class CalculatorTest {}",
  filePath: "src/test/java/CalculatorTest.java",
  dependencies: ["org.mockito:mockito-core", "org.junit.jupiter:junit-jupiter"],
};

describe("isValidOutputFormat", () => {
  it("accepts known formats only", () => {
    expect(isValidOutputFormat("terminal")).toBe(true);
    expect(isValidOutputFormat("json")).toBe(true);
    expect(isValidOutputFormat("sarif")).toBe(false);
    expect(isValidOutputFormat("")).toBe(false);
  });
});

describe("formatReportTerminal", () => {
  it("prints a single line for a clean report", () => {
    expect(formatReportTerminal(PASSED)).toBe("[green]✓ Validation passed[/green]");
  });

  it("lists errors, warnings and suggestions in that order", () => {
    expect(formatReportTerminal(FAILED).split("\n")).toEqual([
      "[red]✗ Validation failed[/red]",
      "[red]  error: No @Test annotated methods found[/red]",
      "[yellow]  warning: Test class name 'Calc' should end with 'Test'[/yellow]",
      "[cyan]  suggestion: Consider naming the test class 'CalculatorTest' to match the class under test[/cyan]",
    ]);
  });
});

describe("formatReportJson", () => {
  it("serializes the whole report", () => {
    expect(JSON.parse(formatReportJson(FAILED))).toEqual(FAILED);
  });
});

describe("formatReport", () => {
  it("dispatches on the format", () => {
    expect(formatReport(PASSED, "terminal")).toBe(formatReportTerminal(PASSED));
    expect(formatReport(PASSED, "json")).toBe(formatReportJson(PASSED));
  });
});

describe("formatGenerationTerminal", () => {
  it("frames the code between the path and the dependency hint", () => {
    expect(formatGenerationTerminal(GENERATED).split("\n")).toEqual([
      "[bold.underline]src/test/java/CalculatorTest.java[/bold.underline]",
      RULE,
      "public class CalculatorTest {}",
      RULE,
      "[gray]Test dependencies: org.mockito:mockito-core, org.junit.jupiter:junit-jupiter[/gray]",
    ]);
  });
});

describe("formatGeneration", () => {
  it("emits JSON with every field", () => {
    expect(JSON.parse(formatGeneration(GENERATED, "json"))).toEqual(GENERATED);
  });
});

describe("message helpers", () => {
  it("formats an error with its message", () => {
    expect(formatError(new ModelServiceError("OpenAI API error: 401 - bad key"))).toBe(
      "[red]Error: OpenAI API error: 401 - bad key[/red]"
    );
  });

  it("formats warnings and successes", () => {
    expect(formatWarning("No API key")).toBe("[yellow]Warning: No API key[/yellow]");
    expect(formatSuccess("Saved")).toBe("[green]✓ Saved[/green]");
  });
});
