/**
 * Structural checks for a JUnit 5 test file
 *
 * Every check runs regardless of earlier failures, and all findings are
 * collected in one pass.
 */

import type { StructureConvention, StructureFindings } from "./types.js";

export const JUNIT5_CONVENTION: StructureConvention = Object.freeze({
  frameworkLabel: "JUnit 5",
  frameworkImports: Object.freeze([
    "import org.junit.jupiter.api.Test;",
    "import static org.junit.jupiter.api.Assertions.*;",
  ]),
  publicClassPattern: /public\s+class\s+(\w+)/,
  classNameSuffix: "Test",
  testMarkerPattern: /@Test\b/,
  testMarkerLabel: "@Test",
  entryPointSignature: "public static void main",
  mockingMarkers: Object.freeze(["mock(", "when(", "verify("]),
  mockingImportPrefixes: Object.freeze(["import org.mockito", "import static org.mockito"]),
  mockingLibraryLabel: "Mockito",
});

/**
 * Check candidate code against the test-file convention.
 *
 * @param code Extracted candidate code
 * @param targetClassName Class under test; enables the naming suggestion
 * @param convention Markers to look for (JUnit 5 by default)
 */
export function checkStructure(
  code: string,
  targetClassName?: string,
  convention: StructureConvention = JUNIT5_CONVENTION
): StructureFindings {
  const findings: StructureFindings = { errors: [], warnings: [], suggestions: [] };

  const hasFrameworkImport = convention.frameworkImports.some((imp) => code.includes(imp));
  if (!hasFrameworkImport) {
    findings.errors.push(
      `Missing ${convention.frameworkLabel} imports (expected ${convention.testMarkerLabel})`
    );
  }

  const classMatch = convention.publicClassPattern.exec(code);
  const testClassName = classMatch?.[1];
  if (testClassName === undefined) {
    findings.errors.push("No public class definition found");
  } else {
    if (!testClassName.endsWith(convention.classNameSuffix)) {
      findings.warnings.push(
        `Test class name '${testClassName}' should end with '${convention.classNameSuffix}'`
      );
    }

    if (targetClassName && !testClassName.startsWith(targetClassName)) {
      findings.suggestions.push(
        `Consider naming the test class '${targetClassName}${convention.classNameSuffix}' to match the class under test`
      );
    }
  }

  if (!convention.testMarkerPattern.test(code)) {
    findings.errors.push(`No ${convention.testMarkerLabel} annotated methods found`);
  }

  if (code.includes(convention.entryPointSignature)) {
    findings.warnings.push("Test class should not contain a main method");
  }

  const usesMocking = convention.mockingMarkers.some((marker) => code.includes(marker));
  const hasMockingImport = convention.mockingImportPrefixes.some((prefix) => code.includes(prefix));
  if (usesMocking && !hasMockingImport) {
    findings.warnings.push(
      `${convention.mockingLibraryLabel} usage detected but no ${convention.mockingLibraryLabel} import found`
    );
  }

  return findings;
}
