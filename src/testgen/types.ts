import { z } from "zod";

/**
 * Java identifier, as accepted for the class under test
 */
const JAVA_IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export const GenerationRequestSchema = z.object({
  className: z.string().regex(JAVA_IDENTIFIER, "Class name must be a Java identifier"),
  sourceCode: z.string().min(1, "Source code is required"),
  methodSignature: z.string().min(1).optional(),
  framework: z.string().min(1).default("junit5"),
  projectDependencies: z.array(z.string()).default([]),
});

/**
 * Immutable input for one generation
 */
export type GenerationRequest = Readonly<z.infer<typeof GenerationRequestSchema>>;

/**
 * What the caller supplies; dependencies come from the agent's scratchpad
 */
export interface GenerateTestInput {
  className: string;
  sourceCode: string;
  methodSignature?: string;
  framework?: string;
}

export interface GenerationResult {
  /** Validated test source */
  testClass: string;
  /** Conventional location, e.g. src/test/java/CalculatorTest.java */
  filePath: string;
  /** Advisory dependency coordinates for the generated test */
  dependencies: readonly string[];
}

