/**
 * Test generation module
 *
 * Generates JUnit 5 test classes with a language model and accepts only
 * replies that pass validation:
 * - a single extractable code block
 * - no process spawning or VM termination
 * - JUnit 5 imports, a public *Test class and at least one @Test method
 */

export {
  TestGenerator,
  generateJavaTest,
  deriveTestFilePath,
  GENERATION_MODEL,
  TEST_DEPENDENCIES,
  type TestGeneratorOptions,
} from "./generator.js";

export {
  GenerationRequestSchema,
  type GenerationRequest,
  type GenerateTestInput,
  type GenerationResult,
} from "./types.js";
