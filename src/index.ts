/**
 * testsmith - JUnit 5 test generation with output validation
 *
 * @example
 * ```typescript
 * import { TestGenerator, MemoryScratchpad, createAIService, createModelCaller } from "testsmith";
 *
 * const generator = new TestGenerator({
 *   callModel: createModelCaller(createAIService()),
 * });
 * const state = { scratchpad: new MemoryScratchpad() };
 *
 * const result = await generator.generate(state, { className: "Calculator", sourceCode });
 * ```
 */

export const VERSION = "0.1.0";

export * from "./lib/index.js";
export * from "./validation/index.js";
export * from "./testgen/index.js";
export * from "./templates/index.js";
export * from "./state/index.js";
export * from "./ai/index.js";
