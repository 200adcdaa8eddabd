/**
 * AI-powered JUnit 5 test generator
 *
 * Renders the prompt, asks the model for a test class, and accepts the reply
 * only if it passes validation. The model call is the only I/O; its failures
 * propagate as thrown by the model caller.
 */

import { GenerationError, GenerationValidationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { err, ok, unwrap } from "../lib/result.js";
import {
  LAST_GENERATED_TEST_KEY,
  PROJECT_DEPENDENCIES_KEY,
  readProjectDependencies,
} from "../state/scratchpad.js";
import { loadPromptTemplate } from "../templates/loader.js";
import { TemplateRenderer } from "../templates/renderer.js";
import { TestValidator, validateTest } from "../validation/validator.js";

import { GenerationRequestSchema } from "./types.js";

import type { ModelCaller } from "../ai/types.js";
import type { TestsmithError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";
import type { AgentState, LastGeneratedTest } from "../state/scratchpad.js";
import type { PromptTemplate } from "../templates/schema.js";
import type { GenerateTestInput, GenerationRequest, GenerationResult } from "./types.js";

const log = logger.child("[testgen]");

/**
 * Model requested for every generation unless overridden
 */
export const GENERATION_MODEL = "claude-sonnet-4-20250514";

/**
 * Advisory coordinates returned with every generated test
 */
export const TEST_DEPENDENCIES: readonly string[] = Object.freeze([
  "org.mockito:mockito-core",
  "org.junit.jupiter:junit-jupiter",
]);

export interface TestGeneratorOptions {
  /** Text-generation call */
  callModel: ModelCaller;
  /** Model identifier passed to `callModel` */
  model?: string;
  /** Reject replies with warnings (default true) */
  strict?: boolean;
  /** Prompt template; the bundled JUnit 5 template is loaded when omitted */
  template?: PromptTemplate;
  renderer?: TemplateRenderer;
  validator?: TestValidator;
}

/**
 * Conventional Maven/Gradle location of the test for `className`
 */
export function deriveTestFilePath(className: string): string {
  return `src/test/java/${className}Test.java`;
}

/**
 * Drives one request from prompt to validated test
 *
 * @example
 * ```typescript
 * const generator = new TestGenerator({
 *   callModel: createModelCaller(createAIService({ provider: "anthropic" })),
 * });
 *
 * const result = await generator.generate(state, {
 *   className: "Calculator",
 *   sourceCode: readFileSync("Calculator.java", "utf-8"),
 * });
 *
 * if (result.success) {
 *   writeFileSync(result.data.filePath, result.data.testClass);
 * }
 * ```
 */
export class TestGenerator {
  private readonly callModel: ModelCaller;
  private readonly model: string;
  private readonly strict: boolean;
  private readonly renderer: TemplateRenderer;
  private readonly validator: TestValidator;
  private template: PromptTemplate | undefined;

  constructor(options: TestGeneratorOptions) {
    this.callModel = options.callModel;
    this.model = options.model ?? GENERATION_MODEL;
    this.strict = options.strict ?? true;
    this.renderer = options.renderer ?? new TemplateRenderer();
    this.validator = options.validator ?? new TestValidator();
    this.template = options.template;
  }

  /**
   * Generate a test for `input`, reading known dependencies from
   * `state.scratchpad` and recording the result there on success.
   *
   * An invalid model reply comes back as `GenerationValidationError`.
   * Model-call failures are thrown, not returned.
   */
  async generate(
    state: AgentState,
    input: GenerateTestInput
  ): Promise<Result<GenerationResult, TestsmithError>> {
    const request = this.buildRequest(state, input);
    if (!request.success) {
      return request;
    }
    const { className } = request.data;

    const template = await this.getTemplate();
    if (!template.success) {
      return template;
    }

    const rendered = this.renderer.renderTemplate(template.data, {
      className,
      methodSignature: request.data.methodSignature,
      sourceCode: request.data.sourceCode,
      projectDependencies: request.data.projectDependencies,
      framework: request.data.framework,
    });
    if (!rendered.success) {
      return rendered;
    }

    log.debug(`Prompt for ${className}: ${rendered.data.content.length} chars, model ${this.model}`);
    const rawOutput = await this.callModel(rendered.data.content, this.model);

    const report = validateTest(rawOutput, { targetClassName: className, strict: this.strict }, this.validator);
    if (!report.valid) {
      log.warn(`Generated test for ${className} rejected (${report.errors.length} issue(s))`);
      return err(new GenerationValidationError(report.errors, report));
    }

    for (const suggestion of report.suggestions) {
      log.info(suggestion);
    }

    const filePath = deriveTestFilePath(className);
    const record: LastGeneratedTest = {
      className,
      testCode: report.cleanCode,
      filePath,
    };
    state.scratchpad.set(LAST_GENERATED_TEST_KEY, record);

    log.debug(`Generated ${filePath}`);

    return ok({
      testClass: report.cleanCode,
      filePath,
      dependencies: [...TEST_DEPENDENCIES],
    });
  }

  private buildRequest(
    state: AgentState,
    input: GenerateTestInput
  ): Result<GenerationRequest, GenerationError> {
    const projectDependencies = readProjectDependencies(state.scratchpad);
    if (projectDependencies === undefined && state.scratchpad.get(PROJECT_DEPENDENCIES_KEY) !== undefined) {
      log.debug(`Ignoring '${PROJECT_DEPENDENCIES_KEY}': not a list of strings`);
    }

    const parsed = GenerationRequestSchema.safeParse({
      ...input,
      projectDependencies: projectDependencies ?? [],
    });

    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      return err(
        new GenerationError(`Invalid generation request: ${details.join("; ")}`, {
          issues: parsed.error.issues,
        })
      );
    }

    return ok(Object.freeze(parsed.data));
  }

  private async getTemplate(): Promise<Result<PromptTemplate, GenerationError>> {
    if (this.template) {
      return ok(this.template);
    }

    const loaded = await loadPromptTemplate();
    if (!loaded.success) {
      return err(
        new GenerationError(`Prompt template unavailable: ${loaded.error.message}`, loaded.error.context)
      );
    }

    this.template = loaded.data;
    return ok(loaded.data);
  }
}

/**
 * Throwing form of {@link TestGenerator.generate}
 */
export async function generateJavaTest(
  state: AgentState,
  input: GenerateTestInput,
  options: TestGeneratorOptions
): Promise<GenerationResult> {
  const generator = new TestGenerator(options);
  return unwrap(await generator.generate(state, input));
}
