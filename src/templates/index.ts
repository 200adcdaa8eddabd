/**
 * Prompt templates
 *
 * YAML prompt definitions and the {{placeholder}} renderer that fills them.
 */

export {
  TemplateRenderer,
  TemplateRenderError,
  type TemplateValue,
  type ParsedPlaceholder,
  type RenderOptions,
  type RenderResult,
  type ValidationResult as TemplateValidationResult,
  type VariableValidationResult,
} from "./renderer.js";

export {
  loadPromptTemplate,
  parsePromptTemplate,
  getPromptsPath,
  DEFAULT_PROMPT_TEMPLATE_ID,
} from "./loader.js";

export {
  PromptTemplateSchema,
  TemplateVariableSchema,
  VariableTypeSchema,
  type PromptTemplate,
  type TemplateVariable,
  type VariableType,
} from "./schema.js";
