import { err, ok } from "../lib/result.js";
import { TestsmithError } from "../lib/errors.js";

import type { Result } from "../lib/result.js";
import type { PromptTemplate, TemplateVariable, VariableType } from "./schema.js";

/**
 * Error for template rendering failures
 */
export class TemplateRenderError extends TestsmithError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "TEMPLATE_RENDER_ERROR", context);
    this.name = "TemplateRenderError";
  }
}

/**
 * Values a template can be rendered with
 */
export type TemplateValue = string | number | boolean | readonly string[];

/**
 * Result of parsing template placeholders
 */
export interface ParsedPlaceholder {
  /** Full match including braces: {{variableName}} */
  match: string;
  /** Variable name without braces: variableName */
  name: string;
  startIndex: number;
  endIndex: number;
}

export interface VariableValidationResult {
  name: string;
  valid: boolean;
  errors: string[];
}

export interface ValidationResult {
  valid: boolean;
  results: VariableValidationResult[];
  missingRequired: string[];
  unknownVariables: string[];
  typeErrors: string[];
}

export interface RenderOptions {
  /** Strict mode - fail on any validation error */
  strict?: boolean;
}

export interface RenderResult {
  /** Rendered prompt */
  content: string;
  /** Variables that were substituted */
  substituted: string[];
  /** Variables that were left unresolved */
  unresolved: string[];
}

/**
 * Rendered in place of an empty list
 */
const EMPTY_LIST_TEXT = "(none)";

/**
 * A fresh global regex per call, so lastIndex never leaks between uses
 */
function placeholderRegex(): RegExp {
  return /\{\{([a-zA-Z][a-zA-Z0-9_]*)\}\}/g;
}

/**
 * Renders prompt templates by substituting variable placeholders
 *
 * @example
 * ```typescript
 * const renderer = new TemplateRenderer();
 *
 * const result = renderer.renderTemplate(template, {
 *   className: "Calculator",
 *   sourceCode: "public class Calculator { ... }",
 *   projectDependencies: ["org.assertj:assertj-core"],
 * });
 *
 * if (result.success) {
 *   console.log(result.data.content);
 * }
 * ```
 */
export class TemplateRenderer {
  private readonly options: Required<RenderOptions>;

  constructor(options: RenderOptions = {}) {
    this.options = {
      strict: options.strict ?? true,
    };
  }

  /**
   * Parse all placeholders from a template string
   */
  parsePlaceholders(template: string): ParsedPlaceholder[] {
    const placeholders: ParsedPlaceholder[] = [];
    const regex = placeholderRegex();
    let match: RegExpExecArray | null;

    while ((match = regex.exec(template)) !== null) {
      placeholders.push({
        match: match[0],
        name: match[1] ?? "",
        startIndex: match.index,
        endIndex: match.index + match[0].length,
      });
    }

    return placeholders;
  }

  /**
   * Unique variable names in order of first appearance
   */
  getVariableNames(template: string): string[] {
    const placeholders = this.parsePlaceholders(template);
    return [...new Set(placeholders.map((p) => p.name))];
  }

  /**
   * Validate provided values against the template's variable definitions
   */
  validateVariables(
    template: PromptTemplate,
    values: Record<string, TemplateValue | undefined>
  ): ValidationResult {
    const results: VariableValidationResult[] = [];
    const missingRequired: string[] = [];
    const unknownVariables: string[] = [];
    const typeErrors: string[] = [];

    const usedInTemplate = new Set(this.getVariableNames(template.template));
    const definedVariables = new Map<string, TemplateVariable>();
    for (const v of template.variables) {
      definedVariables.set(v.name, v);
    }

    for (const variable of template.variables) {
      const result: VariableValidationResult = { name: variable.name, valid: true, errors: [] };
      const value = values[variable.name];

      if (value === undefined) {
        if (variable.required && variable.defaultValue === undefined) {
          result.valid = false;
          result.errors.push(`Required variable '${variable.name}' is missing`);
          missingRequired.push(variable.name);
        }
      } else {
        const typeError = this.checkType(variable.name, value, variable.type);
        if (typeError) {
          result.valid = false;
          result.errors.push(typeError);
          typeErrors.push(typeError);
        }
      }

      results.push(result);
    }

    for (const name of Object.keys(values)) {
      if (!definedVariables.has(name)) {
        if (usedInTemplate.has(name)) {
          results.push({
            name,
            valid: true,
            errors: [`Variable '${name}' is used in template but not formally defined`],
          });
        } else {
          unknownVariables.push(name);
        }
      }
    }

    // Placeholders with neither a definition nor a value
    for (const placeholder of usedInTemplate) {
      if (!definedVariables.has(placeholder) && values[placeholder] === undefined) {
        missingRequired.push(placeholder);
      }
    }

    const valid =
      missingRequired.length === 0 &&
      typeErrors.length === 0 &&
      (unknownVariables.length === 0 || !this.options.strict);

    return {
      valid,
      results,
      missingRequired: [...new Set(missingRequired)],
      unknownVariables,
      typeErrors,
    };
  }

  private checkType(name: string, value: TemplateValue, expectedType: VariableType): string | null {
    const actualType = this.getValueType(value);

    if (actualType !== expectedType) {
      return `Variable '${name}' expected type '${expectedType}' but got '${actualType}'`;
    }

    return null;
  }

  private getValueType(value: TemplateValue): VariableType {
    if (typeof value === "string") return "string";
    if (typeof value === "number") return "number";
    if (typeof value === "boolean") return "boolean";
    return "array";
  }

  /**
   * Substitute variables in a template string. Defaults from `variableDefs`
   * apply where no value is given.
   */
  substituteVariables(
    template: string,
    values: Record<string, TemplateValue | undefined>,
    variableDefs: TemplateVariable[] = []
  ): { content: string; substituted: string[]; unresolved: string[] } {
    const substituted: string[] = [];
    const unresolved: string[] = [];
    const resolvedValues = new Map<string, string>();

    for (const def of variableDefs) {
      if (def.defaultValue !== undefined) {
        resolvedValues.set(def.name, this.stringify(def.defaultValue));
      }
    }

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        resolvedValues.set(key, this.stringify(value));
      }
    }

    const regex = placeholderRegex();
    const content = template.replace(regex, (match, name: string) => {
      const resolved = resolvedValues.get(name);
      if (resolved !== undefined) {
        substituted.push(name);
        return resolved;
      }

      unresolved.push(name);
      return match;
    });

    return {
      content,
      substituted: [...new Set(substituted)],
      unresolved: [...new Set(unresolved)],
    };
  }

  /**
   * Lists render one item per line as "- item"
   */
  private stringify(value: TemplateValue): string {
    if (typeof value === "string") {
      return value;
    }

    if (typeof value === "number" || typeof value === "boolean") {
      return String(value);
    }

    if (value.length === 0) {
      return EMPTY_LIST_TEXT;
    }

    return value.map((item) => `- ${item}`).join("\n");
  }

  /**
   * Render a prompt template with variable substitution
   */
  renderTemplate(
    template: PromptTemplate,
    values: Record<string, TemplateValue | undefined>,
    options?: RenderOptions
  ): Result<RenderResult, TemplateRenderError> {
    const mergedOptions = { ...this.options, ...options };

    const validation = this.validateVariables(template, values);

    if (!validation.valid && mergedOptions.strict) {
      const errors: string[] = [];

      if (validation.missingRequired.length > 0) {
        errors.push(`Missing required variables: ${validation.missingRequired.join(", ")}`);
      }

      if (validation.typeErrors.length > 0) {
        errors.push(...validation.typeErrors);
      }

      if (validation.unknownVariables.length > 0) {
        errors.push(`Unknown variables: ${validation.unknownVariables.join(", ")}`);
      }

      return err(
        new TemplateRenderError(`Template '${template.id}' validation failed: ${errors.join("; ")}`, {
          templateId: template.id,
          errors,
        })
      );
    }

    const { content, substituted, unresolved } = this.substituteVariables(
      template.template,
      values,
      template.variables
    );

    if (unresolved.length > 0 && mergedOptions.strict) {
      return err(
        new TemplateRenderError(`Unresolved template variables: ${unresolved.join(", ")}`, {
          templateId: template.id,
          unresolved,
        })
      );
    }

    return ok({ content, substituted, unresolved });
  }
}
