import { z } from "zod";

/**
 * Types for template variables
 */
export const VariableTypeSchema = z.enum(["string", "number", "boolean", "array"]);

/**
 * Regex pattern for valid variable names (camelCase)
 */
const VARIABLE_NAME_PATTERN = /^[a-z][a-zA-Z0-9_]*$/;

/**
 * Regex pattern for valid IDs (lowercase, alphanumeric with hyphens)
 */
const ID_PATTERN = /^[a-z][a-z0-9-]*$/;

/**
 * A value the prompt template substitutes as {{name}}
 */
export const TemplateVariableSchema = z.object({
  name: z.string().regex(VARIABLE_NAME_PATTERN, "Variable name must be camelCase"),
  type: VariableTypeSchema,
  description: z.string().min(1, "Description is required"),
  required: z.boolean().default(true),
  /** Used when the caller passes no value */
  defaultValue: z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]).optional(),
});

/**
 * Prompt template as stored on disk (YAML)
 */
export const PromptTemplateSchema = z.object({
  id: z
    .string()
    .regex(ID_PATTERN, "ID must start with lowercase letter and contain only lowercase letters, numbers, and hyphens"),
  description: z.string().optional(),
  /** Test framework family the prompt asks for */
  framework: z.string().min(1),
  /** Template body with {{variable}} placeholders */
  template: z.string().min(50, "Template must be at least 50 characters"),
  variables: z.array(TemplateVariableSchema),
});

export type VariableType = z.infer<typeof VariableTypeSchema>;
export type TemplateVariable = z.infer<typeof TemplateVariableSchema>;
export type PromptTemplate = z.infer<typeof PromptTemplateSchema>;
