import { describe, it, expect, beforeEach } from "vitest";

import {
  TemplateRenderer,
  TemplateRenderError,
  type PromptTemplate,
  type TemplateVariable,
} from "@/templates/index.js";

describe("TemplateRenderer", () => {
  let renderer: TemplateRenderer;

  beforeEach(() => {
    renderer = new TemplateRenderer();
  });

  function createTestTemplate(template: string, variables: TemplateVariable[] = []): PromptTemplate {
    return {
      id: "test-template",
      framework: "junit5",
      template,
      variables,
    };
  }

  function createVariable(
    name: string,
    type: TemplateVariable["type"] = "string",
    required = true,
    defaultValue?: TemplateVariable["defaultValue"]
  ): TemplateVariable {
    const variable: TemplateVariable = {
      name,
      type,
      description: `Variable ${name}`,
      required,
    };
    if (defaultValue !== undefined) {
      variable.defaultValue = defaultValue;
    }
    return variable;
  }

  describe("parsePlaceholders", () => {
    it("extracts a placeholder with its position", () => {
      expect(renderer.parsePlaceholders("Hello {{name}}!")).toEqual([
        { match: "{{name}}", name: "name", startIndex: 6, endIndex: 14 },
      ]);
    });

    it("extracts multiple placeholders in order", () => {
      const placeholders = renderer.parsePlaceholders("{{greeting}} {{name}}, welcome to {{place}}!");
      expect(placeholders.map((p) => p.name)).toEqual(["greeting", "name", "place"]);
    });

    it("keeps duplicate placeholders", () => {
      expect(renderer.parsePlaceholders("{{name}} said hello to {{name}}")).toHaveLength(2);
    });

    it("ignores invalid placeholder formats", () => {
      expect(renderer.parsePlaceholders("{{ name }} {{1abc}} {name} {{}}")).toEqual([]);
    });

    it("accepts camelCase and underscores", () => {
      const names = renderer.parsePlaceholders("{{className}} {{source_code}}").map((p) => p.name);
      expect(names).toEqual(["className", "source_code"]);
    });
  });

  describe("getVariableNames", () => {
    it("returns unique names in order of first appearance", () => {
      expect(renderer.getVariableNames("{{b}} {{a}} {{b}}")).toEqual(["b", "a"]);
    });

    it("returns empty array for no variables", () => {
      expect(renderer.getVariableNames("plain text")).toEqual([]);
    });
  });

  describe("validateVariables", () => {
    it("passes when all required variables are provided", () => {
      const template = createTestTemplate("{{className}}", [createVariable("className")]);
      const result = renderer.validateVariables(template, { className: "Calculator" });

      expect(result.valid).toBe(true);
      expect(result.missingRequired).toEqual([]);
    });

    it("fails for missing required variables", () => {
      const template = createTestTemplate("{{className}}", [createVariable("className")]);
      const result = renderer.validateVariables(template, {});

      expect(result.valid).toBe(false);
      expect(result.missingRequired).toEqual(["className"]);
      expect(result.results[0]?.errors).toEqual(["Required variable 'className' is missing"]);
    });

    it("treats an undefined value as missing", () => {
      const template = createTestTemplate("{{className}}", [createVariable("className")]);
      expect(renderer.validateVariables(template, { className: undefined }).missingRequired).toEqual([
        "className",
      ]);
    });

    it("passes when an optional variable is missing", () => {
      const template = createTestTemplate("{{focus}}", [createVariable("focus", "string", false)]);
      expect(renderer.validateVariables(template, {}).valid).toBe(true);
    });

    it("accepts a default for a missing required variable", () => {
      const template = createTestTemplate("{{focus}}", [
        createVariable("focus", "string", true, "all public methods"),
      ]);
      expect(renderer.validateVariables(template, {}).valid).toBe(true);
    });

    it("detects type mismatches", () => {
      const template = createTestTemplate("{{className}} {{deps}}", [
        createVariable("className"),
        createVariable("deps", "array"),
      ]);
      const result = renderer.validateVariables(template, { className: 42, deps: "junit" });

      expect(result.valid).toBe(false);
      expect(result.typeErrors).toEqual([
        "Variable 'className' expected type 'string' but got 'number'",
        "Variable 'deps' expected type 'array' but got 'string'",
      ]);
    });

    it("accepts lists for array variables", () => {
      const template = createTestTemplate("{{deps}}", [createVariable("deps", "array")]);
      expect(renderer.validateVariables(template, { deps: ["a", "b"] }).valid).toBe(true);
    });

    it("rejects unknown variables in strict mode only", () => {
      const template = createTestTemplate("{{className}}", [createVariable("className")]);
      const values = { className: "A", extra: "x" };

      const strict = renderer.validateVariables(template, values);
      expect(strict.valid).toBe(false);
      expect(strict.unknownVariables).toEqual(["extra"]);

      expect(new TemplateRenderer({ strict: false }).validateVariables(template, values).valid).toBe(true);
    });

    it("notes values for placeholders that are not formally defined", () => {
      const template = createTestTemplate("{{className}} {{note}}", [createVariable("className")]);
      const result = renderer.validateVariables(template, { className: "A", note: "n" });

      expect(result.valid).toBe(true);
      expect(result.results).toContainEqual({
        name: "note",
        valid: true,
        errors: ["Variable 'note' is used in template but not formally defined"],
      });
    });

    it("requires placeholders that have neither definition nor value", () => {
      const template = createTestTemplate("{{className}} {{orphan}}", [createVariable("className")]);
      expect(renderer.validateVariables(template, { className: "A" }).missingRequired).toEqual(["orphan"]);
    });
  });

  describe("substituteVariables", () => {
    it("substitutes every occurrence", () => {
      const result = renderer.substituteVariables("{{name}} and {{name}}", { name: "A" });
      expect(result.content).toBe("A and A");
      expect(result.substituted).toEqual(["name"]);
    });

    it("uses default values from variable definitions", () => {
      const result = renderer.substituteVariables("Focus: {{focus}}", {}, [
        createVariable("focus", "string", false, "all public methods"),
      ]);
      expect(result.content).toBe("Focus: all public methods");
    });

    it("lets provided values override defaults", () => {
      const result = renderer.substituteVariables("Focus: {{focus}}", { focus: "add" }, [
        createVariable("focus", "string", false, "all public methods"),
      ]);
      expect(result.content).toBe("Focus: add");
    });

    it("falls back to the default for undefined values", () => {
      const result = renderer.substituteVariables("Focus: {{focus}}", { focus: undefined }, [
        createVariable("focus", "string", false, "all public methods"),
      ]);
      expect(result.content).toBe("Focus: all public methods");
    });

    it("renders lists one item per line", () => {
      const result = renderer.substituteVariables("{{deps}}", { deps: ["org.a:a", "org.b:b"] });
      expect(result.content).toBe("- org.a:a\n- org.b:b");
    });

    it("renders an empty list as (none)", () => {
      expect(renderer.substituteVariables("{{deps}}", { deps: [] }).content).toBe("(none)");
    });

    it("stringifies numbers and booleans", () => {
      expect(renderer.substituteVariables("{{n}} {{b}}", { n: 3, b: false }).content).toBe("3 false");
    });

    it("leaves unresolved placeholders in place and tracks them", () => {
      const result = renderer.substituteVariables("{{a}} {{b}}", { a: "x" });
      expect(result.content).toBe("x {{b}}");
      expect(result.unresolved).toEqual(["b"]);
    });
  });

  describe("renderTemplate", () => {
    const template = createTestTemplate("Write tests for {{className}}.\nDeps:\n{{deps}}", [
      createVariable("className"),
      createVariable("deps", "array", false, []),
    ]);

    it("renders with all variables", () => {
      const result = renderer.renderTemplate(template, { className: "Calculator", deps: ["org.a:a"] });

      expect(result).toEqual({
        success: true,
        data: {
          content: "Write tests for Calculator.\nDeps:\n- org.a:a",
          substituted: ["className", "deps"],
          unresolved: [],
        },
      });
    });

    it("applies defaults", () => {
      const result = renderer.renderTemplate(template, { className: "Calculator" });
      expect(result.success && result.data.content).toBe("Write tests for Calculator.\nDeps:\n(none)");
    });

    it("fails in strict mode for missing required variables", () => {
      const result = renderer.renderTemplate(template, {});

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(TemplateRenderError);
        expect(result.error.code).toBe("TEMPLATE_RENDER_ERROR");
        expect(result.error.message).toBe(
          "Template 'test-template' validation failed: Missing required variables: className"
        );
      }
    });

    it("reports type errors and unknown variables together", () => {
      const result = renderer.renderTemplate(template, { className: 1, other: "x" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(
          "Template 'test-template' validation failed: Variable 'className' expected type 'string' but got 'number'; Unknown variables: other"
        );
      }
    });

    it("renders with unresolved placeholders when not strict", () => {
      const result = renderer.renderTemplate(template, {}, { strict: false });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.content).toBe("Write tests for {{className}}.\nDeps:\n(none)");
        expect(result.data.unresolved).toEqual(["className"]);
      }
    });
  });
});
