import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

import { Command } from "commander";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { registerGenerateCommand } from "@/cli/commands/generate.js";

import type { MockInstance } from "vitest";

const SOURCE = `public class Calculator {
    public int add(int a, int b) { return a + b; }
}`;

const CALCULATOR_TEST_REPLY = `\`\`\`java
import org.junit.jupiter.api.Test;
import static org.junit.jupiter.api.Assertions.*;

public class CalculatorTest {
    @Test
    void addsNumbers() {
        assertEquals(3, new Calculator().add(1, 2));
    }
}
\`\`\``;

function openAIReply(content: string): Response {
  return new Response(
    JSON.stringify({
      choices: [{ message: { content } }],
      usage: { prompt_tokens: 10, completion_tokens: 20 },
    }),
    { status: 200, headers: { "Content-Type": "application/json" } }
  );
}

describe("generate command", () => {
  let root: string;
  let sourceFile: string;
  let stdout: MockInstance<typeof console.log>;
  let stderr: MockInstance<typeof console.error>;
  let exit: MockInstance<typeof process.exit>;

  function run(...args: string[]): Promise<Command> {
    const program = new Command().exitOverride();
    registerGenerateCommand(program);
    return program.parseAsync(["generate", ...args], { from: "user" });
  }

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "testsmith-generate-"));
    sourceFile = join(root, "Calculator.java");
    writeFileSync(sourceFile, SOURCE);

    vi.stubEnv("TESTSMITH_HOME", join(root, "home"));
    stdout = vi.spyOn(console, "log").mockImplementation(() => undefined);
    stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);
    exit = vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  it("registers the command", () => {
    const program = new Command();
    registerGenerateCommand(program);

    const command = program.commands.find((c) => c.name() === "generate");
    expect(command?.description()).toBe("Generate a JUnit 5 test class for a Java source file");
    expect(command?.options.map((o) => o.long)).toContain("--no-strict");
  });

  it("prints the generated test as JSON", async () => {
    await run(sourceFile, "-p", "mock", "--project-root", root, "-o", "json");

    expect(stdout).toHaveBeenCalledTimes(1);
    const printed: unknown = JSON.parse(String(stdout.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({
      filePath: "src/test/java/CalculatorTest.java",
      dependencies: ["org.mockito:mockito-core", "org.junit.jupiter:junit-jupiter"],
    });
    expect(exit).not.toHaveBeenCalled();
  });

  it("records the result in the project scratchpad", async () => {
    await run(sourceFile, "-p", "mock", "--project-root", root, "-o", "json");

    const state: unknown = JSON.parse(readFileSync(join(root, ".testsmith", "scratchpad.json"), "utf-8"));
    expect(state).toMatchObject({
      version: 1,
      entries: {
        last_generated_test: { className: "Calculator", filePath: "src/test/java/CalculatorTest.java" },
      },
    });
  });

  it("writes the test file under the project root", async () => {
    await run(sourceFile, "-p", "mock", "--project-root", root, "-o", "json", "--write");

    const target = join(root, "src", "test", "java", "CalculatorTest.java");
    expect(existsSync(target)).toBe(true);
    expect(readFileSync(target, "utf-8")).toContain("public class CalculatorTest {\n");
  });

  it("takes the class name from --class", async () => {
    await run(sourceFile, "-p", "mock", "--project-root", root, "-o", "json", "--class", "Adder");

    const printed: unknown = JSON.parse(String(stdout.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({ filePath: "src/test/java/AdderTest.java" });
  });

  it("sends the provider's own default model", async () => {
    vi.stubEnv("OPENAI_API_KEY", "test-secret");
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(openAIReply(CALCULATOR_TEST_REPLY));
    vi.stubGlobal("fetch", fetchMock);

    await run(sourceFile, "-p", "openai", "--project-root", root, "-o", "json");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
    expect(body).toMatchObject({ model: "gpt-4o" });
    expect(exit).not.toHaveBeenCalled();
  });

  it("prefers --model over the provider default", async () => {
    vi.stubEnv("OPENAI_API_KEY", "test-secret");
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(openAIReply(CALCULATOR_TEST_REPLY));
    vi.stubGlobal("fetch", fetchMock);

    await run(sourceFile, "-p", "openai", "--model", "gpt-4o-mini", "--project-root", root, "-o", "json");

    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
    expect(body).toMatchObject({ model: "gpt-4o-mini" });
  });

  it("uses the configured default provider when -p is omitted", async () => {
    const home = join(root, "home");
    mkdirSync(home, { recursive: true });
    writeFileSync(join(home, "config.json"), JSON.stringify({ defaultProvider: "mock" }));

    await run(sourceFile, "--project-root", root, "-o", "json");

    const printed: unknown = JSON.parse(String(stdout.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({ filePath: "src/test/java/CalculatorTest.java" });
    expect(exit).not.toHaveBeenCalled();
  });

  it("exits on an unknown provider", async () => {
    await expect(run(sourceFile, "-p", "nope", "--project-root", root)).rejects.toThrow("process.exit(1)");

    expect(exit).toHaveBeenCalledWith(1);
    expect(String(stderr.mock.calls[0]?.[0])).toContain("Invalid provider: nope. Use: anthropic, openai, mock");
  });

  it("exits when the source file is missing", async () => {
    await expect(run(join(root, "Missing.java"), "-p", "mock")).rejects.toThrow("process.exit(1)");
    expect(String(stderr.mock.calls[0]?.[0])).toContain("File not found:");
  });

  it("exits on an unknown output format", async () => {
    await expect(run(sourceFile, "-p", "mock", "-o", "xml")).rejects.toThrow("process.exit(1)");
    expect(String(stderr.mock.calls[0]?.[0])).toContain("Invalid output format: xml. Use: terminal, json");
  });
});
