/**
 * AI Service Implementation
 *
 * Provides a unified interface for completions across providers.
 * Supports Anthropic Claude and OpenAI GPT models, plus an offline mock.
 */

import { z } from "zod";

import { ModelServiceError, ModelTimeoutError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import type {
  AIConfig,
  AIProvider,
  AIResponse,
  CompletionRequest,
  ModelCaller,
} from "./types.js";

const log = logger.child("[ai]");

const DEFAULT_CONFIG: Required<AIConfig> = {
  provider: "anthropic",
  apiKey: "",
  model: "claude-sonnet-4-20250514",
  maxTokens: 4096,
  temperature: 0.2,
  timeoutMs: 60000,
};

const PROVIDER_MODELS: Record<AIProvider, string> = {
  anthropic: "claude-sonnet-4-20250514",
  openai: "gpt-4o",
  mock: "mock-model",
};

const PROVIDER_ENDPOINTS: Record<AIProvider, string> = {
  anthropic: "https://api.anthropic.com/v1/messages",
  openai: "https://api.openai.com/v1/chat/completions",
  mock: "",
};

const API_KEY_ENV_VARS: Record<Exclude<AIProvider, "mock">, string> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
};

const AnthropicReplySchema = z.object({
  content: z.array(z.object({ text: z.string() })),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }),
});

const OpenAIReplySchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string() }) })),
  usage: z.object({ prompt_tokens: z.number(), completion_tokens: z.number() }),
});

function parseReply<T>(schema: z.ZodType<T>, body: unknown, providerLabel: string): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ModelServiceError(`${providerLabel} API returned an unexpected payload`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

interface ProviderReply {
  content: string;
  usage: { inputTokens: number; outputTokens: number };
}

/**
 * AI Service for generating completions
 */
export class AIService {
  private readonly config: Required<AIConfig>;

  constructor(config: Partial<AIConfig> = {}) {
    const provider = config.provider ?? DEFAULT_CONFIG.provider;
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      provider,
      apiKey: config.apiKey ?? this.getApiKeyFromEnv(provider),
      model: config.model ?? PROVIDER_MODELS[provider],
    };
  }

  private getApiKeyFromEnv(provider: AIProvider): string {
    if (provider === "mock") return "mock-key";
    return process.env[API_KEY_ENV_VARS[provider]] ?? "";
  }

  /**
   * Check if the service is configured with an API key
   */
  isConfigured(): boolean {
    return this.config.provider === "mock" || this.config.apiKey.length > 0;
  }

  getProvider(): AIProvider {
    return this.config.provider;
  }

  getModel(): string {
    return this.config.model;
  }

  getTimeoutMs(): number {
    return this.config.timeoutMs;
  }

  /**
   * Generate a completion. Never throws; failures come back as
   * `success: false` with an `errorKind`.
   */
  async complete(request: CompletionRequest): Promise<AIResponse<string>> {
    const startTime = Date.now();
    const provider = this.config.provider;

    if (!this.isConfigured()) {
      const envVar = provider === "mock" ? "" : API_KEY_ENV_VARS[provider];
      return {
        success: false,
        error: `API key not configured for ${provider}. Set ${envVar} environment variable or run \`testsmith config set-key ${provider} <key>\`.`,
        errorKind: "config",
        durationMs: Date.now() - startTime,
      };
    }

    if (provider === "mock") {
      return this.mockComplete(request, startTime);
    }

    try {
      const response = await this.callProvider(request);
      return {
        success: true,
        data: response.content,
        usage: response.usage,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : "Unknown error",
        errorKind: error instanceof ModelTimeoutError ? "timeout" : "provider",
        durationMs: Date.now() - startTime,
      };
    }
  }

  private async callProvider(request: CompletionRequest): Promise<ProviderReply> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      if (this.config.provider === "anthropic") {
        return await this.callAnthropic(request, controller.signal);
      }
      return await this.callOpenAI(request, controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ModelTimeoutError(this.config.timeoutMs, { provider: this.config.provider });
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  private async callAnthropic(request: CompletionRequest, signal: AbortSignal): Promise<ProviderReply> {
    const messages = request.messages.filter((m) => m.role !== "system");

    const response = await fetch(PROVIDER_ENDPOINTS.anthropic, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.config.apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: JSON.stringify({
        model: request.model ?? this.config.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        temperature: request.temperature ?? this.config.temperature,
        system: request.systemPrompt,
        messages: messages.map((m) => ({
          role: m.role,
          content: m.content,
        })),
      }),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new ModelServiceError(`Anthropic API error: ${response.status} - ${error}`, {
        status: response.status,
      });
    }

    const data = parseReply(AnthropicReplySchema, await response.json(), "Anthropic");

    return {
      content: data.content[0]?.text ?? "",
      usage: {
        inputTokens: data.usage.input_tokens,
        outputTokens: data.usage.output_tokens,
      },
    };
  }

  private async callOpenAI(request: CompletionRequest, signal: AbortSignal): Promise<ProviderReply> {
    const messages: Array<{ role: string; content: string }> = [];

    if (request.systemPrompt !== undefined && request.systemPrompt.length > 0) {
      messages.push({ role: "system", content: request.systemPrompt });
    }

    for (const m of request.messages) {
      messages.push({ role: m.role, content: m.content });
    }

    const response = await fetch(PROVIDER_ENDPOINTS.openai, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        model: request.model ?? this.config.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        temperature: request.temperature ?? this.config.temperature,
        messages,
      }),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new ModelServiceError(`OpenAI API error: ${response.status} - ${error}`, {
        status: response.status,
      });
    }

    const data = parseReply(OpenAIReplySchema, await response.json(), "OpenAI");

    return {
      content: data.choices[0]?.message.content ?? "",
      usage: {
        inputTokens: data.usage.prompt_tokens,
        outputTokens: data.usage.completion_tokens,
      },
    };
  }

  /**
   * Offline completion: a minimal JUnit 5 test for the class named in the prompt
   */
  private mockComplete(request: CompletionRequest, startTime: number): AIResponse<string> {
    const lastMessage = request.messages[request.messages.length - 1];
    const content = lastMessage?.content ?? "";
    const className = /Class under test:\s*(\w+)/.exec(content)?.[1] ?? "Subject";

    const response = [
      "Here is the generated test:",
      "",
      "```java",
      "import org.junit.jupiter.api.Test;",
      "import static org.junit.jupiter.api.Assertions.*;",
      "",
      `public class ${className}Test {`,
      "    @Test",
      "    void createsInstance() {",
      `        assertNotNull(new ${className}());`,
      "    }",
      "}",
      "```",
    ].join("\n");

    return {
      success: true,
      data: response,
      usage: { inputTokens: 100, outputTokens: 50 },
      durationMs: Date.now() - startTime,
    };
  }
}

/**
 * Create an AI service instance
 */
export function createAIService(config?: Partial<AIConfig>): AIService {
  return new AIService(config);
}

/**
 * Adapt an {@link AIService} to the generator's {@link ModelCaller} shape.
 *
 * Failed completions are thrown: `ModelTimeoutError` for timeouts,
 * `ModelServiceError` for everything else.
 */
export function createModelCaller(service: AIService, options: { systemPrompt?: string } = {}): ModelCaller {
  return async (prompt, model) => {
    log.debug(`Requesting completion from ${service.getProvider()} (${model})`);

    const request: CompletionRequest = {
      messages: [{ role: "user", content: prompt }],
      model,
    };
    if (options.systemPrompt !== undefined) {
      request.systemPrompt = options.systemPrompt;
    }

    const response = await service.complete(request);

    if (!response.success || response.data === undefined) {
      const message = response.error ?? "No response data";
      if (response.errorKind === "timeout") {
        throw new ModelTimeoutError(service.getTimeoutMs(), { provider: service.getProvider() });
      }
      throw new ModelServiceError(message, {
        provider: service.getProvider(),
        kind: response.errorKind ?? "provider",
      });
    }

    log.debug(`Completion received in ${response.durationMs}ms`);
    return response.data;
  };
}
