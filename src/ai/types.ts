/**
 * AI Service Types
 */

export type AIProvider = "anthropic" | "openai" | "mock";

export interface AIConfig {
  /** AI provider to use */
  provider: AIProvider;
  /** API key (reads from config/env if not provided) */
  apiKey?: string;
  /** Default model (provider-specific) */
  model?: string;
  /** Maximum tokens in response */
  maxTokens?: number;
  /** Temperature (0-1) */
  temperature?: number;
  /** Timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Why a completion failed
 */
export type AIErrorKind = "config" | "provider" | "timeout";

export interface AIResponse<T = string> {
  success: boolean;
  data?: T;
  error?: string;
  errorKind?: AIErrorKind;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
  /** Response time in ms */
  durationMs: number;
}

export interface Message {
  role: "user" | "assistant" | "system";
  content: string;
}

export interface CompletionRequest {
  messages: Message[];
  /** Overrides the configured model for this request */
  model?: string;
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
}

/**
 * The one call the generator makes: prompt in, raw text out.
 * Failures are thrown as whatever the backing service raises.
 */
export type ModelCaller = (prompt: string, model: string) => Promise<string>;
