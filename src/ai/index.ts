/**
 * AI Service Module
 *
 * Model access for test generation: provider clients behind one
 * `complete()` call, and the adapter the generator calls through.
 */

export { AIService, createAIService, createModelCaller } from "./service.js";
export type {
  AIConfig,
  AIProvider,
  AIResponse,
  AIErrorKind,
  CompletionRequest,
  Message,
  ModelCaller,
} from "./types.js";
