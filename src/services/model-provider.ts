import { createOpenAI } from "@ai-sdk/openai"
import type { EmbeddingModel, LanguageModel } from "ai"
import { createOllama } from "ollama-ai-provider"
import type { AppConfig } from "../config"

export class ProviderNotConfiguredError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ProviderNotConfiguredError"
  }
}

function requireOpenAiKey(config: AppConfig): string {
  if (!config.openaiApiKey) {
    throw new ProviderNotConfiguredError(
      "INSIGHTGATE_OPENAI_API_KEY required when INSIGHTGATE_LLM_PROVIDER=openai",
    )
  }

  return config.openaiApiKey
}

export function getLanguageModel(config: AppConfig): LanguageModel {
  if (config.llmProvider === "ollama") {
    return createOllama({ baseURL: config.ollamaBaseUrl })(config.llmModel)
  }

  return createOpenAI({ apiKey: requireOpenAiKey(config) })(config.llmModel)
}

export function getEmbeddingModel(config: AppConfig): EmbeddingModel<string> {
  if (config.llmProvider === "ollama") {
    return createOllama({ baseURL: config.ollamaBaseUrl }).embedding(config.embeddingModel)
  }

  return createOpenAI({ apiKey: requireOpenAiKey(config) }).embedding(config.embeddingModel)
}
