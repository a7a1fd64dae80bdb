import type { FastifyReply } from "fastify"
import type { ServerContext } from "../server-context"

export function handleReadyz(reply: FastifyReply, ctx: ServerContext) {
  const openaiRequired = ctx.config.llmProvider === "openai"
  const openaiApiKeyConfigured = !openaiRequired || Boolean(ctx.config.openaiApiKey)
  const ollamaBaseUrlValid = ctx.config.llmProvider !== "ollama" || isValidUrl(ctx.config.ollamaBaseUrl)
  const vectorStoreUrlValid = isValidUrl(ctx.config.vectorStore.baseUrl)

  const checks = {
    llm_provider: ctx.config.llmProvider,
    openai_required: openaiRequired,
    openai_api_key_configured: openaiApiKeyConfigured,
    ollama_base_url_valid: ollamaBaseUrlValid,
    vector_store_url_valid: vectorStoreUrlValid,
  }

  const ready = openaiApiKeyConfigured && ollamaBaseUrlValid && vectorStoreUrlValid
  reply.code(ready ? 200 : 503)
  return {
    status: ready ? "ready" : "not_ready",
    timestamp: new Date().toISOString(),
    checks,
  }
}

function isValidUrl(value: string): boolean {
  try {
    const parsed = new URL(value)
    return parsed.protocol === "http:" || parsed.protocol === "https:"
  } catch {
    return false
  }
}
