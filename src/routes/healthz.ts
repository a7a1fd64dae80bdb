import type { ServerContext } from "../server-context"

export function handleHealthz(ctx: ServerContext) {
  return {
    status: "ok",
    timestamp: new Date().toISOString(),
    checks: {
      llm_provider: ctx.config.llmProvider,
      llm_model: ctx.config.llmModel,
      rate_limit_enabled: ctx.config.security.rateLimitEnabled,
      vector_store_collection: ctx.config.vectorStore.collection,
    },
  }
}
