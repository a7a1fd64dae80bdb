import { loadConfig } from "./config"
import { createLoggers } from "./logger"
import { buildServer } from "./server"
import type { ServerContext } from "./server-context"
import { LlmGenerator } from "./services/generator"
import { QueryPipeline } from "./services/query-pipeline"
import { ChromaRetriever } from "./services/retriever"
import { SecurityGate } from "./services/security-gate"

const config = loadConfig()
const loggers = createLoggers(config)
const gate = new SecurityGate({ settings: config.security, logger: loggers.security })
const retriever = new ChromaRetriever(config)
const generator = new LlmGenerator(config)
const pipeline = new QueryPipeline({
  gate,
  retriever,
  generator,
  loggers,
  retrievalTopK: config.retrievalTopK,
})

const ctx: ServerContext = {
  config,
  loggers,
  retriever,
  pipeline,
}

const app = buildServer(ctx)

try {
  await app.listen({ port: config.port, host: config.host })
} catch (error) {
  loggers.app.fatal({ error }, "failed to start server")
  process.exit(1)
}

loggers.app.info(
  {
    host: config.host,
    port: config.port,
    llmProvider: config.llmProvider,
    llmModel: config.llmModel,
    rateLimitEnabled: config.security.rateLimitEnabled,
    collection: config.vectorStore.collection,
  },
  "insight-gate started",
)

console.log(`insight-gate listening on http://${config.host}:${config.port}`)
