import type { AppConfig } from "./config"
import type { Loggers } from "./logger"
import type { QueryPipeline } from "./services/query-pipeline"
import type { Retriever } from "./services/retriever"

export interface ServerContext {
  config: AppConfig
  loggers: Loggers
  retriever: Retriever
  pipeline: QueryPipeline
}
