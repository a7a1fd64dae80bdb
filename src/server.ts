import Fastify, { type FastifyError, type FastifyInstance, type HTTPMethods, type RouteHandlerMethod } from "fastify"
import { errorPayload, sendError } from "./lib/http"
import { handleChat, handleChatStats } from "./routes/chat"
import { handleCountries, handleDateRange } from "./routes/data"
import { handleHealthz } from "./routes/healthz"
import { handleReadyz } from "./routes/readyz"
import type { ServerContext } from "./server-context"

const ROUTED_METHODS: HTTPMethods[] = ["DELETE", "GET", "PATCH", "POST", "PUT"]

export function buildServer(ctx: ServerContext): FastifyInstance {
  const app = Fastify({
    logger: false,
    trustProxy: ctx.config.trustProxy,
    bodyLimit: ctx.config.bodyLimitBytes,
  })

  app.addHook("onResponse", async (request, reply) => {
    ctx.loggers.app.info(
      {
        method: request.method,
        pathname: request.url.split("?")[0],
        status: reply.statusCode,
        durationMs: Math.round(reply.elapsedTime),
      },
      "http request",
    )
  })

  app.setErrorHandler((error: FastifyError, _request, reply) => {
    const status = error.statusCode ?? 500
    if (status >= 500) {
      ctx.loggers.app.error({ error }, "unhandled request failure")
      return reply.code(status).send(errorPayload("Internal server error"))
    }

    return reply.code(status).send(errorPayload(error.message))
  })

  app.setNotFoundHandler(async (_request, reply) => sendError(reply, 404, "Route not found"))

  const route = (method: "GET" | "POST", url: string, handler: RouteHandlerMethod) => {
    app.route({ method, url, handler })
    app.route({
      method: ROUTED_METHODS.filter((other) => other !== method),
      url,
      handler: async (_request, reply) => sendError(reply, 405, "Method not allowed"),
    })
  }

  route("GET", "/healthz", async () => handleHealthz(ctx))
  route("GET", "/readyz", async (_request, reply) => handleReadyz(reply, ctx))
  route("POST", "/api/chat", (request, reply) => handleChat(request, reply, ctx))
  route("GET", "/api/chat/stats", (request, reply) => handleChatStats(request, reply, ctx))
  route("GET", "/api/data/countries", (request, reply) => handleCountries(request, reply, ctx))
  route("GET", "/api/data/date-range", (request, reply) => handleDateRange(request, reply, ctx))

  return app
}
