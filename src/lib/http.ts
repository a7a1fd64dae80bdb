import type { FastifyReply } from "fastify"

export interface ErrorPayload {
  error: {
    message: string
    details?: unknown
  }
}

export function errorPayload(message: string, details?: unknown): ErrorPayload {
  return {
    error: {
      message,
      details,
    },
  }
}

export function sendError(reply: FastifyReply, status: number, message: string, details?: unknown): ErrorPayload {
  reply.code(status)
  return errorPayload(message, details)
}
