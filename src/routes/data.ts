import type { FastifyReply, FastifyRequest } from "fastify"
import { sendError } from "../lib/http"
import type { ServerContext } from "../server-context"
import type { CountrySummary } from "../services/retriever"

const DAY_MS = 24 * 60 * 60 * 1000

export interface DateRange {
  startDate: string
  endDate: string
  totalDays: number
}

export function datasetDateRange(countries: CountrySummary[]): DateRange | null {
  if (countries.length === 0) {
    return null
  }

  let startDate = countries[0].dataStart
  let endDate = countries[0].dataEnd
  for (const country of countries) {
    if (country.dataStart < startDate) {
      startDate = country.dataStart
    }
    if (country.dataEnd > endDate) {
      endDate = country.dataEnd
    }
  }

  const totalDays = Math.round((Date.parse(endDate) - Date.parse(startDate)) / DAY_MS) + 1
  return { startDate, endDate, totalDays }
}

export async function handleCountries(_request: FastifyRequest, reply: FastifyReply, ctx: ServerContext) {
  try {
    const countries = await ctx.retriever.countries()
    return countries.map((country) => ({
      name: country.name,
      data_start: country.dataStart,
      data_end: country.dataEnd,
      mean_sentiment: country.meanSentiment,
      std_sentiment: country.stdSentiment,
    }))
  } catch (error) {
    ctx.loggers.app.error({ error }, "failed to list countries")
    return sendError(reply, 502, "Vector store unavailable")
  }
}

export async function handleDateRange(_request: FastifyRequest, reply: FastifyReply, ctx: ServerContext) {
  try {
    const range = datasetDateRange(await ctx.retriever.countries())
    if (!range) {
      return sendError(reply, 404, "No country data available")
    }

    return {
      start_date: range.startDate,
      end_date: range.endDate,
      total_days: range.totalDays,
    }
  } catch (error) {
    ctx.loggers.app.error({ error }, "failed to compute dataset date range")
    return sendError(reply, 502, "Vector store unavailable")
  }
}
