import { describe, expect, test } from "vitest"
import { loadConfig } from "../src/config"
import { buildWhereClause, ChromaRetriever, matchesDateRange } from "../src/services/retriever"

interface RecordedCall {
  method: string
  url: string
  body: unknown
}

function jsonReply(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json" },
  })
}

function makeRetriever(routes: Record<string, unknown>) {
  const calls: RecordedCall[] = []
  const retriever = new ChromaRetriever(loadConfig({ INSIGHTGATE_CHROMA_URL: "http://chroma.test/" }), {
    embedder: async () => [0.1, 0.2, 0.3],
    fetchImpl: async (input, init) => {
      const url = String(input)
      const method = init?.method ?? "GET"
      calls.push({ method, url, body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined })

      const key = `${method} ${new URL(url).pathname}`
      if (!(key in routes)) {
        return jsonReply({ error: "not found" }, 404)
      }
      return jsonReply(routes[key])
    },
  })
  return { retriever, calls }
}

const COLLECTION_ROUTE = { "GET /api/v1/collections/sentiment_data": { id: "col-1", name: "sentiment_data" } }

describe("chroma retriever search", () => {
  test("queries the collection and returns chunks ordered by distance", async () => {
    const { retriever, calls } = makeRetriever({
      ...COLLECTION_ROUTE,
      "POST /api/v1/collections/col-1/query": {
        ids: [["b", "a"]],
        documents: [["Second", "First"]],
        metadatas: [[{ type: "monthly", country: "Spain" }, null]],
        distances: [[0.4, 0.2]],
      },
    })

    const result = await retriever.search("sentiment in spain", 5, { countries: ["Spain"] })

    expect(result).toEqual({
      ok: true,
      chunks: [
        { id: "a", text: "First", metadata: {}, distance: 0.2 },
        { id: "b", text: "Second", metadata: { type: "monthly", country: "Spain" }, distance: 0.4 },
      ],
    })
    expect(calls.map((call) => `${call.method} ${call.url}`)).toEqual([
      "GET http://chroma.test/api/v1/collections/sentiment_data",
      "POST http://chroma.test/api/v1/collections/col-1/query",
    ])
    expect(calls[1]?.body).toEqual({
      query_embeddings: [[0.1, 0.2, 0.3]],
      n_results: 5,
      include: ["documents", "metadatas", "distances"],
      where: { country: { $in: ["Spain"] } },
    })
  })

  test("caches the collection id between searches", async () => {
    const { retriever, calls } = makeRetriever({
      ...COLLECTION_ROUTE,
      "POST /api/v1/collections/col-1/query": { ids: [[]] },
    })

    await retriever.search("one", 3)
    await retriever.search("two", 3)

    expect(calls.filter((call) => call.method === "GET")).toHaveLength(1)
  })

  test("drops chunks outside the requested date range", async () => {
    const { retriever } = makeRetriever({
      ...COLLECTION_ROUTE,
      "POST /api/v1/collections/col-1/query": {
        ids: [["old", "new", "undated"]],
        documents: [["Old", "New", "Undated"]],
        metadatas: [[{ date: "2001-03-01" }, { date: "2020-06-01" }, { type: "country_summary" }]],
        distances: [[0.1, 0.2, 0.3]],
      },
    })

    const result = await retriever.search("sentiment", 3, { startDate: "2020-01-01" })

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.chunks.map((chunk) => chunk.id)).toEqual(["new", "undated"])
    }
  })

  test("reports upstream failures as an error result", async () => {
    const { retriever } = makeRetriever({})

    const result = await retriever.search("sentiment", 3)

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBe('Vector store returned 404: {"error":"not found"}')
    }
  })

  test("reports embedding failures as an error result", async () => {
    const retriever = new ChromaRetriever(loadConfig({}), {
      embedder: async () => {
        throw new Error("embedding offline")
      },
    })

    expect(await retriever.search("sentiment", 3)).toEqual({ ok: false, error: "embedding offline" })
  })
})

test("stats counts chunk types in a sample", async () => {
  const { retriever, calls } = makeRetriever({
    ...COLLECTION_ROUTE,
    "GET /api/v1/collections/col-1/count": 3,
    "POST /api/v1/collections/col-1/get": {
      ids: ["a", "b", "c"],
      metadatas: [{ type: "daily" }, { type: "daily" }, null],
    },
  })

  expect(await retriever.stats()).toEqual({
    totalChunks: 3,
    chunkTypesSample: { daily: 2, unknown: 1 },
  })
  expect(calls[2]?.body).toEqual({ limit: 3, include: ["metadatas"] })
})

test("countries reads country summary metadata", async () => {
  const { retriever, calls } = makeRetriever({
    ...COLLECTION_ROUTE,
    "POST /api/v1/collections/col-1/get": {
      ids: ["s2", "s1", "broken"],
      metadatas: [
        { type: "country_summary", country: "Spain", start_date: "2010-01-01", end_date: "2020-12-31", mean: 0.2, std: 0.05 },
        { type: "country_summary", country: "Chile", start_date: "2012-01-01", end_date: "2019-12-31" },
        { type: "country_summary", start_date: "2012-01-01" },
      ],
    },
  })

  expect(await retriever.countries()).toEqual([
    { name: "Chile", dataStart: "2012-01-01", dataEnd: "2019-12-31", meanSentiment: null, stdSentiment: null },
    { name: "Spain", dataStart: "2010-01-01", dataEnd: "2020-12-31", meanSentiment: 0.2, stdSentiment: 0.05 },
  ])
  expect(calls[1]?.body).toEqual({ where: { type: "country_summary" }, include: ["metadatas"] })
})

describe("buildWhereClause", () => {
  test("returns undefined without filters", () => {
    expect(buildWhereClause(undefined)).toBeUndefined()
    expect(buildWhereClause({ countries: [] })).toBeUndefined()
  })

  test("combines several clauses with $and", () => {
    expect(buildWhereClause({ countries: ["Chile"], types: ["anomaly"] })).toEqual({
      $and: [{ country: { $in: ["Chile"] } }, { type: { $in: ["anomaly"] } }],
    })
  })
})

describe("matchesDateRange", () => {
  test("checks overlap for spans", () => {
    const span = { start_date: "2019-01-01", end_date: "2019-12-31" }

    expect(matchesDateRange(span, { startDate: "2019-06-01" })).toBe(true)
    expect(matchesDateRange(span, { startDate: "2020-01-01" })).toBe(false)
    expect(matchesDateRange(span, { endDate: "2018-12-31" })).toBe(false)
    expect(matchesDateRange(span, { startDate: "2018-01-01", endDate: "2019-01-01" })).toBe(true)
  })
})
