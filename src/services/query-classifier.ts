import type { QueryType } from "../types"

type AnalyticQueryType = Exclude<QueryType, "historical">

// Checked in order; the first category with a matching keyword wins.
export const QUERY_KEYWORDS: ReadonlyArray<readonly [AnalyticQueryType, readonly string[]]> = [
  ["forecast", ["predict", "forecast", "future", "will be", "next"]],
  ["trend", ["trend", "trending", "pattern", "direction"]],
  ["correlation", ["correlate", "correlation", "relationship", "related"]],
  ["anomaly", ["anomaly", "unusual", "outlier", "spike", "drop"]],
]

export function classifyQuery(query: string): QueryType {
  const lower = query.toLowerCase()

  for (const [queryType, keywords] of QUERY_KEYWORDS) {
    if (keywords.some((keyword) => lower.includes(keyword))) {
      return queryType
    }
  }

  return "historical"
}
