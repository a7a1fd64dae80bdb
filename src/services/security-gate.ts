import type pino from "pino"
import type { SecuritySettings } from "../config"
import type { DenialCategory, DenialReason, GateDecision, GateDenial, QueryRecord } from "../types"
import {
  containsCodeExecution,
  containsSqlInjection,
  detectDataTheft,
  detectPromptInjection,
  isEnumerationPattern,
  requestsSensitiveInfo,
} from "./classifiers"
import { KeyedLock } from "./keyed-lock"
import { normalizeForSecurity } from "./obfuscation-normalizer"
import { hashUserId, InMemoryUserStateStore, QUERY_LOG_CAP, type UserStateStore } from "./user-state-store"

export const MIN_QUERY_LENGTH = 1
export const MAX_QUERY_LENGTH = 1000
export const VIOLATION_BLOCK_THRESHOLD = 3
export const BLOCK_DURATION_MS = 60 * 60 * 1000
export const SIMILARITY_THRESHOLD = 0.8
export const SIMILARITY_LOOKBACK = 5
export const SIMILAR_QUERY_LIMIT = 3
export const BURST_WINDOW_MS = 30 * 1000
export const BURST_QUERY_LIMIT = 10
export const TRUNCATION_NOTICE = "\n\n[Response truncated due to size limits]"

const MINUTE_MS = 60 * 1000
const HOUR_MS = 60 * MINUTE_MS

const DENIAL_MESSAGES: Record<DenialReason, string> = {
  blocked: "User temporarily blocked for suspicious activity",
  too_short: `Query too short (minimum ${MIN_QUERY_LENGTH} character${MIN_QUERY_LENGTH === 1 ? "" : "s"})`,
  too_long: `Query too long (maximum ${MAX_QUERY_LENGTH} characters)`,
  prompt_injection: "Query contains suspicious patterns that may be attempting prompt injection",
  sql_injection: "Query contains SQL injection patterns",
  code_execution: "Query contains code execution patterns",
  sensitive_info: "Query requests sensitive system information",
  data_theft:
    "This query appears to be attempting to extract proprietary data. Please ask specific analytical questions instead.",
  bulk_extraction:
    "Query appears to be attempting bulk data extraction. Please ask analytical questions instead of requesting raw data.",
  rate_limited: "Rate limit exceeded. Please try again later.",
  internal_error: "Query could not be validated",
}

const DENIAL_CATEGORIES: Record<DenialReason, DenialCategory> = {
  blocked: "blocked",
  too_short: "invalid_input",
  too_long: "invalid_input",
  prompt_injection: "policy_violation",
  sql_injection: "policy_violation",
  code_execution: "policy_violation",
  sensitive_info: "policy_violation",
  data_theft: "policy_violation",
  bulk_extraction: "policy_violation",
  rate_limited: "rate_limited",
  internal_error: "policy_violation",
}

const RESPONSE_LEAK_KEYWORDS = ["system prompt", "instruction", "your role is", "api key", "secret"]

export interface SecurityGateOptions {
  settings: SecuritySettings
  logger: pino.Logger
  store?: UserStateStore
  lock?: KeyedLock
  now?: () => number
}

export interface ResponseGuardResult {
  text: string
  truncated: boolean
  estimatedTokens: number
}

interface BulkFinding {
  ruleId: string
  warning?: string
}

export function denial(reason: DenialReason, warning?: string): GateDenial {
  const decision: GateDenial = {
    allowed: false,
    reason,
    category: DENIAL_CATEGORIES[reason],
    message: DENIAL_MESSAGES[reason],
  }

  if (warning) {
    decision.warning = warning
  }

  return decision
}

export function wordSet(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/\s+/)
      .filter((word) => word.length > 0),
  )
}

export function jaccardSimilarity(left: string, right: string): number {
  const a = wordSet(left)
  const b = wordSet(right)
  if (a.size === 0 || b.size === 0) {
    return 0
  }

  let intersection = 0
  for (const word of a) {
    if (b.has(word)) {
      intersection += 1
    }
  }

  const union = a.size + b.size - intersection
  return union > 0 ? intersection / union : 0
}

export class SecurityGate {
  private readonly store: UserStateStore
  private readonly lock: KeyedLock
  private readonly now: () => number

  constructor(private readonly options: SecurityGateOptions) {
    this.store = options.store ?? new InMemoryUserStateStore()
    this.lock = options.lock ?? new KeyedLock()
    this.now = options.now ?? Date.now
  }

  async validate(query: string, userId: string): Promise<GateDecision> {
    const userKey = hashUserId(userId)

    return this.lock.run(userKey, async () => {
      try {
        return await this.evaluate(query, userKey)
      } catch (error) {
        this.options.logger.error({ error, userKey }, "security gate check failed; denying query")
        return denial("internal_error")
      }
    })
  }

  guardResponse(text: string): ResponseGuardResult {
    const maxTokens = this.options.settings.maxResponseTokens
    const estimatedTokens = text.length / 4

    if (estimatedTokens <= maxTokens) {
      return { text, truncated: false, estimatedTokens }
    }

    return {
      text: text.slice(0, maxTokens * 4) + TRUNCATION_NOTICE,
      truncated: true,
      estimatedTokens,
    }
  }

  inspectResponse(text: string): string[] {
    const lower = text.toLowerCase()
    return RESPONSE_LEAK_KEYWORDS.filter((keyword) => lower.includes(keyword))
  }

  private async evaluate(query: string, userKey: string): Promise<GateDecision> {
    const now = this.now()
    const logger = this.options.logger

    const blockedUntil = await this.store.getBlock(userKey)
    if (blockedUntil !== undefined) {
      if (now < blockedUntil) {
        logger.info({ userKey }, "query from blocked user rejected")
        return denial("blocked")
      }

      await this.store.clearBlock(userKey)
      logger.info({ userKey }, "user block expired")
    }

    // Counted in code points, so astral characters weigh one each.
    const length = [...query].length
    if (length < MIN_QUERY_LENGTH) {
      return denial("too_short")
    }

    if (length > MAX_QUERY_LENGTH) {
      return denial("too_long")
    }

    const injection = detectPromptInjection(query)
    if (injection) {
      return this.recordViolation(userKey, query, now, "prompt_injection", injection.ruleId)
    }

    if (containsSqlInjection(query)) {
      return this.recordViolation(userKey, query, now, "sql_injection", "sql")
    }

    if (containsCodeExecution(query)) {
      return this.recordViolation(userKey, query, now, "code_execution", "code")
    }

    if (requestsSensitiveInfo(query)) {
      logger.warn({ userKey, queryPreview: query.slice(0, 100) }, "sensitive information request rejected")
      return denial("sensitive_info")
    }

    if (detectDataTheft(query)) {
      return this.recordViolation(userKey, query, now, "data_theft", "data_theft")
    }

    const log = await this.store.getLog(userKey)

    const bulk = this.detectBulkExtraction(query, log, now)
    if (bulk) {
      return this.recordViolation(userKey, query, now, "bulk_extraction", bulk.ruleId, bulk.warning)
    }

    if (this.options.settings.rateLimitEnabled && this.isRateLimited(log, now)) {
      logger.warn({ userKey }, "rate limit exceeded")
      return denial("rate_limited")
    }

    await this.store.appendQuery(userKey, { text: query, timestamp: now }, QUERY_LOG_CAP)
    return { allowed: true, reason: "ok" }
  }

  private detectBulkExtraction(query: string, log: QueryRecord[], now: number): BulkFinding | null {
    if (isEnumerationPattern(query)) {
      return { ruleId: "enumeration" }
    }

    const similarCount = log
      .slice(-SIMILARITY_LOOKBACK)
      .filter((record) => jaccardSimilarity(query, record.text) > SIMILARITY_THRESHOLD).length
    if (similarCount >= SIMILAR_QUERY_LIMIT) {
      return { ruleId: "similar_sequence", warning: "Multiple similar queries detected" }
    }

    const burstCount = log.filter((record) => now - record.timestamp < BURST_WINDOW_MS).length
    if (burstCount >= BURST_QUERY_LIMIT) {
      return { ruleId: "rapid_fire", warning: "High query frequency detected" }
    }

    return null
  }

  private isRateLimited(log: QueryRecord[], now: number): boolean {
    const { maxQueriesPerMinute, maxQueriesPerHour } = this.options.settings

    const lastMinute = log.filter((record) => now - record.timestamp < MINUTE_MS).length
    if (lastMinute >= maxQueriesPerMinute) {
      return true
    }

    const lastHour = log.filter((record) => now - record.timestamp < HOUR_MS).length
    return lastHour >= maxQueriesPerHour
  }

  private async recordViolation(
    userKey: string,
    query: string,
    now: number,
    reason: DenialReason,
    ruleId: string,
    warning?: string,
  ): Promise<GateDenial> {
    const logger = this.options.logger
    const violations = await this.store.incrementViolations(userKey)

    logger.warn(
      {
        userKey,
        reason,
        rule: ruleId,
        violations,
        signalFlags: normalizeForSecurity(query).signalFlags,
        queryPreview: query.slice(0, 100),
      },
      "policy violation",
    )

    if (violations >= VIOLATION_BLOCK_THRESHOLD) {
      await this.store.setBlock(userKey, now + BLOCK_DURATION_MS)
      await this.store.resetViolations(userKey)
      logger.warn({ userKey, violations }, "user blocked for repeated violations")
    }

    return denial(reason, warning)
  }
}
