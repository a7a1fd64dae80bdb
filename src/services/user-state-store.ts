import { createHash } from "node:crypto"
import type { QueryRecord } from "../types"

export const QUERY_LOG_CAP = 100

/**
 * Per-user security state. Methods are async so a shared backend can stand
 * in for process memory when the gate runs on several instances.
 */
export interface UserStateStore {
  getLog(userKey: string): Promise<QueryRecord[]>
  appendQuery(userKey: string, record: QueryRecord, cap?: number): Promise<void>
  incrementViolations(userKey: string): Promise<number>
  resetViolations(userKey: string): Promise<void>
  getBlock(userKey: string): Promise<number | undefined>
  setBlock(userKey: string, expiresAt: number): Promise<void>
  clearBlock(userKey: string): Promise<void>
}

export function hashUserId(userId: string): string {
  return createHash("sha256").update(userId, "utf8").digest("hex").slice(0, 16)
}

export class InMemoryUserStateStore implements UserStateStore {
  private readonly logs = new Map<string, QueryRecord[]>()
  private readonly violations = new Map<string, number>()
  private readonly blocks = new Map<string, number>()

  async getLog(userKey: string): Promise<QueryRecord[]> {
    return [...(this.logs.get(userKey) ?? [])]
  }

  async appendQuery(userKey: string, record: QueryRecord, cap = QUERY_LOG_CAP): Promise<void> {
    const log = this.logs.get(userKey) ?? []
    log.push(record)
    if (log.length > cap) {
      log.splice(0, log.length - cap)
    }
    this.logs.set(userKey, log)
  }

  async incrementViolations(userKey: string): Promise<number> {
    const next = (this.violations.get(userKey) ?? 0) + 1
    this.violations.set(userKey, next)
    return next
  }

  async resetViolations(userKey: string): Promise<void> {
    this.violations.delete(userKey)
  }

  async getBlock(userKey: string): Promise<number | undefined> {
    return this.blocks.get(userKey)
  }

  async setBlock(userKey: string, expiresAt: number): Promise<void> {
    this.blocks.set(userKey, expiresAt)
  }

  async clearBlock(userKey: string): Promise<void> {
    this.blocks.delete(userKey)
  }

  get trackedUsers(): number {
    return new Set([...this.logs.keys(), ...this.violations.keys(), ...this.blocks.keys()]).size
  }
}
