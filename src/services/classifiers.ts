import { normalizeForSecurity } from "./obfuscation-normalizer"

export interface PatternRule {
  id: string
  pattern: RegExp
}

export type InjectionSignal = "phrase" | "encoded_payload" | "delimiter_instruction"

export interface InjectionMatch {
  signal: InjectionSignal
  ruleId: string
}

export const INJECTION_RULES: PatternRule[] = [
  { id: "ignore_previous", pattern: /ignore\s+(all\s+)?(previous|prior|above|earlier)\s+instructions?/i },
  { id: "disregard_previous", pattern: /disregard\s+(all\s+)?(previous|prior|above|earlier)/i },
  { id: "forget_previous", pattern: /forget\s+(all\s+)?(previous|prior|above|earlier)/i },
  { id: "you_are_now", pattern: /you\s+are\s+now/i },
  { id: "new_role", pattern: /your\s+new\s+(role|instruction|task)\s+is/i },
  { id: "system_prompt", pattern: /system\s+prompt/i },
  { id: "show_prompt", pattern: /show\s+(me\s+)?(your|the)\s+(prompt|instruction|system)/i },
  { id: "ask_instructions", pattern: /what\s+(is|are)\s+your\s+(instruction|rule|prompt)/i },
  { id: "reveal_instructions", pattern: /reveal\s+your\s+(instruction|rule|prompt)/i },
  { id: "bypass_security", pattern: /bypass\s+(security|filter|restriction)/i },
  { id: "jailbreak", pattern: /jailbreak/i },
  // Anchored: "dan" also ends ordinary words such as "jordan".
  { id: "dan_mode", pattern: /\bdan\s+mode/i },
  { id: "developer_mode", pattern: /developer\s+mode/i },
  { id: "admin_mode", pattern: /admin\s+mode/i },
  { id: "act_as_if", pattern: /act\s+as\s+if/i },
  { id: "pretend", pattern: /pretend\s+(you|to\s+be)/i },
  { id: "roleplay", pattern: /roleplay\s+as/i },
]

export const ENCODED_PAYLOAD_RE = /[A-Za-z0-9+/]{50,}={0,2}/
export const DELIMITER_RUNS = ["---", "===", "***", "###"]
export const DELIMITER_KEYWORDS = ["instruction", "system", "prompt", "ignore"]

export const SQL_INJECTION_RULES: PatternRule[] = [
  { id: "sql_statement", pattern: /(union\s+select|drop\s+table|delete\s+from|insert\s+into|update\s+set)/i },
  { id: "sql_select_all", pattern: /\bselect\s+\*\s+from\b/i },
  { id: "sql_comment", pattern: /(--|\/\*|\*\/)/ },
  { id: "sql_chained_statement", pattern: /;\s*(drop|delete|insert|update|select|alter|truncate|exec)\b/i },
  { id: "sql_extended_procedure", pattern: /\b(xp|sp)_\w+/i },
  { id: "sql_tautology", pattern: /\b(or|and)\b\s+\d+\s*=\s*\d+/i },
  { id: "sql_quoted_tautology", pattern: /'\s*(or|and)\s+'?\w+'?\s*=\s*'?\w+/i },
]

export const CODE_EXECUTION_RULES: PatternRule[] = [
  { id: "dynamic_eval", pattern: /\b(eval|exec)\b/i },
  { id: "compile_call", pattern: /\bcompile\s*\(/i },
  { id: "interpreter_internals", pattern: /(__import__|__builtins__|\bglobals\s*\(|\blocals\s*\()/i },
  { id: "process_spawn", pattern: /(\bsubprocess\b|\bos\.system\b|\bos\.popen\b|\bchild_process\b|\bspawn\s*\()/i },
  { id: "serialization_gadget", pattern: /\b(pickle|marshal|importlib)\b/i },
  { id: "module_import", pattern: /\bimport\s+(os|sys|shutil|socket|subprocess|importlib)\b/i },
  { id: "module_require", pattern: /\brequire\s*\(\s*['"]/i },
]

export const SENSITIVE_INFO_RULES: PatternRule[] = [
  { id: "api_key", pattern: /api[_\s-]?key/i },
  { id: "secret_key", pattern: /secret[_\s-]?key/i },
  { id: "secret", pattern: /\bsecrets?\b/i },
  { id: "password", pattern: /password/i },
  { id: "auth_token", pattern: /auth[_\s-]?token/i },
  { id: "token", pattern: /token/i },
  { id: "credential", pattern: /credential/i },
]

export const DATA_THEFT_RULES: PatternRule[] = [
  { id: "export_all", pattern: /export\s+(all|entire|complete|full)\s+(data|database|records)/i },
  { id: "download_all", pattern: /download\s+(all|entire|complete|full)\s+(data|database)/i },
  { id: "give_me_all", pattern: /give\s+me\s+(all|entire|complete|full|every)\s+(data|records|entries)/i },
  { id: "show_all", pattern: /show\s+(me\s+)?(all|entire|complete|full|every)\s+(data|records|entries)/i },
  { id: "dump", pattern: /dump\s+(data|database|table|records)/i },
  { id: "extract_all", pattern: /extract\s+(all|entire|complete)\s+(data|records)/i },
]

export const ENUMERATION_RULES: PatternRule[] = [
  { id: "enumerate_all", pattern: /(give\s+me\s+all|list\s+all|show\s+all|dump\s+all)/i },
  { id: "every_record", pattern: /(every\s+record|every\s+entry|all\s+records|all\s+entries)/i },
  { id: "numeric_range", pattern: /(from\s+\d+\s+to\s+\d+|between\s+\d+\s+and\s+\d+)/i },
]

function textViews(text: string): string[] {
  const normalized = normalizeForSecurity(text).normalizedText
  return normalized === text ? [text] : [text, normalized]
}

export function firstMatchingRule(rules: PatternRule[], text: string): string | null {
  const views = textViews(text)
  for (const rule of rules) {
    if (views.some((view) => rule.pattern.test(view))) {
      return rule.id
    }
  }

  return null
}

export function detectPromptInjection(text: string): InjectionMatch | null {
  const phraseRule = firstMatchingRule(INJECTION_RULES, text)
  if (phraseRule) {
    return { signal: "phrase", ruleId: phraseRule }
  }

  const lower = text.toLowerCase()
  const delimiter = DELIMITER_RUNS.find((run) => text.includes(run))
  if (delimiter && DELIMITER_KEYWORDS.some((keyword) => lower.includes(keyword))) {
    return { signal: "delimiter_instruction", ruleId: "delimiter_with_instruction" }
  }

  if (ENCODED_PAYLOAD_RE.test(text)) {
    return { signal: "encoded_payload", ruleId: "base64_run" }
  }

  return null
}

export function containsPromptInjection(text: string): boolean {
  return detectPromptInjection(text) !== null
}

export function containsSqlInjection(text: string): boolean {
  return firstMatchingRule(SQL_INJECTION_RULES, text) !== null
}

export function containsCodeExecution(text: string): boolean {
  return firstMatchingRule(CODE_EXECUTION_RULES, text) !== null
}

export function requestsSensitiveInfo(text: string): boolean {
  return firstMatchingRule(SENSITIVE_INFO_RULES, text) !== null
}

export function detectDataTheft(text: string): boolean {
  return firstMatchingRule(DATA_THEFT_RULES, text) !== null
}

export function isEnumerationPattern(text: string): boolean {
  return firstMatchingRule(ENUMERATION_RULES, text) !== null
}
