export interface NormalizationResult {
  normalizedText: string
  signalFlags: string[]
}

const CONTROL_OR_INVISIBLE_RE =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F\u200B-\u200F\u202A-\u202E\u2060\u2066-\u2069\uFEFF]/g

// Cyrillic and Greek letters that render like Latin ones.
const CONFUSABLES: Record<string, string> = {
  а: "a",
  А: "A",
  е: "e",
  Е: "E",
  о: "o",
  О: "O",
  р: "p",
  Р: "P",
  с: "c",
  С: "C",
  у: "y",
  У: "Y",
  х: "x",
  Х: "X",
  і: "i",
  І: "I",
  ј: "j",
  Ј: "J",
  ԁ: "d",
  α: "a",
  Α: "A",
  ε: "e",
  Ε: "E",
  ι: "i",
  Ι: "I",
  κ: "k",
  Κ: "K",
  ο: "o",
  Ο: "O",
  ρ: "p",
  Ρ: "P",
  τ: "t",
  Τ: "T",
  υ: "u",
  ν: "v",
}

function mapConfusables(input: string): { text: string; replacedCount: number } {
  let replacedCount = 0
  let output = ""

  for (const char of input) {
    const mapped = CONFUSABLES[char]
    if (mapped) {
      replacedCount += 1
      output += mapped
    } else {
      output += char
    }
  }

  return { text: output, replacedCount }
}

/**
 * Produces a de-obfuscated view of a user query for phrase matching, plus
 * flags naming the obfuscation that was undone.
 * Punctuation is left untouched so that SQL comment markers and delimiter
 * runs survive normalization.
 */
export function normalizeForSecurity(input: string): NormalizationResult {
  const signalFlags: string[] = []

  let text = input

  const nfkc = text.normalize("NFKC")
  if (nfkc !== text) {
    signalFlags.push("unicode_compatibility_forms")
    text = nfkc
  }

  const stripped = text.replace(CONTROL_OR_INVISIBLE_RE, "")
  if (stripped !== text) {
    signalFlags.push("unicode_invisible_or_bidi")
    text = stripped
  }

  const confusableResult = mapConfusables(text)
  if (confusableResult.replacedCount > 0) {
    signalFlags.push("confusable_characters")
    text = confusableResult.text
  }

  text = text.toLowerCase().replace(/\s+/g, " ").trim()

  return {
    normalizedText: text,
    signalFlags,
  }
}
