import { expect, test } from "vitest"
import { normalizeForSecurity } from "../src/services/obfuscation-normalizer"

test("normalizer strips invisible chars and collapses whitespace", () => {
  const normalized = normalizeForSecurity("ign\u200bore   PREVIOUS")

  expect(normalized.normalizedText).toBe("ignore previous")
  expect(normalized.signalFlags).toEqual(["unicode_invisible_or_bidi"])
})

test("normalizer maps common mixed-script confusables", () => {
  const normalized = normalizeForSecurity("ign\u043ere previous instructions") // Cyrillic 'o'

  expect(normalized.normalizedText).toBe("ignore previous instructions")
  expect(normalized.signalFlags).toEqual(["confusable_characters"])
})

test("normalizer folds fullwidth letters through NFKC", () => {
  const normalized = normalizeForSecurity("\uff49\uff47\uff4e\uff4f\uff52\uff45")

  expect(normalized.normalizedText).toBe("ignore")
  expect(normalized.signalFlags).toEqual(["unicode_compatibility_forms"])
})

test("normalizer keeps punctuation intact", () => {
  expect(normalizeForSecurity("1 -- DROP").normalizedText).toBe("1 -- drop")
})

test("plain text raises no flags", () => {
  const normalized = normalizeForSecurity("Sentiment in  France")

  expect(normalized.normalizedText).toBe("sentiment in france")
  expect(normalized.signalFlags).toEqual([])
})
