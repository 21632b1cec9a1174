import { defaultScoringPolicy, type ScoringPolicy } from "../config"
import type { Candidate, ScoreBreakdown, VendorRecord } from "../types"

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]+/gu, " ")
    .split(/\s+/)
    .filter((token) => token.length > 0)
}

export function queryTerms(query: string): string[] {
  return [...new Set(tokenize(query))]
}

export function scoreRecord(
  terms: string[],
  record: VendorRecord,
  policy: ScoringPolicy = defaultScoringPolicy,
): { score: number; breakdown: ScoreBreakdown } {
  const nameTokens = new Set(tokenize(record.name))
  const notesCounts = countTokens(tokenize(record.notes))

  const nameMatches: string[] = []
  const notesMatches: string[] = []
  let repetitionBonus = 0

  for (const term of terms) {
    if (nameTokens.has(term)) {
      nameMatches.push(term)
    }

    const occurrences = notesCounts.get(term) ?? 0
    if (occurrences > 0) {
      notesMatches.push(term)
      repetitionBonus += (occurrences - 1) * policy.repetitionWeight
    }
  }

  const score =
    nameMatches.length * policy.nameWeight +
    notesMatches.length * policy.notesWeight +
    repetitionBonus

  return {
    score,
    breakdown: { nameMatches, notesMatches, repetitionBonus },
  }
}

/**
 * Ranks records against a free-text query.
 *
 * Records without any matching term are dropped. The result is ordered by
 * score, highest first; equal scores keep insertion order (the order of
 * `records`), whatever the ids are.
 */
export function search(
  query: string,
  records: VendorRecord[],
  policy: ScoringPolicy = defaultScoringPolicy,
): Candidate[] {
  const terms = queryTerms(query)
  if (terms.length === 0) {
    return []
  }

  const candidates: Candidate[] = []

  records.forEach((record, position) => {
    const { score, breakdown } = scoreRecord(terms, record, policy)
    if (score > 0) {
      candidates.push({ record, score, position, breakdown })
    }
  })

  return candidates.sort((left, right) => right.score - left.score || left.position - right.position)
}

function countTokens(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>()
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1)
  }
  return counts
}
