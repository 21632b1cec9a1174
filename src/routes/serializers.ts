import type { AgentDecision, Candidate, DecisionLogEntry, VendorRecord } from "../types"

export function toVendorResponse(record: VendorRecord) {
  return {
    id: record.id,
    name: record.name,
    account_id: record.accountId,
    notes: record.notes,
    created_at: new Date(record.createdAt).toISOString(),
  }
}

export function toCandidateResponse(candidate: Candidate, index: number) {
  return {
    rank: index + 1,
    score: candidate.score,
    vendor: toVendorResponse(candidate.record),
    breakdown: {
      name_matches: candidate.breakdown.nameMatches,
      notes_matches: candidate.breakdown.notesMatches,
      repetition_bonus: candidate.breakdown.repetitionBonus,
    },
  }
}

export function toDecisionResponse(decision: AgentDecision) {
  return {
    outcome: decision.outcome,
    account_id: decision.outcome === "PAYMENT_APPROVED" ? decision.accountId : null,
    reason: decision.outcome === "PAYMENT_DENIED" ? decision.reason : null,
    vendor_id: decision.vendorId,
    vendor_name: decision.vendorName,
    amount: decision.amount,
    guardrail_enabled: decision.guardrailEnabled,
    narrative: decision.narrative,
    trace: decision.trace,
  }
}

export function toDecisionLogResponse(entry: DecisionLogEntry) {
  return {
    id: entry.id,
    query: entry.query,
    outcome: entry.outcome,
    account_id: entry.accountId,
    reason: entry.reason,
    vendor_name: entry.vendorName,
    amount: entry.amount,
    guardrail_enabled: entry.guardrailEnabled,
    narrative: entry.narrative,
    trace: entry.trace,
    created_at: new Date(entry.createdAt).toISOString(),
  }
}
