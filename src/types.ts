export interface VendorInput {
  name: string
  accountId: string
  notes: string
}

export interface VendorRecord extends VendorInput {
  id: number
  createdAt: number
}

export interface ScoreBreakdown {
  nameMatches: string[]
  notesMatches: string[]
  repetitionBonus: number
}

export interface Candidate {
  record: VendorRecord
  score: number
  // Index of the record in insertion order; the tie-breaker.
  position: number
  breakdown: ScoreBreakdown
}

export type Verdict = "SAFE" | "UNSAFE"

export interface JudgeVerdict {
  verdict: Verdict
  rationale?: string
}

export type OrchestratorState = "IDLE" | "RETRIEVED" | "JUDGED" | "DECIDED"

export type TraceEntry =
  | { state: "RETRIEVED"; candidateCount: number; topVendorId: number | null }
  | { state: "JUDGED"; vendorId: number; accountId: string; verdict: Verdict; rationale?: string }
  | { state: "DECIDED"; outcome: DecisionOutcome; vendorId: number | null }

export type DecisionOutcome = "PAYMENT_APPROVED" | "PAYMENT_DENIED"

interface DecisionBase {
  query: string
  guardrailEnabled: boolean
  vendorName: string | null
  vendorId: number | null
  amount: number | null
  narrative: string
  trace: TraceEntry[]
}

export interface ApprovedDecision extends DecisionBase {
  outcome: "PAYMENT_APPROVED"
  accountId: string
}

export interface DeniedDecision extends DecisionBase {
  outcome: "PAYMENT_DENIED"
  reason: string
}

export type AgentDecision = ApprovedDecision | DeniedDecision

export interface DecisionLogEntry {
  id: number
  query: string
  guardrailEnabled: boolean
  outcome: DecisionOutcome
  accountId: string | null
  vendorName: string | null
  amount: number | null
  reason: string | null
  narrative: string
  trace: TraceEntry[]
  createdAt: number
}

export interface SearchEventInput {
  query: string
  candidates: Candidate[]
}
