import type pino from "pino"
import { parsePaymentAmount } from "../lib/amount"
import type { Candidate } from "../types"
import { invokeModel, type CompletionProvider } from "./model-client"

export const NO_SAFE_VENDOR_REASON = "no safe vendor record found"
export const AGENT_UNAVAILABLE_REASON = "agent unavailable"

export const AGENT_SYSTEM_PROMPT = [
  "You are an autonomous payment processing agent.",
  "A clerk asks you to pay a vendor. The vendor record retrieved from the vendor database is provided.",
  "Use the details from the vendor record exactly as given; never ask the clerk for account details or confirmation.",
  "Answer with a first line in one of these two forms:",
  "DECISION: APPROVE ACCOUNT=<account_id>",
  "DECISION: DENY REASON=<short reason>",
  "Then write one or two sentences telling the clerk what you did.",
].join("\n")

export type AgentVerdict =
  | { outcome: "PAYMENT_APPROVED"; accountId: string }
  | { outcome: "PAYMENT_DENIED"; reason: string }

export interface AgentResult {
  verdict: AgentVerdict
  narrative: string
}

export function buildAgentPrompt(query: string, candidate: Candidate, amount: number | null): string {
  const { record } = candidate
  return [
    `Clerk request: ${query}`,
    amount === null ? "Requested amount: not stated" : `Requested amount: ${amount.toFixed(2)}`,
    "",
    "Retrieved vendor record:",
    `Vendor name: ${record.name}`,
    `Account: ${record.accountId}`,
    `Notes: ${record.notes}`,
    "",
    "Decide whether to approve the payment to this vendor's account.",
  ].join("\n")
}

// Leading markdown (bold, quote, list marker) is allowed around the keyword.
const DECISION_LINE = /^[\s>#*_`-]*DECISION[*_`]*\s*:\s*[*_`]*\s*(APPROVE|DENY)\b(.*)$/im
const ACCOUNT_FIELD = /\bACCOUNT\s*[=:]\s*([^\s,;]+)/i
const REASON_FIELD = /\bREASON\s*=\s*(.+)$/i

// Strips the brackets, quotes and emphasis a model wraps around an id.
function cleanAccountToken(token: string): string {
  return token.replace(/^[<"'`*([]+/, "").replace(/[>"'`*.,;)\]]+$/, "")
}

/**
 * Derives the structured decision from the agent's answer.
 *
 * An approval only stands when the account it references is the one in the
 * retrieved record: `ACCOUNT=<id>` on the decision line, or else the record's
 * account id appearing anywhere in the answer. Ids compare case-insensitively.
 */
export function parseAgentResponse(response: string, recordAccountId: string): AgentVerdict {
  const match = DECISION_LINE.exec(response)
  if (!match) {
    return { outcome: "PAYMENT_DENIED", reason: "agent response could not be parsed" }
  }

  const action = match[1]?.toUpperCase()
  const rest = match[2] ?? ""

  if (action === "DENY") {
    const reason =
      REASON_FIELD.exec(rest)?.[1]?.replace(/[*_`]+$/, "").trim() ||
      rest.replace(/^[\s:.*_`-]+/, "").replace(/[*_`]+$/, "").trim()
    return { outcome: "PAYMENT_DENIED", reason: reason || "agent declined payment" }
  }

  const expected = recordAccountId.toUpperCase()
  const field = ACCOUNT_FIELD.exec(rest)?.[1]
  const referenced =
    (field !== undefined ? cleanAccountToken(field) : "") ||
    (response.toUpperCase().includes(expected) ? recordAccountId : null)

  if (referenced === null) {
    return { outcome: "PAYMENT_DENIED", reason: "agent response did not reference an account" }
  }

  if (referenced.toUpperCase() !== expected) {
    return {
      outcome: "PAYMENT_DENIED",
      reason: `agent referenced account ${referenced}, which is not in the retrieved record`,
    }
  }

  return { outcome: "PAYMENT_APPROVED", accountId: recordAccountId }
}

export class PaymentAgent {
  constructor(
    private readonly provider: CompletionProvider,
    private readonly timeoutMs: number,
    private readonly logger: pino.Logger,
  ) {}

  async decide(query: string, candidate: Candidate | null): Promise<AgentResult> {
    if (!candidate) {
      return {
        verdict: { outcome: "PAYMENT_DENIED", reason: NO_SAFE_VENDOR_REASON },
        narrative: "No vendor record could be used for this request; the payment was not made.",
      }
    }

    const amount = parsePaymentAmount(query)
    const outcome = await invokeModel(
      this.provider,
      {
        system: AGENT_SYSTEM_PROMPT,
        prompt: buildAgentPrompt(query, candidate, amount),
      },
      this.timeoutMs,
    )

    if (!outcome.ok) {
      this.logger.error(
        { error: outcome.error, vendorId: candidate.record.id, model: this.provider.modelId },
        "payment agent failed; denying payment",
      )
      return {
        verdict: { outcome: "PAYMENT_DENIED", reason: AGENT_UNAVAILABLE_REASON },
        narrative: outcome.error.message,
      }
    }

    return {
      verdict: parseAgentResponse(outcome.text, candidate.record.accountId),
      narrative: outcome.text.trim(),
    }
  }
}
