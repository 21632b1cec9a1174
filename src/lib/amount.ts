const NUMBER = String.raw`(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d{1,2}))?`
const PREFIXED = new RegExp(String.raw`\$\s*${NUMBER}`)
const SUFFIXED = new RegExp(String.raw`\b${NUMBER}\s*(?:dollars|usd)\b`, "i")

/**
 * Extracts the payment amount from a clerk's request, e.g. "$10,000" or
 * "250.50 USD". Returns null when the request names no amount.
 */
export function parsePaymentAmount(query: string): number | null {
  const match = PREFIXED.exec(query) ?? SUFFIXED.exec(query)
  if (!match) {
    return null
  }

  const whole = match[1]?.replaceAll(",", "") ?? ""
  const fraction = match[2] ?? "0"
  const amount = Number.parseFloat(`${whole}.${fraction}`)

  return Number.isFinite(amount) ? amount : null
}
