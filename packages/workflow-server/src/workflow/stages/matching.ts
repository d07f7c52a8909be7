import type { InvoiceLineItem, MatchOutcome, PurchaseOrder } from '@ledgerline/shared'

export type TwoWayMatchInput = {
  invoiceAmount: number
  invoiceLines: InvoiceLineItem[]
  purchaseOrder: PurchaseOrder | null
  tolerancePct: number
  threshold: number
}

const round = (value: number, digits: number) => {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}

const sumTotals = (lines: InvoiceLineItem[]) => lines.reduce((acc, line) => acc + line.total, 0)

// 1.0 when the PO has no line detail to compare against
export function lineItemAgreement(invoiceLines: InvoiceLineItem[], poLines: InvoiceLineItem[]): number {
  if (poLines.length === 0) return 1
  if (invoiceLines.length === 0) return 0
  const countRatio = Math.min(invoiceLines.length, poLines.length) / Math.max(invoiceLines.length, poLines.length)
  const poTotal = sumTotals(poLines)
  const totalSimilarity = poTotal > 0 ? Math.max(0, 1 - Math.abs(sumTotals(invoiceLines) - poTotal) / poTotal) : 0
  return (countRatio + totalSimilarity) / 2
}

/**
 * Two-way match of an invoice against its purchase order.
 *
 * The amount score is the relative similarity of the two amounts, lifted to 1
 * when the deviation sits inside the tolerance. It is scaled by how well the
 * line items agree and rounded to four decimals.
 */
export function computeTwoWayMatch(input: TwoWayMatchInput): MatchOutcome {
  const po = input.purchaseOrder
  const poAmount = po?.amount ?? 0
  const absoluteDiff = Math.abs(input.invoiceAmount - poAmount)
  const deviationPct = poAmount > 0 ? round((absoluteDiff / poAmount) * 100, 4) : 100
  const withinTolerance = poAmount > 0 && deviationPct <= input.tolerancePct

  const amountScore = poAmount <= 0 ? 0 : withinTolerance ? 1 : Math.max(0, 1 - absoluteDiff / poAmount)
  const lineItemScore = po ? lineItemAgreement(input.invoiceLines, po.lineItems) : 1
  const score = round(amountScore * lineItemScore, 4)

  return {
    score,
    threshold: input.threshold,
    tolerancePct: input.tolerancePct,
    deviationPct,
    withinTolerance,
    result: score >= input.threshold ? 'MATCHED' : 'FAILED',
    evidence: {
      invoiceAmount: input.invoiceAmount,
      poAmount,
      poNumber: po?.poNumber ?? null,
      difference: round(absoluteDiff, 2),
      amountScore: round(amountScore, 4),
      lineItemScore: round(lineItemScore, 4)
    }
  }
}

export function formatMatchHoldReason(outcome: MatchOutcome): string {
  return `Match score ${outcome.score} is below threshold ${outcome.threshold.toFixed(2)} (deviation ${outcome.deviationPct}% against a ${outcome.tolerancePct}% tolerance)`
}

const PO_PATTERN = /PO-\d+-\d+/g

export function detectPoNumbers(text: string, explicit?: string): string[] {
  const found = new Set<string>()
  if (explicit) found.add(explicit)
  for (const match of text.match(PO_PATTERN) ?? []) {
    found.add(match)
  }
  return [...found]
}
