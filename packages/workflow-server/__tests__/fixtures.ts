import type { InvoicePayloadInput } from '@ledgerline/shared'
import type { WorkflowSettings } from '../src/workflow/stage-registry'

export const TEST_SETTINGS: WorkflowSettings = {
  matchThreshold: 0.9,
  twoWayTolerancePct: 5,
  autoApproveLimit: 5000,
  reviewBaseUrl: 'http://review.test'
}

export const FIXED_NOW = new Date('2025-03-01T09:00:00.000Z')

export function acmeInvoice(amount: number, overrides: Partial<InvoicePayloadInput> = {}): InvoicePayloadInput {
  return {
    invoiceId: 'INV-1001',
    vendorName: 'Acme Corp',
    invoiceDate: '2025-02-20',
    dueDate: '2025-03-22',
    amount,
    currency: 'USD',
    poNumber: 'PO-2025-001',
    ...overrides
  }
}

export function sequence(prefix: string) {
  let next = 0
  return () => `${prefix}_${++next}`
}
