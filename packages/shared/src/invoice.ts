import { z } from 'zod'

export const InvoiceLineItemSchema = z.object({
  description: z.string().trim().min(1),
  quantity: z.number().nonnegative(),
  unitPrice: z.number().nonnegative(),
  total: z.number()
})
export type InvoiceLineItem = z.infer<typeof InvoiceLineItemSchema>

export const InvoicePayloadSchema = z.object({
  invoiceId: z.string().trim().min(1),
  vendorName: z.string().trim().min(1),
  vendorTaxId: z.string().trim().min(1).optional(),
  invoiceDate: z.string().trim().min(1),
  dueDate: z.string().trim().min(1),
  amount: z.number().positive(),
  currency: z.string().trim().length(3).default('USD'),
  // Optional explicit PO reference; otherwise detected from the OCR text
  poNumber: z.string().trim().min(1).optional(),
  lineItems: z.array(InvoiceLineItemSchema).default([]),
  attachments: z.array(z.string()).default([])
})
export type InvoicePayload = z.infer<typeof InvoicePayloadSchema>
export type InvoicePayloadInput = z.input<typeof InvoicePayloadSchema>

export const PurchaseOrderSchema = z.object({
  poNumber: z.string(),
  vendorName: z.string(),
  amount: z.number(),
  currency: z.string().default('USD'),
  status: z.enum(['APPROVED', 'OPEN', 'CLOSED']).default('APPROVED'),
  lineItems: z.array(InvoiceLineItemSchema).default([])
})
export type PurchaseOrder = z.infer<typeof PurchaseOrderSchema>

export const GoodsReceiptSchema = z.object({
  grnNumber: z.string(),
  poNumber: z.string(),
  receivedDate: z.string(),
  quantity: z.number().nonnegative()
})
export type GoodsReceipt = z.infer<typeof GoodsReceiptSchema>

export const HistoricalInvoiceSchema = z.object({
  invoiceId: z.string(),
  vendorName: z.string(),
  amount: z.number(),
  status: z.string()
})
export type HistoricalInvoice = z.infer<typeof HistoricalInvoiceSchema>

export const ErpDirectorySchema = z.object({
  purchaseOrders: z.array(PurchaseOrderSchema).default([]),
  goodsReceipts: z.array(GoodsReceiptSchema).default([]),
  history: z.array(HistoricalInvoiceSchema).default([])
})
export type ErpDirectory = z.infer<typeof ErpDirectorySchema>
export type ErpDirectoryInput = z.input<typeof ErpDirectorySchema>

export const AccountingEntrySchema = z.object({
  account: z.string(),
  debit: z.number(),
  credit: z.number(),
  description: z.string()
})
export type AccountingEntry = z.infer<typeof AccountingEntrySchema>

export function normalizeVendorName(raw: string): string {
  return raw.trim().replace(/\s+/g, ' ').toUpperCase()
}
