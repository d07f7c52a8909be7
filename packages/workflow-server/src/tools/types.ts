import type {
  AccountingEntry,
  CapabilityName,
  GoodsReceipt,
  HistoricalInvoice,
  InvoiceLineItem,
  InvoicePayload,
  Notification,
  PurchaseOrder,
  ToolBackendKind
} from '@ledgerline/shared'

export interface StorageTool {
  persistRawInvoice(invoice: InvoicePayload): Promise<{ rawId: string; location: string }>
}

export interface DbTool {
  saveRecord(collection: string, id: string, data: Record<string, unknown>): Promise<{ recordId: string }>
}

export type OcrResult = {
  text: string
  confidence: number
  lineItems: InvoiceLineItem[]
}

export interface OcrTool {
  extract(invoice: InvoicePayload): Promise<OcrResult>
}

export type VendorEnrichment = {
  taxId: string | null
  creditScore: number
  riskRating: 'LOW' | 'MEDIUM' | 'HIGH'
  source: string
}

export interface EnrichmentTool {
  enrichVendor(normalizedName: string, knownTaxId: string | null): Promise<VendorEnrichment>
}

export interface ErpConnectorTool {
  fetchPurchaseOrders(vendorName: string, poNumbers: string[]): Promise<PurchaseOrder[]>
  fetchGoodsReceipts(poNumbers: string[]): Promise<GoodsReceipt[]>
  fetchHistory(vendorName: string): Promise<HistoricalInvoice[]>
  postInvoice(invoice: InvoicePayload, entries: AccountingEntry[]): Promise<{ erpTxnId: string }>
  schedulePayment(invoice: InvoicePayload): Promise<{ paymentId: string; scheduledDate: string }>
}

export type OutgoingMessage = {
  recipient: string
  channel: Notification['channel']
  subject: string
  body: string
}

export interface EmailTool {
  send(message: OutgoingMessage): Promise<Notification>
}

export type CapabilityTools = {
  ocr: OcrTool
  enrichment: EnrichmentTool
  erp_connector: ErpConnectorTool
  storage: StorageTool
  db: DbTool
  email: EmailTool
}

export type ToolFactories = {
  [C in CapabilityName]?: (toolName: string) => CapabilityTools[C]
}

export interface ToolBackend {
  readonly kind: ToolBackendKind
  bind<C extends CapabilityName>(capability: C, toolName: string): CapabilityTools[C] | null
}
