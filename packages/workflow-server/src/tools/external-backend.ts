import type { AccuracyClass, CapabilityName, ErpDirectory } from '@ledgerline/shared'
import { normalizeVendorName } from '@ledgerline/shared'
import { CAPABILITY_CATALOG } from '../capabilities/catalog'
import type {
  CapabilityTools,
  EmailTool,
  EnrichmentTool,
  ErpConnectorTool,
  OcrTool,
  ToolBackend,
  ToolFactories
} from './types'

const OCR_CONFIDENCE: Record<AccuracyClass, number> = { high: 0.95, medium: 0.85, low: 0.7 }

function ocrAccuracy(toolName: string): AccuracyClass {
  return CAPABILITY_CATALOG.ocr.tools.find((tool) => tool.name === toolName)?.accuracy ?? 'low'
}

function createOcrTool(toolName: string): OcrTool {
  return {
    async extract(invoice) {
      const lines = [
        'INVOICE',
        `Invoice: ${invoice.invoiceId}`,
        `Vendor: ${invoice.vendorName}`,
        `Date: ${invoice.invoiceDate}`,
        `Due: ${invoice.dueDate}`,
        `Amount: ${invoice.amount.toFixed(2)} ${invoice.currency}`
      ]
      if (invoice.poNumber) lines.push(`PO: ${invoice.poNumber}`)
      for (const item of invoice.lineItems) {
        lines.push(`${item.description} x${item.quantity} @ ${item.unitPrice.toFixed(2)} = ${item.total.toFixed(2)}`)
      }
      return {
        text: lines.join('\n'),
        confidence: OCR_CONFIDENCE[ocrAccuracy(toolName)],
        lineItems: invoice.lineItems.map((item) => ({ ...item }))
      }
    }
  }
}

function createEnrichmentTool(toolName: string): EnrichmentTool {
  return {
    async enrichVendor(_normalizedName, knownTaxId) {
      return {
        taxId: knownTaxId ?? '12-3456789',
        creditScore: 750,
        riskRating: 'LOW',
        source: toolName
      }
    }
  }
}

function createErpConnector(toolName: string, directory: ErpDirectory): ErpConnectorTool {
  return {
    async fetchPurchaseOrders(vendorName, poNumbers) {
      const vendor = normalizeVendorName(vendorName)
      const matches = poNumbers.length
        ? directory.purchaseOrders.filter((po) => poNumbers.includes(po.poNumber))
        : directory.purchaseOrders.filter((po) => normalizeVendorName(po.vendorName) === vendor)
      return matches.map((po) => ({ ...po, lineItems: po.lineItems.map((item) => ({ ...item })) }))
    },
    async fetchGoodsReceipts(poNumbers) {
      return directory.goodsReceipts.filter((grn) => poNumbers.includes(grn.poNumber)).map((grn) => ({ ...grn }))
    },
    async fetchHistory(vendorName) {
      const vendor = normalizeVendorName(vendorName)
      return directory.history
        .filter((entry) => normalizeVendorName(entry.vendorName) === vendor)
        .map((entry) => ({ ...entry }))
    },
    async postInvoice(invoice) {
      return { erpTxnId: `ERP_TXN_${invoice.invoiceId}` }
    },
    async schedulePayment(invoice) {
      return { paymentId: `PAY_${invoice.invoiceId}`, scheduledDate: invoice.dueDate }
    }
  }
}

function createEmailTool(): EmailTool {
  return {
    async send(message) {
      return { recipient: message.recipient, channel: message.channel, status: 'sent' }
    }
  }
}

// Adapters for capabilities that talk to third-party systems. Deterministic stand-ins.
export class ExternalToolBackend implements ToolBackend {
  readonly kind = 'EXTERNAL' as const
  private readonly factories: ToolFactories

  constructor(directory: ErpDirectory) {
    this.factories = {
      ocr: (toolName) => createOcrTool(toolName),
      enrichment: (toolName) => createEnrichmentTool(toolName),
      erp_connector: (toolName) => createErpConnector(toolName, directory),
      email: () => createEmailTool()
    }
  }

  bind<C extends CapabilityName>(capability: C, toolName: string): CapabilityTools[C] | null {
    const factory = this.factories[capability]
    return factory ? factory(toolName) : null
  }
}
