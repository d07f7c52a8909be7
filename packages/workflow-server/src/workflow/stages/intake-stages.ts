import { InvoicePayloadSchema, normalizeVendorName, type VendorFlags } from '@ledgerline/shared'
import type { VendorEnrichment } from '../../tools/types'
import { Outcome, requireField, type StageDefinition } from '../stage-registry'
import { detectPoNumbers } from './matching'

const RISK_SCORES: Record<VendorEnrichment['riskRating'], number> = { LOW: 0.15, MEDIUM: 0.5, HIGH: 0.85 }

export const intakeStage: StageDefinition = {
  name: 'INTAKE',
  description: 'Validate the submitted payload and persist the raw invoice.',
  async run(state, ctx) {
    const parsed = InvoicePayloadSchema.safeParse(state.payload)
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`)
      ctx.audit('invoice_rejected', { issues })
      return { update: {}, outcome: Outcome.fail(`Invalid invoice payload: ${issues.join('; ')}`) }
    }

    const invoice = parsed.data
    const { tool, selection } = ctx.useTool('storage', { priority: 'speed' })
    const stored = await tool.persistRawInvoice(invoice)
    const ingestedAt = ctx.now().toISOString()
    ctx.audit('invoice_ingested', { rawId: stored.rawId, location: stored.location, tool: selection.chosen })

    return {
      update: { invoice, intake: { rawId: stored.rawId, ingestedAt, validated: true } },
      outcome: Outcome.continue()
    }
  }
}

export const understandStage: StageDefinition = {
  name: 'UNDERSTAND',
  description: 'Extract text and line items and detect purchase order references.',
  async run(state, ctx) {
    const invoice = requireField(state, 'invoice', 'UNDERSTAND')
    const { tool, selection } = ctx.useTool('ocr', { priority: 'accuracy' })
    const extracted = await tool.extract(invoice)
    const detectedPoNumbers = detectPoNumbers(extracted.text, invoice.poNumber)
    ctx.audit('invoice_understood', {
      tool: selection.chosen,
      confidence: extracted.confidence,
      lineItemCount: extracted.lineItems.length,
      detectedPoNumbers
    })
    return {
      update: {
        understanding: {
          text: extracted.text,
          confidence: extracted.confidence,
          lineItems: extracted.lineItems,
          detectedPoNumbers
        }
      },
      outcome: Outcome.continue()
    }
  }
}

export const prepareStage: StageDefinition = {
  name: 'PREPARE',
  description: 'Normalize and enrich the vendor and compute risk flags.',
  async run(state, ctx) {
    const invoice = requireField(state, 'invoice', 'PREPARE')
    const understanding = requireField(state, 'understanding', 'PREPARE')
    const normalizedName = normalizeVendorName(invoice.vendorName)
    const { tool, selection } = ctx.useTool('enrichment', { priority: 'accuracy' })
    const enrichment = await tool.enrichVendor(normalizedName, invoice.vendorTaxId ?? null)

    const missingInfo: string[] = []
    if (!enrichment.taxId) missingInfo.push('vendorTaxId')
    if (understanding.detectedPoNumbers.length === 0) missingInfo.push('poNumber')
    const riskScore = RISK_SCORES[enrichment.riskRating]
    const flags: VendorFlags = { missingInfo, riskScore, requiresReview: riskScore >= 0.5 || missingInfo.length > 0 }

    ctx.audit('vendor_prepared', { normalizedName, tool: selection.chosen, riskScore, missingInfo })
    return {
      update: {
        vendor: {
          normalizedName,
          taxId: enrichment.taxId,
          enrichment: {
            creditScore: enrichment.creditScore,
            riskRating: enrichment.riskRating,
            source: enrichment.source
          },
          flags
        }
      },
      outcome: Outcome.continue()
    }
  }
}

export const retrieveStage: StageDefinition = {
  name: 'RETRIEVE',
  description: 'Fetch purchase orders, goods receipts and invoice history from the ERP.',
  async run(state, ctx) {
    const vendor = requireField(state, 'vendor', 'RETRIEVE')
    const understanding = requireField(state, 'understanding', 'RETRIEVE')
    const { tool, selection } = ctx.useTool('erp_connector', { priority: 'speed' })

    const purchaseOrders = await tool.fetchPurchaseOrders(vendor.normalizedName, understanding.detectedPoNumbers)
    const goodsReceipts = await tool.fetchGoodsReceipts(purchaseOrders.map((po) => po.poNumber))
    const history = await tool.fetchHistory(vendor.normalizedName)

    ctx.audit('erp_data_retrieved', {
      tool: selection.chosen,
      purchaseOrders: purchaseOrders.map((po) => po.poNumber),
      goodsReceipts: goodsReceipts.map((grn) => grn.grnNumber),
      historyCount: history.length
    })
    return {
      update: { erp: { purchaseOrders, goodsReceipts, history } },
      outcome: Outcome.continue()
    }
  }
}
