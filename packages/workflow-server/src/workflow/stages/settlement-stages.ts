import type { AccountingEntry, Approval, FinalSummary, Notification } from '@ledgerline/shared'
import type { OutgoingMessage } from '../../tools/types'
import { Outcome, requireField, type StageDefinition } from '../stage-registry'

const APPROVAL_POLICY = 'standard_approval_policy_v1'
const FINANCE_CHANNEL = '#finance-team'

export function vendorContactEmail(normalizedName: string): string {
  const slug = normalizedName.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '')
  return `billing@${slug || 'vendor'}.example.com`
}

export const reconcileStage: StageDefinition = {
  name: 'RECONCILE',
  description: 'Build accounting entries and the reconciliation report.',
  async run(state, ctx) {
    const invoice = requireField(state, 'invoice', 'RECONCILE')
    const match = requireField(state, 'match', 'RECONCILE')
    const entries: AccountingEntry[] = [
      { account: 'Accounts Payable', debit: 0, credit: invoice.amount, description: `Invoice ${invoice.invoiceId} payable` },
      { account: 'Expense', debit: invoice.amount, credit: 0, description: 'Goods and services received' }
    ]
    const totalDebit = entries.reduce((acc, entry) => acc + entry.debit, 0)
    const totalCredit = entries.reduce((acc, entry) => acc + entry.credit, 0)
    const report = {
      invoiceAmount: invoice.amount,
      poAmount: match.evidence.poAmount,
      difference: match.evidence.difference,
      reconciled: totalDebit === totalCredit
    }
    ctx.audit('reconciliation_built', { entryCount: entries.length, reconciled: report.reconciled })
    return { update: { reconciliation: { entries, report } }, outcome: Outcome.continue() }
  }
}

export const approveStage: StageDefinition = {
  name: 'APPROVE',
  description: 'Apply the approval policy by amount.',
  async run(state, ctx) {
    const invoice = requireField(state, 'invoice', 'APPROVE')
    requireField(state, 'reconciliation', 'APPROVE')
    const autoApproved = invoice.amount < ctx.settings.autoApproveLimit
    const approval: Approval = {
      status: autoApproved ? 'AUTO_APPROVED' : 'REQUIRES_APPROVAL',
      approverId: autoApproved ? 'system' : 'finance_manager',
      policy: APPROVAL_POLICY
    }
    ctx.audit('approval_policy_applied', {
      status: approval.status,
      approverId: approval.approverId,
      limit: ctx.settings.autoApproveLimit
    })
    return { update: { approval }, outcome: Outcome.continue() }
  }
}

export const postingStage: StageDefinition = {
  name: 'POSTING',
  description: 'Post the invoice to the ERP and schedule payment.',
  async run(state, ctx) {
    const invoice = requireField(state, 'invoice', 'POSTING')
    const reconciliation = requireField(state, 'reconciliation', 'POSTING')
    requireField(state, 'approval', 'POSTING')
    const { tool, selection } = ctx.useTool('erp_connector', { priority: 'speed' })

    const { erpTxnId } = await tool.postInvoice(invoice, reconciliation.entries)
    ctx.audit('invoice_posted', { erpTxnId, tool: selection.chosen })
    const payment = await tool.schedulePayment(invoice)
    ctx.audit('payment_scheduled', { paymentId: payment.paymentId, scheduledDate: payment.scheduledDate })

    return {
      update: { posting: { posted: true, erpTxnId, paymentId: payment.paymentId, scheduledDate: payment.scheduledDate } },
      outcome: Outcome.continue()
    }
  }
}

export const notifyStage: StageDefinition = {
  name: 'NOTIFY',
  description: 'Notify the vendor and the finance team.',
  async run(state, ctx) {
    const invoice = requireField(state, 'invoice', 'NOTIFY')
    const vendor = requireField(state, 'vendor', 'NOTIFY')
    const posting = requireField(state, 'posting', 'NOTIFY')
    const { tool, selection } = ctx.useTool('email', { priority: 'speed' })

    const messages: OutgoingMessage[] = [
      {
        recipient: vendorContactEmail(vendor.normalizedName),
        channel: 'email',
        subject: `Invoice ${invoice.invoiceId} processed`,
        body: `Payment ${posting.paymentId} is scheduled for ${posting.scheduledDate}.`
      },
      {
        recipient: FINANCE_CHANNEL,
        channel: 'slack',
        subject: `Invoice ${invoice.invoiceId} posted`,
        body: `${vendor.normalizedName} ${invoice.amount.toFixed(2)} ${invoice.currency} posted as ${posting.erpTxnId}.`
      }
    ]
    const notifications: Notification[] = []
    for (const message of messages) {
      notifications.push(await tool.send(message))
    }
    const recipients = notifications.map((entry) => entry.recipient)

    ctx.audit('notifications_sent', { tool: selection.chosen, recipients })
    return { update: { notification: { notifications, recipients } }, outcome: Outcome.continue() }
  }
}

export const completeStage: StageDefinition = {
  name: 'COMPLETE',
  description: 'Assemble the final payload and record the workflow output.',
  async run(state, ctx) {
    const status = state.status === 'MANUAL_HANDOFF' ? 'MANUAL_HANDOFF' : 'COMPLETED'
    const summary: FinalSummary = {
      workflowId: state.workflowId,
      invoiceId: state.invoiceId,
      status,
      vendorName: state.vendor?.normalizedName ?? null,
      amount: state.invoice?.amount ?? null,
      currency: state.invoice?.currency ?? null,
      matchScore: state.match?.score ?? null,
      approvalStatus: state.approval?.status ?? null,
      erpTxnId: state.posting?.erpTxnId ?? null,
      paymentId: state.posting?.paymentId ?? null,
      completedAt: ctx.now().toISOString()
    }

    const { tool } = ctx.useTool('db', { priority: 'speed' })
    const { recordId } = await tool.saveRecord('workflow_outputs', state.workflowId, summary)
    ctx.audit('workflow_completed', { status, recordId })
    return { update: { summary, status }, outcome: Outcome.continue() }
  }
}
