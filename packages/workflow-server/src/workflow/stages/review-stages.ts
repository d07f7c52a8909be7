import { Outcome, requireField, type StageDefinition } from '../stage-registry'
import { MissingPreconditionError } from '../../services/errors'
import { computeTwoWayMatch, formatMatchHoldReason } from './matching'

export const matchTwoWayStage: StageDefinition = {
  name: 'MATCH_TWO_WAY',
  description: 'Score the invoice against its purchase order and gate on the match threshold.',
  async run(state, ctx) {
    const invoice = requireField(state, 'invoice', 'MATCH_TWO_WAY')
    const understanding = requireField(state, 'understanding', 'MATCH_TWO_WAY')
    const erp = requireField(state, 'erp', 'MATCH_TWO_WAY')

    const purchaseOrder =
      erp.purchaseOrders.find((po) => understanding.detectedPoNumbers.includes(po.poNumber)) ??
      erp.purchaseOrders.at(0) ??
      null
    const match = computeTwoWayMatch({
      invoiceAmount: invoice.amount,
      invoiceLines: understanding.lineItems,
      purchaseOrder,
      tolerancePct: ctx.settings.twoWayTolerancePct,
      threshold: ctx.settings.matchThreshold
    })

    ctx.audit('two_way_match_computed', {
      score: match.score,
      threshold: match.threshold,
      result: match.result,
      poNumber: match.evidence.poNumber,
      deviationPct: match.deviationPct
    })
    return {
      update: { match },
      outcome: Outcome.branch(match.score < match.threshold ? 'checkpoint' : 'continue')
    }
  }
}

export const checkpointHitlStage: StageDefinition = {
  name: 'CHECKPOINT_HITL',
  description: 'Prepare the review hold for a human decision.',
  async run(state, ctx) {
    const match = requireField(state, 'match', 'CHECKPOINT_HITL')
    const invoice = requireField(state, 'invoice', 'CHECKPOINT_HITL')
    const checkpointId = ctx.newCheckpointId()
    const reason = formatMatchHoldReason(match)
    const reviewUrl = `${ctx.settings.reviewBaseUrl}/${encodeURIComponent(checkpointId)}`

    const { tool } = ctx.useTool('db', { priority: 'speed' })
    await tool.saveRecord('review_holds', checkpointId, {
      workflowId: state.workflowId,
      invoiceId: invoice.invoiceId,
      score: match.score,
      reason
    })

    ctx.audit('checkpoint_prepared', { checkpointId, reason, reviewUrl })
    return {
      update: { hitl: { checkpointId, reason, reviewUrl } },
      outcome: Outcome.continue()
    }
  }
}

export const hitlDecisionStage: StageDefinition = {
  name: 'HITL_DECISION',
  description: 'Apply the reviewer decision recorded on resume.',
  async run(state, ctx) {
    const hitl = requireField(state, 'hitl', 'HITL_DECISION')
    if (!hitl.decision) {
      throw new MissingPreconditionError('HITL_DECISION', 'hitl.decision')
    }
    ctx.audit('human_decision_applied', {
      checkpointId: hitl.checkpointId,
      decision: hitl.decision,
      reviewerId: hitl.reviewerId ?? null
    })
    return {
      update: {},
      outcome: Outcome.branch(hitl.decision === 'ACCEPT' ? 'continue' : 'skip')
    }
  }
}
