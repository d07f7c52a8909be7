import { StageRegistry } from '../stage-registry'
import { checkpointHitlStage, hitlDecisionStage, matchTwoWayStage } from './review-stages'
import { intakeStage, prepareStage, retrieveStage, understandStage } from './intake-stages'
import { approveStage, completeStage, notifyStage, postingStage, reconcileStage } from './settlement-stages'

export function createInvoiceStageRegistry(): StageRegistry {
  return new StageRegistry([
    intakeStage,
    understandStage,
    prepareStage,
    retrieveStage,
    matchTwoWayStage,
    checkpointHitlStage,
    hitlDecisionStage,
    reconcileStage,
    approveStage,
    postingStage,
    notifyStage,
    completeStage
  ])
}

export { computeTwoWayMatch, detectPoNumbers, formatMatchHoldReason, lineItemAgreement } from './matching'
export { vendorContactEmail } from './settlement-stages'
