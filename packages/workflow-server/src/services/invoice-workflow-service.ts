import {
  HumanDecisionInputSchema,
  StageNameEnum,
  type AuditEvent,
  type CapabilityDefinition,
  type CheckpointRecord,
  type DecisionHistory,
  type DecisionResult,
  type HitlDecision,
  type ReviewQueueEntry,
  type StageName,
  type SubmitResult
} from '@ledgerline/shared'
import { createInvoiceStageRegistry } from '../workflow/stages'
import type { StageRegistry, WorkflowSettings } from '../workflow/stage-registry'
import { CapabilityRouter } from './capability-router'
import { getCheckpointStore, type CheckpointStore } from './checkpoint-store'
import { WorkflowNotFoundError } from './errors'
import { getLogger } from './logger'
import { getSelectionHistory, type SelectionHistory } from './selection-history'
import { BRANCH_TRANSITIONS, WorkflowOrchestrator, type WorkflowOrchestratorOptions } from './workflow-orchestrator'
import { getWorkflowRunRepository, type WorkflowRunRepository } from './workflow-run-repository'

export type WorkflowGraph = {
  stages: Array<{ name: StageName; description: string }>
  transitions: Array<{ from: StageName; on: string; to: StageName | 'TERMINAL' | 'PAUSED' }>
  capabilities: CapabilityDefinition[]
}

export type InvoiceWorkflowServiceOptions = WorkflowOrchestratorOptions & {
  history?: SelectionHistory
}

export class InvoiceWorkflowService {
  private readonly orchestrator: WorkflowOrchestrator
  private readonly store: CheckpointStore
  private readonly runs: WorkflowRunRepository
  private readonly history: SelectionHistory
  private readonly registry: StageRegistry
  private readonly router: CapabilityRouter

  constructor(settings: WorkflowSettings, options: InvoiceWorkflowServiceOptions = {}) {
    this.store = options.store ?? getCheckpointStore()
    this.runs = options.runs ?? getWorkflowRunRepository()
    this.history = options.history ?? getSelectionHistory()
    this.registry = options.registry ?? createInvoiceStageRegistry()
    this.router = options.router ?? new CapabilityRouter(undefined, this.history, { now: options.now })
    this.orchestrator = new WorkflowOrchestrator(settings, {
      ...options,
      registry: this.registry,
      router: this.router,
      store: this.store,
      runs: this.runs
    })
  }

  async submit(payload: unknown): Promise<SubmitResult> {
    const result = await this.orchestrator.start(payload)
    const response: SubmitResult = {
      workflowId: result.workflowId,
      invoiceId: result.invoiceId,
      status: result.status
    }
    if (result.checkpointId) response.checkpointId = result.checkpointId
    if (result.failureReason) response.failureReason = result.failureReason
    return response
  }

  async listPendingReviews(): Promise<ReviewQueueEntry[]> {
    return this.store.listPending()
  }

  async getReview(checkpointId: string): Promise<CheckpointRecord> {
    return this.store.get(checkpointId)
  }

  async submitDecision(
    checkpointId: string,
    decisionValue: HitlDecision,
    reviewerId: string,
    notes?: string | null
  ): Promise<DecisionResult> {
    const decision = HumanDecisionInputSchema.parse({ decision: decisionValue, reviewerId, notes })
    const result = await this.orchestrator.resume({
      checkpointId,
      decision: decision.decision,
      reviewerId: decision.reviewerId,
      notes: decision.notes ?? null
    })
    getLogger().info('human_decision_recorded', {
      checkpointId,
      workflowId: result.workflowId,
      decision: decision.decision,
      finalStatus: result.status
    })
    return { workflowId: result.workflowId, checkpointId, finalStatus: result.status }
  }

  async getAuditLog(workflowId: string): Promise<AuditEvent[]> {
    const state = await this.runs.get(workflowId)
    if (!state) throw new WorkflowNotFoundError(workflowId)
    return state.auditLog
  }

  getSelectionHistory(): Record<string, string> {
    return this.history.snapshot()
  }

  async getDecisionHistory(): Promise<DecisionHistory> {
    const resolved = await this.store.listResolved()
    const history: DecisionHistory = { ACCEPT: [], REJECT: [] }
    for (const record of resolved) {
      if (!record.decision) continue
      history[record.decision].push({
        checkpointId: record.checkpointId,
        workflowId: record.workflowId,
        invoiceId: record.invoiceId,
        decision: record.decision,
        reviewerId: record.reviewerId,
        notes: record.notes,
        resolvedAt: record.resolvedAt
      })
    }
    return history
  }

  describeGraph(): WorkflowGraph {
    const stages = this.registry.list().map((stage) => ({ name: stage.name, description: stage.description }))
    const transitions: WorkflowGraph['transitions'] = []
    for (const stage of StageNameEnum.options) {
      const branches = BRANCH_TRANSITIONS[stage]
      if (!branches) {
        transitions.push({ from: stage, on: 'CONTINUE', to: this.registry.next(stage) ?? 'TERMINAL' })
        continue
      }
      if (stage === 'HITL_DECISION') {
        transitions.push({ from: stage, on: 'NO_DECISION', to: 'PAUSED' })
      }
      for (const [label, target] of Object.entries(branches)) {
        if (target) transitions.push({ from: stage, on: `BRANCH(${label})`, to: target })
      }
    }
    return { stages, transitions, capabilities: this.router.describe() }
  }
}
