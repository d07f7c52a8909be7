import { randomUUID } from 'node:crypto'
import type { HitlDecision, StageName, WorkflowState, WorkflowStatus } from '@ledgerline/shared'
import type { BranchLabel, StageOutcome, StageRegistry, WorkflowSettings } from '../workflow/stage-registry'
import { StageExecutor, type StageExecutorOptions } from '../workflow/stage-executor'
import { createInvoiceStageRegistry } from '../workflow/stages'
import { auditEvent, createInitialState, reduceState } from '../workflow/state'
import { getCheckpointStore, type CheckpointStore } from './checkpoint-store'
import { AlreadyResolvedError, MissingPreconditionError } from './errors'
import { getWorkflowLogger } from './logger'
import { getWorkflowRunRepository, type WorkflowRunRepository } from './workflow-run-repository'

// Branch targets per stage. CONTINUE always follows registry order.
export const BRANCH_TRANSITIONS: Partial<Record<StageName, Partial<Record<BranchLabel, StageName>>>> = {
  MATCH_TWO_WAY: { checkpoint: 'CHECKPOINT_HITL', continue: 'RECONCILE' },
  HITL_DECISION: { continue: 'RECONCILE', skip: 'COMPLETE' }
}

export type WorkflowRunResult = {
  workflowId: string
  invoiceId: string
  status: WorkflowStatus
  checkpointId?: string
  failureReason?: string
  state: WorkflowState
}

export type ResumeInput = {
  checkpointId: string
  decision: HitlDecision
  reviewerId: string
  notes: string | null
}

export type WorkflowOrchestratorOptions = StageExecutorOptions & {
  registry?: StageRegistry
  store?: CheckpointStore
  runs?: WorkflowRunRepository
  workflowIdFactory?: () => string
}

export class WorkflowOrchestrator {
  private readonly registry: StageRegistry
  private readonly executor: StageExecutor
  private readonly store: CheckpointStore
  private readonly runs: WorkflowRunRepository
  private readonly nowProvider: () => Date
  private readonly workflowIdFactory: () => string

  constructor(settings: WorkflowSettings, options: WorkflowOrchestratorOptions = {}) {
    this.registry = options.registry ?? createInvoiceStageRegistry()
    this.nowProvider = options.now ?? (() => new Date())
    this.executor = new StageExecutor(this.registry, settings, { ...options, now: this.nowProvider })
    this.store = options.store ?? getCheckpointStore()
    this.runs = options.runs ?? getWorkflowRunRepository()
    this.workflowIdFactory = options.workflowIdFactory ?? (() => `wf_${randomUUID()}`)
  }

  async start(payload: unknown): Promise<WorkflowRunResult> {
    const state = createInitialState(this.workflowIdFactory(), payload)
    getWorkflowLogger(state.workflowId).info('workflow_started', { invoiceId: state.invoiceId })
    await this.runs.save(state)
    return this.drive(state, 'INTAKE')
  }

  async resume(input: ResumeInput): Promise<WorkflowRunResult> {
    const checkpoint = await this.store.get(input.checkpointId)
    if (checkpoint.status !== 'PENDING') {
      throw new AlreadyResolvedError(input.checkpointId)
    }
    await this.store.resolve(input.checkpointId, input.decision, input.reviewerId, input.notes)

    const decidedAt = this.nowProvider()
    const paused = checkpoint.state
    const state = reduceState(paused, {
      status: 'RUNNING',
      hitl: {
        checkpointId: checkpoint.checkpointId,
        reason: paused.hitl?.reason ?? checkpoint.pausedReason,
        reviewUrl: paused.hitl?.reviewUrl,
        decision: input.decision,
        reviewerId: input.reviewerId,
        notes: input.notes ?? undefined,
        decidedAt: decidedAt.toISOString()
      },
      auditLog: [
        auditEvent('HITL_DECISION', 'workflow_resumed', {
          checkpointId: checkpoint.checkpointId,
          decision: input.decision,
          reviewerId: input.reviewerId
        }, decidedAt)
      ]
    })
    getWorkflowLogger(state.workflowId).info('workflow_resumed', {
      checkpointId: checkpoint.checkpointId,
      decision: input.decision
    })
    return this.drive(state, 'HITL_DECISION')
  }

  nextStage(stage: StageName, outcome: StageOutcome): StageName | null {
    if (outcome.type === 'BRANCH') {
      const target = BRANCH_TRANSITIONS[stage]?.[outcome.label]
      if (!target) {
        throw new Error(`Stage ${stage} has no transition for branch "${outcome.label}"`)
      }
      return target
    }
    return this.registry.next(stage)
  }

  private async drive(initial: WorkflowState, start: StageName): Promise<WorkflowRunResult> {
    let state = initial
    let current: StageName | null = start

    while (current) {
      const stage: StageName = current
      if (stage === 'HITL_DECISION' && !state.hitl?.decision) {
        return this.pause(state)
      }

      const execution = await this.executor.execute(stage, state)
      state = execution.state
      if (!execution.ok) {
        await this.abort(state, stage, execution.error)
        throw execution.error
      }

      const outcome = execution.outcome
      if (outcome.type === 'FAIL') {
        return this.fail(state, stage, outcome.reason)
      }

      let next: StageName | null
      try {
        next = this.nextStage(stage, outcome)
      } catch (error) {
        await this.abort(state, stage, error)
        throw error
      }
      if (outcome.type === 'BRANCH' && outcome.label === 'skip') {
        state = reduceState(state, { status: 'MANUAL_HANDOFF' })
      }
      current = next
    }

    await this.runs.save(state)
    getWorkflowLogger(state.workflowId).info('workflow_finished', { status: state.status })
    return this.toResult(state)
  }

  private async pause(state: WorkflowState): Promise<WorkflowRunResult> {
    const hitl = state.hitl
    if (!hitl) {
      const error = new MissingPreconditionError('HITL_DECISION', 'hitl')
      await this.abort(state, 'HITL_DECISION', error)
      throw error
    }

    const paused = reduceState(state, {
      status: 'PAUSED',
      stageCursor: 'HITL_DECISION',
      auditLog: [
        auditEvent('HITL_DECISION', 'workflow_paused', {
          checkpointId: hitl.checkpointId,
          reason: hitl.reason
        }, this.nowProvider())
      ]
    })
    await this.store.create(hitl.checkpointId, paused.workflowId, paused.invoiceId, paused, hitl.reason)
    await this.runs.save(paused)
    getWorkflowLogger(paused.workflowId).info('checkpoint_created', {
      checkpointId: hitl.checkpointId,
      reason: hitl.reason
    })
    return this.toResult(paused)
  }

  private async fail(state: WorkflowState, stage: StageName, reason: string): Promise<WorkflowRunResult> {
    const failed = reduceState(state, {
      status: 'FAILED',
      failure: { stage, reason },
      auditLog: [auditEvent(stage, 'workflow_failed', { reason }, this.nowProvider())]
    })
    await this.runs.save(failed)
    getWorkflowLogger(failed.workflowId).warn('workflow_failed', { stage, reason })
    return this.toResult(failed)
  }

  private async abort(state: WorkflowState, stage: StageName, error: unknown): Promise<void> {
    const message = error instanceof Error ? error.message : String(error)
    const code = error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : 'UNEXPECTED'
    const aborted = reduceState(state, {
      status: 'FAILED',
      failure: { stage, reason: message },
      auditLog: [auditEvent(stage, 'workflow_aborted', { code, error: message }, this.nowProvider())]
    })
    await this.runs.save(aborted)
    getWorkflowLogger(aborted.workflowId).error('workflow_aborted', { stage, code, error: message })
  }

  private toResult(state: WorkflowState): WorkflowRunResult {
    const result: WorkflowRunResult = {
      workflowId: state.workflowId,
      invoiceId: state.invoiceId,
      status: state.status,
      state
    }
    if (state.status === 'PAUSED' && state.hitl) result.checkpointId = state.hitl.checkpointId
    if (state.failure) result.failureReason = state.failure.reason
    return result
  }
}
