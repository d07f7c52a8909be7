import { randomUUID } from 'node:crypto'
import type { AuditEvent, CapabilityName, CapabilitySelection, StageName, WorkflowState } from '@ledgerline/shared'
import { CapabilityRouter } from '../services/capability-router'
import { getWorkflowLogger } from '../services/logger'
import { ToolDispatcher } from '../tools/tool-dispatcher'
import type { StageContext, StageOutcome, StageRegistry, WorkflowSettings } from './stage-registry'
import { auditEvent, reduceState } from './state'

export type StageExecution =
  | { ok: true; state: WorkflowState; outcome: StageOutcome }
  | { ok: false; state: WorkflowState; error: unknown }

export type StageExecutorOptions = {
  router?: CapabilityRouter
  dispatcher?: ToolDispatcher
  now?: () => Date
  checkpointIdFactory?: () => string
}

type Scratch = {
  auditLog: AuditEvent[]
  toolSelections: Record<string, string>
}

export class StageExecutor {
  private readonly router: CapabilityRouter
  private readonly dispatcher: ToolDispatcher
  private readonly nowProvider: () => Date
  private readonly checkpointIdFactory: () => string

  constructor(
    private readonly registry: StageRegistry,
    private readonly settings: WorkflowSettings,
    options: StageExecutorOptions = {}
  ) {
    this.nowProvider = options.now ?? (() => new Date())
    this.router = options.router ?? new CapabilityRouter(undefined, undefined, { now: this.nowProvider })
    this.dispatcher = options.dispatcher ?? new ToolDispatcher()
    this.checkpointIdFactory = options.checkpointIdFactory ?? (() => `chk_${randomUUID()}`)
  }

  /**
   * Runs one stage against `state`. Selections and audit events recorded in the
   * stage's scratch buffer are merged even when the stage throws.
   */
  async execute(stage: StageName, state: WorkflowState): Promise<StageExecution> {
    const definition = this.registry.get(stage)
    const scratch: Scratch = { auditLog: [], toolSelections: {} }
    const ctx = this.createContext(stage, scratch)
    const started = reduceState(state, { stageCursor: stage })
    const log = getWorkflowLogger(state.workflowId)

    try {
      const { update, outcome } = await definition.run(started, ctx)
      const next = reduceState(reduceState(started, scratch), update)
      log.info('workflow_stage_completed', {
        stage,
        outcome: outcome.type,
        label: outcome.type === 'BRANCH' ? outcome.label : undefined
      })
      return { ok: true, state: next, outcome }
    } catch (error) {
      log.error('workflow_stage_errored', {
        stage,
        error: error instanceof Error ? error.message : String(error)
      })
      return { ok: false, state: reduceState(started, scratch), error }
    }
  }

  private createContext(stage: StageName, scratch: Scratch): StageContext {
    const router = this.router
    const dispatcher = this.dispatcher
    const now = this.nowProvider
    const record = (selection: CapabilitySelection) => {
      scratch.toolSelections[selection.selectionKey] = selection.chosen
      scratch.auditLog.push(
        auditEvent(stage, 'capability_selected', {
          capability: selection.capability,
          tool: selection.chosen,
          backend: selection.backend,
          hints: selection.contextHints
        }, now())
      )
    }

    return {
      stage,
      settings: this.settings,
      now,
      newCheckpointId: this.checkpointIdFactory,
      audit(event, detail = {}) {
        scratch.auditLog.push(auditEvent(stage, event, detail, now()))
      },
      useTool<C extends CapabilityName>(capability: C, hints?: Record<string, string>, candidatePool?: string[]) {
        const selection = router.select(capability, { stage, hints }, candidatePool, record)
        return { tool: dispatcher.dispatch(capability, selection), selection }
      }
    }
  }
}
