import { StageNameEnum, type CapabilityName, type CapabilitySelection, type StageName, type WorkflowState } from '@ledgerline/shared'
import { MissingPreconditionError } from '../services/errors'
import type { CapabilityTools } from '../tools/types'
import type { StateUpdate } from './state'

export type BranchLabel = 'checkpoint' | 'continue' | 'skip'

export type StageOutcome =
  | { type: 'CONTINUE' }
  | { type: 'BRANCH'; label: BranchLabel }
  | { type: 'FAIL'; reason: string }

export const Outcome = {
  continue: (): StageOutcome => ({ type: 'CONTINUE' }),
  branch: (label: BranchLabel): StageOutcome => ({ type: 'BRANCH', label }),
  fail: (reason: string): StageOutcome => ({ type: 'FAIL', reason })
}

export type StageResult = {
  update: StateUpdate
  outcome: StageOutcome
}

export type WorkflowSettings = {
  matchThreshold: number
  twoWayTolerancePct: number
  autoApproveLimit: number
  reviewBaseUrl: string
}

export interface StageContext {
  readonly stage: StageName
  readonly settings: WorkflowSettings
  now(): Date
  newCheckpointId(): string
  audit(event: string, detail?: Record<string, unknown>): void
  useTool<C extends CapabilityName>(
    capability: C,
    hints?: Record<string, string>,
    candidatePool?: string[]
  ): { tool: CapabilityTools[C]; selection: CapabilitySelection }
}

export type StageDefinition = {
  name: StageName
  description: string
  run(state: WorkflowState, ctx: StageContext): Promise<StageResult>
}

export function requireField<K extends keyof WorkflowState>(
  state: WorkflowState,
  field: K,
  stage: StageName
): NonNullable<WorkflowState[K]> {
  const value = state[field]
  if (value === undefined || value === null) {
    throw new MissingPreconditionError(stage, String(field))
  }
  return value
}

export class StageRegistry {
  private readonly stages = new Map<StageName, StageDefinition>()

  constructor(definitions: StageDefinition[]) {
    const names = definitions.map((definition) => definition.name)
    const expected = StageNameEnum.options
    if (names.length !== expected.length || names.some((name, idx) => name !== expected[idx])) {
      throw new Error(`Stage registry must define ${expected.join(', ')} in order; got ${names.join(', ')}`)
    }
    for (const definition of definitions) {
      this.stages.set(definition.name, definition)
    }
  }

  get(name: StageName): StageDefinition {
    const definition = this.stages.get(name)
    if (!definition) {
      throw new Error(`Stage ${name} is not registered`)
    }
    return definition
  }

  // Next stage in registry order, null after the last one
  next(name: StageName): StageName | null {
    const order = StageNameEnum.options
    const idx = order.indexOf(name)
    return idx >= 0 && idx < order.length - 1 ? order[idx + 1] : null
  }

  list(): StageDefinition[] {
    return StageNameEnum.options.map((name) => this.get(name))
  }
}
