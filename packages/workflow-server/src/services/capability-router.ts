import {
  CapabilityNameEnum,
  SelectionPriorityEnum,
  selectionKeyFor,
  type AccuracyClass,
  type CapabilityDefinition,
  type CapabilityName,
  type CapabilitySelection,
  type CostClass,
  type LatencyClass,
  type StageName,
  type ToolBackendKind,
  type ToolProfile
} from '@ledgerline/shared'
import { CAPABILITY_CATALOG } from '../capabilities/catalog'
import { EmptyCandidatePoolError, UnknownCapabilityError } from './errors'
import { getLogger } from './logger'
import { getSelectionHistory, type SelectionHistory } from './selection-history'

export type SelectionContext = {
  stage: StageName
  hints?: Record<string, string>
}

export type SelectionSink = (selection: CapabilitySelection) => void

type Weights = { cost: number; latency: number; accuracy: number }

const COST_SCORES: Record<CostClass, number> = { free: 6, low: 4, medium: 2, high: 0 }
const LATENCY_SCORES: Record<LatencyClass, number> = { very_fast: 6, fast: 4, medium: 2, slow: 0 }
const ACCURACY_SCORES: Record<AccuracyClass, number> = { high: 6, medium: 3, low: 0 }

const WEIGHT_PROFILES = {
  speed: { cost: 1, latency: 3, accuracy: 1 },
  cost: { cost: 3, latency: 1, accuracy: 1 },
  accuracy: { cost: 1, latency: 1, accuracy: 3 },
  balanced: { cost: 1, latency: 1, accuracy: 1 }
} satisfies Record<string, Weights>

type Candidate = { name: string; profile: ToolProfile | null }

export function scoreTool(profile: ToolProfile | null, weights: Weights): number {
  if (!profile) return 0
  return (
    weights.cost * COST_SCORES[profile.cost] +
    weights.latency * LATENCY_SCORES[profile.latency] +
    weights.accuracy * ACCURACY_SCORES[profile.accuracy]
  )
}

export function resolveWeights(hints: Record<string, string> | undefined): Weights {
  const parsed = SelectionPriorityEnum.safeParse(hints?.priority)
  return parsed.success ? WEIGHT_PROFILES[parsed.data] : WEIGHT_PROFILES.balanced
}

export class CapabilityRouter {
  private readonly nowProvider: () => Date

  constructor(
    private readonly catalog: Record<CapabilityName, CapabilityDefinition> = CAPABILITY_CATALOG,
    private readonly history: SelectionHistory = getSelectionHistory(),
    options?: { now?: () => Date }
  ) {
    this.nowProvider = options?.now ?? (() => new Date())
  }

  select(
    capability: string,
    context: SelectionContext,
    candidatePool: string[] | undefined,
    sink: SelectionSink
  ): CapabilitySelection {
    const definition = this.resolve(capability)
    const candidates = this.buildCandidates(definition, candidatePool)
    if (candidates.length === 0) {
      throw new EmptyCandidatePoolError(capability)
    }

    const weights = resolveWeights(context.hints)
    let best = candidates[0]
    let bestScore = scoreTool(best.profile, weights)
    for (const candidate of candidates.slice(1)) {
      const score = scoreTool(candidate.profile, weights)
      if (score > bestScore) {
        best = candidate
        bestScore = score
      }
    }

    const selection: CapabilitySelection = {
      capability: definition.capability,
      chosen: best.name,
      backend: definition.backend,
      stage: context.stage,
      selectionKey: selectionKeyFor(context.stage, definition.capability),
      contextHints: { ...(context.hints ?? {}) },
      timestamp: this.nowProvider().toISOString()
    }

    sink(selection)
    this.history.record(selection)
    getLogger().info('capability_selected', {
      capability: selection.capability,
      chosen: selection.chosen,
      backend: selection.backend,
      stage: selection.stage,
      score: bestScore,
      candidates: candidates.map((entry) => entry.name)
    })
    return selection
  }

  classify(capability: string): ToolBackendKind {
    return this.resolve(capability).backend
  }

  describe(): CapabilityDefinition[] {
    return CapabilityNameEnum.options.map((name) => {
      const definition = this.catalog[name]
      return { ...definition, tools: definition.tools.map((tool) => ({ ...tool })) }
    })
  }

  private resolve(capability: string): CapabilityDefinition {
    const parsed = CapabilityNameEnum.safeParse(capability)
    if (!parsed.success) {
      throw new UnknownCapabilityError(capability)
    }
    return this.catalog[parsed.data]
  }

  private buildCandidates(definition: CapabilityDefinition, candidatePool: string[] | undefined): Candidate[] {
    const pool = candidatePool ?? definition.tools.map((tool) => tool.name)
    const candidates: Candidate[] = []
    for (const name of pool) {
      const profile = definition.tools.find((tool) => tool.name === name) ?? null
      if (profile && !profile.available) continue
      candidates.push({ name, profile })
    }
    return candidates
  }
}
