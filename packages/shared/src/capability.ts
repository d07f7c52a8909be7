import { z } from 'zod'
import { StageNameEnum } from './workflow'

export const CapabilityNameEnum = z.enum(['ocr', 'enrichment', 'erp_connector', 'storage', 'db', 'email'])
export type CapabilityName = z.infer<typeof CapabilityNameEnum>

// LOCAL: runs without any external system. EXTERNAL: needs a third-party system.
export const ToolBackendKindEnum = z.enum(['LOCAL', 'EXTERNAL'])
export type ToolBackendKind = z.infer<typeof ToolBackendKindEnum>

export const SelectionPriorityEnum = z.enum(['speed', 'cost', 'accuracy', 'balanced'])
export type SelectionPriority = z.infer<typeof SelectionPriorityEnum>

export const CostClassEnum = z.enum(['free', 'low', 'medium', 'high'])
export type CostClass = z.infer<typeof CostClassEnum>

export const LatencyClassEnum = z.enum(['very_fast', 'fast', 'medium', 'slow'])
export type LatencyClass = z.infer<typeof LatencyClassEnum>

export const AccuracyClassEnum = z.enum(['high', 'medium', 'low'])
export type AccuracyClass = z.infer<typeof AccuracyClassEnum>

export const ToolProfileSchema = z.object({
  name: z.string().min(1),
  cost: CostClassEnum,
  latency: LatencyClassEnum,
  accuracy: AccuracyClassEnum,
  available: z.boolean().default(true)
})
export type ToolProfile = z.infer<typeof ToolProfileSchema>

export const CapabilityDefinitionSchema = z.object({
  capability: CapabilityNameEnum,
  backend: ToolBackendKindEnum,
  summary: z.string(),
  tools: z.array(ToolProfileSchema).min(1)
})
export type CapabilityDefinition = z.infer<typeof CapabilityDefinitionSchema>

export const CapabilitySelectionSchema = z.object({
  capability: CapabilityNameEnum,
  chosen: z.string(),
  backend: ToolBackendKindEnum,
  stage: StageNameEnum,
  selectionKey: z.string(),
  contextHints: z.record(z.string()),
  timestamp: z.string()
})
export type CapabilitySelection = z.infer<typeof CapabilitySelectionSchema>

export function selectionKeyFor(stage: string, capability: CapabilityName): string {
  return `${stage}_${capability}`
}
