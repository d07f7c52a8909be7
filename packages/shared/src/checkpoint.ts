import { z } from 'zod'
import { HitlDecisionEnum, WorkflowStateSchema, WorkflowStatusEnum } from './workflow'

export const CheckpointStatusEnum = z.enum(['PENDING', 'RESOLVED'])
export type CheckpointStatus = z.infer<typeof CheckpointStatusEnum>

export const CheckpointRecordSchema = z.object({
  checkpointId: z.string(),
  workflowId: z.string(),
  invoiceId: z.string(),
  state: WorkflowStateSchema,
  pausedReason: z.string(),
  createdAt: z.coerce.date(),
  status: CheckpointStatusEnum,
  decision: HitlDecisionEnum.nullable(),
  reviewerId: z.string().nullable(),
  notes: z.string().nullable(),
  resolvedAt: z.coerce.date().nullable()
})
export type CheckpointRecord = z.infer<typeof CheckpointRecordSchema>

export const ReviewQueueEntrySchema = z.object({
  checkpointId: z.string(),
  workflowId: z.string(),
  invoiceId: z.string(),
  vendorName: z.string(),
  amount: z.number(),
  currency: z.string(),
  reason: z.string(),
  reviewUrl: z.string(),
  createdAt: z.coerce.date(),
  status: CheckpointStatusEnum
})
export type ReviewQueueEntry = z.infer<typeof ReviewQueueEntrySchema>

export const HumanDecisionInputSchema = z.object({
  decision: HitlDecisionEnum,
  reviewerId: z.string().trim().min(1, 'Reviewer id is required.'),
  notes: z.string().trim().nullish()
})
export type HumanDecisionInput = z.infer<typeof HumanDecisionInputSchema>

export const ResolvedReviewSchema = z.object({
  checkpointId: z.string(),
  workflowId: z.string(),
  invoiceId: z.string(),
  decision: HitlDecisionEnum,
  reviewerId: z.string().nullable(),
  notes: z.string().nullable(),
  resolvedAt: z.coerce.date().nullable()
})
export type ResolvedReview = z.infer<typeof ResolvedReviewSchema>

export type DecisionHistory = {
  ACCEPT: ResolvedReview[]
  REJECT: ResolvedReview[]
}

export const SubmitResultSchema = z.object({
  workflowId: z.string(),
  invoiceId: z.string(),
  status: WorkflowStatusEnum,
  checkpointId: z.string().optional(),
  failureReason: z.string().optional()
})
export type SubmitResult = z.infer<typeof SubmitResultSchema>

export const DecisionResultSchema = z.object({
  workflowId: z.string(),
  checkpointId: z.string(),
  finalStatus: WorkflowStatusEnum
})
export type DecisionResult = z.infer<typeof DecisionResultSchema>
