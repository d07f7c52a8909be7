import { z } from 'zod'
import {
  AccountingEntrySchema,
  GoodsReceiptSchema,
  HistoricalInvoiceSchema,
  InvoiceLineItemSchema,
  InvoicePayloadSchema,
  PurchaseOrderSchema
} from './invoice'

export const StageNameEnum = z.enum([
  'INTAKE',
  'UNDERSTAND',
  'PREPARE',
  'RETRIEVE',
  'MATCH_TWO_WAY',
  'CHECKPOINT_HITL',
  'HITL_DECISION',
  'RECONCILE',
  'APPROVE',
  'POSTING',
  'NOTIFY',
  'COMPLETE'
])
export type StageName = z.infer<typeof StageNameEnum>

export const WorkflowStatusEnum = z.enum(['RUNNING', 'PAUSED', 'COMPLETED', 'MANUAL_HANDOFF', 'FAILED'])
export type WorkflowStatus = z.infer<typeof WorkflowStatusEnum>

export const HitlDecisionEnum = z.enum(['ACCEPT', 'REJECT'])
export type HitlDecision = z.infer<typeof HitlDecisionEnum>

export const AuditEventSchema = z.object({
  stage: StageNameEnum,
  event: z.string().min(1),
  timestamp: z.string(),
  detail: z.record(z.unknown())
})
export type AuditEvent = z.infer<typeof AuditEventSchema>

export const IntakeRecordSchema = z.object({
  rawId: z.string(),
  ingestedAt: z.string(),
  validated: z.boolean()
})
export type IntakeRecord = z.infer<typeof IntakeRecordSchema>

export const UnderstandingSchema = z.object({
  text: z.string(),
  confidence: z.number(),
  lineItems: z.array(InvoiceLineItemSchema),
  detectedPoNumbers: z.array(z.string())
})
export type Understanding = z.infer<typeof UnderstandingSchema>

export const VendorFlagsSchema = z.object({
  missingInfo: z.array(z.string()),
  riskScore: z.number(),
  requiresReview: z.boolean()
})
export type VendorFlags = z.infer<typeof VendorFlagsSchema>

export const VendorProfileSchema = z.object({
  normalizedName: z.string(),
  taxId: z.string().nullable(),
  enrichment: z.record(z.unknown()),
  flags: VendorFlagsSchema
})
export type VendorProfile = z.infer<typeof VendorProfileSchema>

export const ErpSnapshotSchema = z.object({
  purchaseOrders: z.array(PurchaseOrderSchema),
  goodsReceipts: z.array(GoodsReceiptSchema),
  history: z.array(HistoricalInvoiceSchema)
})
export type ErpSnapshot = z.infer<typeof ErpSnapshotSchema>

export const MatchEvidenceSchema = z.object({
  invoiceAmount: z.number(),
  poAmount: z.number(),
  poNumber: z.string().nullable(),
  difference: z.number(),
  amountScore: z.number(),
  lineItemScore: z.number()
})
export type MatchEvidence = z.infer<typeof MatchEvidenceSchema>

export const MatchOutcomeSchema = z.object({
  score: z.number(),
  threshold: z.number(),
  tolerancePct: z.number(),
  deviationPct: z.number(),
  withinTolerance: z.boolean(),
  result: z.enum(['MATCHED', 'FAILED']),
  evidence: MatchEvidenceSchema
})
export type MatchOutcome = z.infer<typeof MatchOutcomeSchema>

export const ReconciliationSchema = z.object({
  entries: z.array(AccountingEntrySchema),
  report: z.object({
    invoiceAmount: z.number(),
    poAmount: z.number(),
    difference: z.number(),
    reconciled: z.boolean()
  })
})
export type Reconciliation = z.infer<typeof ReconciliationSchema>

export const ApprovalSchema = z.object({
  status: z.enum(['AUTO_APPROVED', 'REQUIRES_APPROVAL']),
  approverId: z.string(),
  policy: z.string()
})
export type Approval = z.infer<typeof ApprovalSchema>

export const PostingSchema = z.object({
  posted: z.boolean(),
  erpTxnId: z.string(),
  paymentId: z.string(),
  scheduledDate: z.string()
})
export type Posting = z.infer<typeof PostingSchema>

export const NotificationSchema = z.object({
  recipient: z.string(),
  channel: z.enum(['email', 'slack']),
  status: z.enum(['sent', 'failed'])
})
export type Notification = z.infer<typeof NotificationSchema>

export const NotifyOutcomeSchema = z.object({
  notifications: z.array(NotificationSchema),
  recipients: z.array(z.string())
})
export type NotifyOutcome = z.infer<typeof NotifyOutcomeSchema>

export const FinalSummarySchema = z.object({
  workflowId: z.string(),
  invoiceId: z.string(),
  status: WorkflowStatusEnum,
  vendorName: z.string().nullable(),
  amount: z.number().nullable(),
  currency: z.string().nullable(),
  matchScore: z.number().nullable(),
  approvalStatus: z.string().nullable(),
  erpTxnId: z.string().nullable(),
  paymentId: z.string().nullable(),
  completedAt: z.string()
})
export type FinalSummary = z.infer<typeof FinalSummarySchema>

export const HitlRecordSchema = z.object({
  checkpointId: z.string(),
  reason: z.string(),
  reviewUrl: z.string().optional(),
  decision: HitlDecisionEnum.optional(),
  reviewerId: z.string().optional(),
  notes: z.string().optional(),
  decidedAt: z.string().optional()
})
export type HitlRecord = z.infer<typeof HitlRecordSchema>

export const WorkflowFailureSchema = z.object({
  stage: StageNameEnum,
  reason: z.string()
})
export type WorkflowFailure = z.infer<typeof WorkflowFailureSchema>

export const WorkflowStateSchema = z.object({
  workflowId: z.string(),
  invoiceId: z.string(),
  stageCursor: StageNameEnum,
  status: WorkflowStatusEnum,
  payload: z.unknown(),
  invoice: InvoicePayloadSchema.optional(),
  intake: IntakeRecordSchema.optional(),
  understanding: UnderstandingSchema.optional(),
  vendor: VendorProfileSchema.optional(),
  erp: ErpSnapshotSchema.optional(),
  match: MatchOutcomeSchema.optional(),
  reconciliation: ReconciliationSchema.optional(),
  approval: ApprovalSchema.optional(),
  posting: PostingSchema.optional(),
  notification: NotifyOutcomeSchema.optional(),
  summary: FinalSummarySchema.optional(),
  hitl: HitlRecordSchema.optional(),
  failure: WorkflowFailureSchema.optional(),
  auditLog: z.array(AuditEventSchema),
  toolSelections: z.record(z.string())
})
export type WorkflowState = z.infer<typeof WorkflowStateSchema>
