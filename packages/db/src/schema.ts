import { pgTable, text, timestamp, jsonb, doublePrecision, index } from 'drizzle-orm/pg-core'
import type { CheckpointStatus, HitlDecision, StageName, WorkflowStatus } from '@ledgerline/shared'

export const workflowRuns = pgTable('workflow_runs', {
  workflowId: text('workflow_id').primaryKey(),
  invoiceId: text('invoice_id').notNull(),
  status: text('status').$type<WorkflowStatus>().notNull().default('RUNNING'),
  stageCursor: text('stage_cursor').$type<StageName>().notNull(),
  stateJson: jsonb('state_json').$type<Record<string, unknown>>().notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull()
}, (table) => ({
  invoiceIdx: index('workflow_runs_invoice_idx').on(table.invoiceId)
}))

export const workflowCheckpoints = pgTable('workflow_checkpoints', {
  checkpointId: text('checkpoint_id').primaryKey(),
  workflowId: text('workflow_id').notNull(),
  invoiceId: text('invoice_id').notNull(),
  stateJson: jsonb('state_json').$type<Record<string, unknown>>().notNull(),
  pausedReason: text('paused_reason').notNull(),
  status: text('status').$type<CheckpointStatus>().notNull().default('PENDING'),
  decision: text('decision').$type<HitlDecision>(),
  reviewerId: text('reviewer_id'),
  decisionNotes: text('decision_notes'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  resolvedAt: timestamp('resolved_at', { withTimezone: true })
}, (table) => ({
  statusIdx: index('workflow_checkpoints_status_idx').on(table.status, table.resolvedAt),
  workflowIdx: index('workflow_checkpoints_workflow_idx').on(table.workflowId)
}))

export const humanReviewQueue = pgTable('human_review_queue', {
  checkpointId: text('checkpoint_id')
    .primaryKey()
    .references(() => workflowCheckpoints.checkpointId, { onDelete: 'cascade' }),
  workflowId: text('workflow_id').notNull(),
  invoiceId: text('invoice_id').notNull(),
  vendorName: text('vendor_name').notNull(),
  amount: doublePrecision('amount').notNull(),
  currency: text('currency').notNull(),
  reasonForHold: text('reason_for_hold').notNull(),
  reviewUrl: text('review_url').notNull(),
  status: text('status').$type<CheckpointStatus>().notNull().default('PENDING'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull()
}, (table) => ({
  pendingIdx: index('human_review_queue_status_idx').on(table.status, table.createdAt)
}))
