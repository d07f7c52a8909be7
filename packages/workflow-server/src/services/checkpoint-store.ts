import {
  CheckpointRecordSchema,
  type CheckpointRecord,
  type HitlDecision,
  type ReviewQueueEntry,
  type WorkflowState
} from '@ledgerline/shared'
import { and, desc, eq, getDb, humanReviewQueue, workflowCheckpoints, type Database } from '@ledgerline/db'
import { AlreadyResolvedError, CheckpointNotFoundError, DuplicateCheckpointError } from './errors'
import { getLogger } from './logger'

export interface CheckpointStore {
  create(checkpointId: string, workflowId: string, invoiceId: string, state: WorkflowState, reason: string): Promise<CheckpointRecord>
  get(checkpointId: string): Promise<CheckpointRecord>
  listPending(): Promise<ReviewQueueEntry[]>
  resolve(checkpointId: string, decision: HitlDecision, reviewerId: string, notes: string | null): Promise<CheckpointRecord>
  listResolved(): Promise<CheckpointRecord[]>
}

type QueueProjection = Pick<ReviewQueueEntry, 'vendorName' | 'amount' | 'currency' | 'reviewUrl'>

function projectQueueFields(state: WorkflowState): QueueProjection {
  return {
    vendorName: state.vendor?.normalizedName ?? state.invoice?.vendorName ?? 'UNKNOWN',
    amount: state.invoice?.amount ?? 0,
    currency: state.invoice?.currency ?? 'USD',
    reviewUrl: state.hitl?.reviewUrl ?? ''
  }
}

export class DatabaseCheckpointStore implements CheckpointStore {
  constructor(private readonly db: Database = getDb()) {}

  async create(checkpointId: string, workflowId: string, invoiceId: string, state: WorkflowState, reason: string) {
    const createdAt = new Date()
    const projection = projectQueueFields(state)
    await this.db.transaction(async (tx) => {
      const inserted = await tx
        .insert(workflowCheckpoints)
        .values({
          checkpointId,
          workflowId,
          invoiceId,
          stateJson: structuredClone(state),
          pausedReason: reason,
          status: 'PENDING',
          createdAt
        })
        .onConflictDoNothing({ target: workflowCheckpoints.checkpointId })
        .returning({ checkpointId: workflowCheckpoints.checkpointId })
      if (inserted.length === 0) {
        throw new DuplicateCheckpointError(checkpointId)
      }
      await tx.insert(humanReviewQueue).values({
        checkpointId,
        workflowId,
        invoiceId,
        vendorName: projection.vendorName,
        amount: projection.amount,
        currency: projection.currency,
        reasonForHold: reason,
        reviewUrl: projection.reviewUrl,
        status: 'PENDING',
        createdAt
      })
    })
    return CheckpointRecordSchema.parse({
      checkpointId,
      workflowId,
      invoiceId,
      state,
      pausedReason: reason,
      createdAt,
      status: 'PENDING',
      decision: null,
      reviewerId: null,
      notes: null,
      resolvedAt: null
    })
  }

  async get(checkpointId: string) {
    const [row] = await this.db
      .select()
      .from(workflowCheckpoints)
      .where(eq(workflowCheckpoints.checkpointId, checkpointId))
      .limit(1)
    if (!row) throw new CheckpointNotFoundError(checkpointId)
    return this.mapCheckpoint(row)
  }

  async listPending(): Promise<ReviewQueueEntry[]> {
    const rows = await this.db
      .select()
      .from(humanReviewQueue)
      .where(eq(humanReviewQueue.status, 'PENDING'))
      .orderBy(desc(humanReviewQueue.createdAt))
    return rows.map((row) => ({
      checkpointId: row.checkpointId,
      workflowId: row.workflowId,
      invoiceId: row.invoiceId,
      vendorName: row.vendorName,
      amount: row.amount,
      currency: row.currency,
      reason: row.reasonForHold,
      reviewUrl: row.reviewUrl,
      createdAt: new Date(row.createdAt),
      status: row.status
    }))
  }

  async resolve(checkpointId: string, decision: HitlDecision, reviewerId: string, notes: string | null) {
    return this.db.transaction(async (tx) => {
      // Only one writer can flip a PENDING row
      const [row] = await tx
        .update(workflowCheckpoints)
        .set({ status: 'RESOLVED', decision, reviewerId, decisionNotes: notes, resolvedAt: new Date() })
        .where(and(eq(workflowCheckpoints.checkpointId, checkpointId), eq(workflowCheckpoints.status, 'PENDING')))
        .returning()
      if (!row) {
        const [existing] = await tx
          .select({ checkpointId: workflowCheckpoints.checkpointId })
          .from(workflowCheckpoints)
          .where(eq(workflowCheckpoints.checkpointId, checkpointId))
          .limit(1)
        throw existing ? new AlreadyResolvedError(checkpointId) : new CheckpointNotFoundError(checkpointId)
      }
      await tx
        .update(humanReviewQueue)
        .set({ status: 'RESOLVED' })
        .where(eq(humanReviewQueue.checkpointId, checkpointId))
      return this.mapCheckpoint(row)
    })
  }

  async listResolved() {
    const rows = await this.db
      .select()
      .from(workflowCheckpoints)
      .where(eq(workflowCheckpoints.status, 'RESOLVED'))
      .orderBy(desc(workflowCheckpoints.resolvedAt))
    return rows.map((row) => this.mapCheckpoint(row))
  }

  private mapCheckpoint(row: typeof workflowCheckpoints.$inferSelect): CheckpointRecord {
    return CheckpointRecordSchema.parse({
      checkpointId: row.checkpointId,
      workflowId: row.workflowId,
      invoiceId: row.invoiceId,
      state: row.stateJson,
      pausedReason: row.pausedReason,
      createdAt: row.createdAt,
      status: row.status,
      decision: row.decision ?? null,
      reviewerId: row.reviewerId ?? null,
      notes: row.decisionNotes ?? null,
      resolvedAt: row.resolvedAt ?? null
    })
  }
}

export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly checkpoints = new Map<string, CheckpointRecord>()
  private readonly queue = new Map<string, ReviewQueueEntry>()

  async create(checkpointId: string, workflowId: string, invoiceId: string, state: WorkflowState, reason: string) {
    if (this.checkpoints.has(checkpointId)) {
      throw new DuplicateCheckpointError(checkpointId)
    }
    const createdAt = new Date()
    const record: CheckpointRecord = {
      checkpointId,
      workflowId,
      invoiceId,
      state: structuredClone(state),
      pausedReason: reason,
      createdAt,
      status: 'PENDING',
      decision: null,
      reviewerId: null,
      notes: null,
      resolvedAt: null
    }
    this.checkpoints.set(checkpointId, record)
    this.queue.set(checkpointId, {
      checkpointId,
      workflowId,
      invoiceId,
      ...projectQueueFields(state),
      reason,
      createdAt,
      status: 'PENDING'
    })
    return structuredClone(record)
  }

  async get(checkpointId: string) {
    const record = this.checkpoints.get(checkpointId)
    if (!record) throw new CheckpointNotFoundError(checkpointId)
    return structuredClone(record)
  }

  async listPending() {
    // Reverse insertion order breaks ties between entries created in the same millisecond
    return [...this.queue.values()]
      .filter((entry) => entry.status === 'PENDING')
      .reverse()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((entry) => ({ ...entry, createdAt: new Date(entry.createdAt) }))
  }

  async resolve(checkpointId: string, decision: HitlDecision, reviewerId: string, notes: string | null) {
    const record = this.checkpoints.get(checkpointId)
    if (!record) throw new CheckpointNotFoundError(checkpointId)
    if (record.status !== 'PENDING') throw new AlreadyResolvedError(checkpointId)

    const resolved: CheckpointRecord = { ...record, status: 'RESOLVED', decision, reviewerId, notes, resolvedAt: new Date() }
    this.checkpoints.set(checkpointId, resolved)
    const entry = this.queue.get(checkpointId)
    if (entry) this.queue.set(checkpointId, { ...entry, status: 'RESOLVED' })
    return structuredClone(resolved)
  }

  async listResolved() {
    return [...this.checkpoints.values()]
      .filter((record) => record.status === 'RESOLVED')
      .reverse()
      .sort((a, b) => (b.resolvedAt?.getTime() ?? 0) - (a.resolvedAt?.getTime() ?? 0))
      .map((record) => structuredClone(record))
  }
}

let activeStore: CheckpointStore | null = null

export function getCheckpointStore(): CheckpointStore {
  if (!activeStore) {
    if (process.env.DATABASE_URL) {
      activeStore = new DatabaseCheckpointStore()
    } else {
      getLogger().warn('checkpoint_store_in_memory', { durable: false })
      activeStore = new InMemoryCheckpointStore()
    }
  }
  return activeStore
}

export function setCheckpointStore(store: CheckpointStore) {
  activeStore = store
}

export function resetCheckpointStore() {
  activeStore = new InMemoryCheckpointStore()
}
