// @vitest-environment node
import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest'
import type { WorkflowState } from '@ledgerline/shared'
import { InMemoryCheckpointStore } from '../src/services/checkpoint-store'
import { AlreadyResolvedError, CheckpointNotFoundError, DuplicateCheckpointError } from '../src/services/errors'
import { createInitialState, reduceState } from '../src/workflow/state'

function pausedState(workflowId: string, invoiceId: string, checkpointId: string): WorkflowState {
  return reduceState(createInitialState(workflowId, { invoiceId }), {
    status: 'PAUSED',
    stageCursor: 'HITL_DECISION',
    invoice: {
      invoiceId,
      vendorName: 'Acme Corp',
      invoiceDate: '2025-01-15',
      dueDate: '2025-02-15',
      amount: 850,
      currency: 'USD',
      lineItems: [],
      attachments: []
    },
    hitl: { checkpointId, reason: 'Match score 0.85 is below threshold 0.90', reviewUrl: `http://review.test/${checkpointId}` }
  })
}

describe('InMemoryCheckpointStore', () => {
  let store: InMemoryCheckpointStore

  beforeEach(() => {
    store = new InMemoryCheckpointStore()
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2025-03-01T09:00:00.000Z'))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('creates a pending checkpoint with its review queue entry', async () => {
    const state = pausedState('wf_1', 'INV-1', 'chk_1')
    await store.create('chk_1', 'wf_1', 'INV-1', state, 'Match score 0.85 is below threshold 0.90')

    const record = await store.get('chk_1')
    expect(record.status).toBe('PENDING')
    expect(record.decision).toBeNull()
    expect(record.state).toEqual(state)

    expect(await store.listPending()).toEqual([
      {
        checkpointId: 'chk_1',
        workflowId: 'wf_1',
        invoiceId: 'INV-1',
        vendorName: 'Acme Corp',
        amount: 850,
        currency: 'USD',
        reason: 'Match score 0.85 is below threshold 0.90',
        reviewUrl: 'http://review.test/chk_1',
        createdAt: new Date('2025-03-01T09:00:00.000Z'),
        status: 'PENDING'
      }
    ])
  })

  it('rejects a duplicate checkpoint id and keeps the original', async () => {
    await store.create('chk_1', 'wf_1', 'INV-1', pausedState('wf_1', 'INV-1', 'chk_1'), 'first')
    await expect(
      store.create('chk_1', 'wf_2', 'INV-2', pausedState('wf_2', 'INV-2', 'chk_1'), 'second')
    ).rejects.toBeInstanceOf(DuplicateCheckpointError)
    expect((await store.get('chk_1')).pausedReason).toBe('first')
    expect(await store.listPending()).toHaveLength(1)
  })

  it('lists pending reviews newest first', async () => {
    await store.create('chk_old', 'wf_1', 'INV-1', pausedState('wf_1', 'INV-1', 'chk_old'), 'older')
    vi.setSystemTime(new Date('2025-03-01T10:00:00.000Z'))
    await store.create('chk_new', 'wf_2', 'INV-2', pausedState('wf_2', 'INV-2', 'chk_new'), 'newer')
    expect((await store.listPending()).map((entry) => entry.checkpointId)).toEqual(['chk_new', 'chk_old'])
  })

  it('throws when a checkpoint is missing', async () => {
    await expect(store.get('chk_missing')).rejects.toBeInstanceOf(CheckpointNotFoundError)
    await expect(store.resolve('chk_missing', 'ACCEPT', 'reviewer_1', null)).rejects.toBeInstanceOf(
      CheckpointNotFoundError
    )
  })

  it('resolves once and drops the entry from the pending queue', async () => {
    await store.create('chk_1', 'wf_1', 'INV-1', pausedState('wf_1', 'INV-1', 'chk_1'), 'hold')
    const resolved = await store.resolve('chk_1', 'REJECT', 'reviewer_1', 'Amount disputed')

    expect(resolved).toMatchObject({
      status: 'RESOLVED',
      decision: 'REJECT',
      reviewerId: 'reviewer_1',
      notes: 'Amount disputed',
      resolvedAt: new Date('2025-03-01T09:00:00.000Z')
    })
    expect(await store.listPending()).toEqual([])
    expect((await store.listResolved()).map((record) => record.checkpointId)).toEqual(['chk_1'])

    await expect(store.resolve('chk_1', 'ACCEPT', 'reviewer_2', null)).rejects.toBeInstanceOf(AlreadyResolvedError)
    const stored = await store.get('chk_1')
    expect(stored.decision).toBe('REJECT')
    expect(stored.reviewerId).toBe('reviewer_1')
  })

  it('lets exactly one of two concurrent resolves win', async () => {
    await store.create('chk_1', 'wf_1', 'INV-1', pausedState('wf_1', 'INV-1', 'chk_1'), 'hold')
    const results = await Promise.allSettled([
      store.resolve('chk_1', 'ACCEPT', 'reviewer_a', null),
      store.resolve('chk_1', 'REJECT', 'reviewer_b', null)
    ])
    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected'])
    const rejected = results[1]
    expect(rejected.status === 'rejected' && rejected.reason).toBeInstanceOf(AlreadyResolvedError)
    expect((await store.get('chk_1')).decision).toBe('ACCEPT')
  })

  it('returns copies that callers cannot mutate', async () => {
    await store.create('chk_1', 'wf_1', 'INV-1', pausedState('wf_1', 'INV-1', 'chk_1'), 'hold')
    const record = await store.get('chk_1')
    record.state.auditLog.push({ stage: 'INTAKE', event: 'tampered', timestamp: '', detail: {} })
    expect((await store.get('chk_1')).state.auditLog).toEqual([])
  })
})
