// @vitest-environment node
import { describe, it, expect, beforeEach } from 'vitest'
import { ZodError } from 'zod'
import { InMemoryCheckpointStore } from '../src/services/checkpoint-store'
import { WorkflowNotFoundError } from '../src/services/errors'
import { InvoiceWorkflowService } from '../src/services/invoice-workflow-service'
import { SelectionHistory } from '../src/services/selection-history'
import { InMemoryWorkflowRunRepository } from '../src/services/workflow-run-repository'
import { acmeInvoice, FIXED_NOW, sequence, TEST_SETTINGS } from './fixtures'

function buildService() {
  const store = new InMemoryCheckpointStore()
  return {
    store,
    service: new InvoiceWorkflowService(TEST_SETTINGS, {
      store,
      runs: new InMemoryWorkflowRunRepository(),
      history: new SelectionHistory(),
      now: () => FIXED_NOW,
      workflowIdFactory: sequence('wf'),
      checkpointIdFactory: sequence('chk')
    })
  }
}

describe('InvoiceWorkflowService', () => {
  let service: InvoiceWorkflowService
  let store: InMemoryCheckpointStore

  beforeEach(() => {
    ;({ service, store } = buildService())
  })

  it('reports a paused submission with its checkpoint', async () => {
    expect(await service.submit(acmeInvoice(850))).toEqual({
      workflowId: 'wf_1',
      invoiceId: 'INV-1001',
      status: 'PAUSED',
      checkpointId: 'chk_1'
    })
    const pending = await service.listPendingReviews()
    expect(pending.map((entry) => entry.checkpointId)).toEqual(['chk_1'])
    const review = await service.getReview('chk_1')
    expect(review.state.match?.score).toBe(0.85)
  })

  it('reports a failed submission with its reason', async () => {
    const result = await service.submit({ invoiceId: 'INV-2', vendorName: 'Acme Corp', invoiceDate: '2025-01-01', dueDate: '2025-02-01', amount: -5 })
    expect(result).toEqual({
      workflowId: 'wf_1',
      invoiceId: 'INV-2',
      status: 'FAILED',
      failureReason: 'Invalid invoice payload: amount: Number must be greater than 0'
    })
  })

  it('applies a decision and returns the final status', async () => {
    await service.submit(acmeInvoice(850))
    expect(await service.submitDecision('chk_1', 'ACCEPT', 'reviewer_1', 'ok')).toEqual({
      workflowId: 'wf_1',
      checkpointId: 'chk_1',
      finalStatus: 'COMPLETED'
    })
    expect(await service.listPendingReviews()).toEqual([])
    expect(await service.getAuditLog('wf_1')).toHaveLength(23)
  })

  it('refuses a decision without a reviewer and leaves the checkpoint pending', async () => {
    await service.submit(acmeInvoice(850))
    await expect(service.submitDecision('chk_1', 'ACCEPT', '   ')).rejects.toBeInstanceOf(ZodError)
    expect((await store.get('chk_1')).status).toBe('PENDING')
  })

  it('raises for an unknown workflow audit log', async () => {
    await expect(service.getAuditLog('wf_missing')).rejects.toBeInstanceOf(WorkflowNotFoundError)
  })

  it('groups resolved checkpoints by decision', async () => {
    await service.submit(acmeInvoice(850))
    await service.submit(acmeInvoice(800, { invoiceId: 'INV-1002' }))
    await service.submitDecision('chk_1', 'ACCEPT', 'reviewer_1')
    await service.submitDecision('chk_2', 'REJECT', 'reviewer_2', 'Duplicate billing')

    const history = await service.getDecisionHistory()
    expect(history.ACCEPT).toHaveLength(1)
    expect(history.ACCEPT[0]).toMatchObject({ checkpointId: 'chk_1', invoiceId: 'INV-1001', reviewerId: 'reviewer_1', notes: null })
    expect(history.REJECT).toHaveLength(1)
    expect(history.REJECT[0]).toMatchObject({
      checkpointId: 'chk_2',
      workflowId: 'wf_2',
      invoiceId: 'INV-1002',
      decision: 'REJECT',
      notes: 'Duplicate billing'
    })
  })

  it('exposes the latest tool per selection key', async () => {
    await service.submit(acmeInvoice(1050))
    expect(service.getSelectionHistory()).toEqual({
      INTAKE_storage: 'local_fs',
      UNDERSTAND_ocr: 'aws_textract',
      PREPARE_enrichment: 'clearbit',
      RETRIEVE_erp_connector: 'mock_erp',
      POSTING_erp_connector: 'mock_erp',
      NOTIFY_email: 'ses',
      COMPLETE_db: 'sqlite'
    })
  })

  it('describes the stage graph as data', () => {
    const graph = service.describeGraph()
    expect(graph.stages.map((stage) => stage.name)).toHaveLength(12)
    expect(graph.capabilities).toHaveLength(6)
    expect(graph.transitions).toHaveLength(15)
    expect(graph.transitions.filter((edge) => edge.from === 'MATCH_TWO_WAY' || edge.from === 'HITL_DECISION')).toEqual([
      { from: 'MATCH_TWO_WAY', on: 'BRANCH(checkpoint)', to: 'CHECKPOINT_HITL' },
      { from: 'MATCH_TWO_WAY', on: 'BRANCH(continue)', to: 'RECONCILE' },
      { from: 'HITL_DECISION', on: 'NO_DECISION', to: 'PAUSED' },
      { from: 'HITL_DECISION', on: 'BRANCH(continue)', to: 'RECONCILE' },
      { from: 'HITL_DECISION', on: 'BRANCH(skip)', to: 'COMPLETE' }
    ])
    expect(graph.transitions.at(-1)).toEqual({ from: 'COMPLETE', on: 'CONTINUE', to: 'TERMINAL' })
  })
})
