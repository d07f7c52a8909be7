// @vitest-environment node
import { describe, it, expect, beforeEach } from 'vitest'
import { toNodeListener } from 'h3'
import { fetchNodeRequestHandler } from 'node-mock-http'
import { createWorkflowApp, toHttpError } from '../src/server/app'
import { UnknownCapabilityError } from '../src/services/errors'
import { InMemoryCheckpointStore } from '../src/services/checkpoint-store'
import { InvoiceWorkflowService } from '../src/services/invoice-workflow-service'
import { SelectionHistory } from '../src/services/selection-history'
import { InMemoryWorkflowRunRepository } from '../src/services/workflow-run-repository'
import { acmeInvoice, FIXED_NOW, sequence, TEST_SETTINGS } from './fixtures'

function makeClient() {
  const service = new InvoiceWorkflowService(TEST_SETTINGS, {
    store: new InMemoryCheckpointStore(),
    runs: new InMemoryWorkflowRunRepository(),
    history: new SelectionHistory(),
    now: () => FIXED_NOW,
    workflowIdFactory: sequence('wf'),
    checkpointIdFactory: sequence('chk')
  })
  const listener = toNodeListener(createWorkflowApp(service))
  return async (method: 'GET' | 'POST', path: string, body?: unknown, headers: Record<string, string> = {}) => {
    const res = await fetchNodeRequestHandler(listener, `http://test.local${path}`, {
      method,
      headers: {
        accept: 'application/json',
        ...(body === undefined ? {} : { 'content-type': 'application/json' }),
        ...headers
      },
      body: body === undefined ? undefined : JSON.stringify(body)
    })
    const text = await res.text()
    return { status: res.status, body: text ? JSON.parse(text) : null, headers: res.headers }
  }
}

describe('workflow HTTP routes', () => {
  let request: ReturnType<typeof makeClient>

  beforeEach(() => {
    request = makeClient()
  })

  it('answers health checks and echoes the correlation id', async () => {
    const res = await request('GET', '/health', undefined, { 'x-correlation-id': 'corr_test_health' })
    expect(res.status).toBe(200)
    expect(res.body).toMatchObject({ ok: true, service: 'workflow-server' })
    expect(res.headers.get('x-correlation-id')).toBe('corr_test_health')
  })

  it('submits an invoice and lists the resulting review', async () => {
    const submitted = await request('POST', '/api/v1/invoices', acmeInvoice(850))
    expect(submitted.status).toBe(200)
    expect(submitted.body).toEqual({ workflowId: 'wf_1', invoiceId: 'INV-1001', status: 'PAUSED', checkpointId: 'chk_1' })

    const pending = await request('GET', '/api/v1/reviews/pending')
    expect(pending.status).toBe(200)
    expect(pending.body).toHaveLength(1)
    expect(pending.body[0]).toMatchObject({ checkpointId: 'chk_1', vendorName: 'ACME CORP', amount: 850, status: 'PENDING' })

    const review = await request('GET', '/api/v1/reviews/chk_1')
    expect(review.status).toBe(200)
    expect(review.body.pausedReason).toBe(
      'Match score 0.85 is below threshold 0.90 (deviation 15% against a 5% tolerance)'
    )
  })

  it('records a decision once and rejects the replay with 409', async () => {
    await request('POST', '/api/v1/invoices', acmeInvoice(850))

    const first = await request('POST', '/api/v1/reviews/chk_1/decision', { decision: 'ACCEPT', reviewerId: 'reviewer_1' })
    expect(first.status).toBe(200)
    expect(first.body).toEqual({ workflowId: 'wf_1', checkpointId: 'chk_1', finalStatus: 'COMPLETED' })

    const replay = await request('POST', '/api/v1/reviews/chk_1/decision', { decision: 'REJECT', reviewerId: 'reviewer_2' })
    expect(replay.status).toBe(409)
    expect(replay.body.data).toEqual({ code: 'ALREADY_RESOLVED' })

    const history = await request('GET', '/api/v1/reviews/history')
    expect(history.body.ACCEPT).toHaveLength(1)
    expect(history.body.REJECT).toEqual([])
  })

  it('accepts a decision whose notes are null', async () => {
    await request('POST', '/api/v1/invoices', acmeInvoice(850))
    const res = await request('POST', '/api/v1/reviews/chk_1/decision', { decision: 'REJECT', reviewerId: 'reviewer_1', notes: null })
    expect(res.status).toBe(200)
    expect(res.body.finalStatus).toBe('MANUAL_HANDOFF')

    const history = await request('GET', '/api/v1/reviews/history')
    expect(history.body.REJECT[0]).toMatchObject({ checkpointId: 'chk_1', reviewerId: 'reviewer_1', notes: null })
  })

  it('validates decision bodies', async () => {
    await request('POST', '/api/v1/invoices', acmeInvoice(850))
    const res = await request('POST', '/api/v1/reviews/chk_1/decision', { decision: 'MAYBE', reviewerId: 'reviewer_1' })
    expect(res.status).toBe(400)
    expect(res.body.data.code).toBe('invalid_request')
  })

  it('maps unknown checkpoints and workflows to 404', async () => {
    const review = await request('GET', '/api/v1/reviews/chk_404')
    expect(review.status).toBe(404)
    expect(review.body.data).toEqual({ code: 'CHECKPOINT_NOT_FOUND' })

    const decision = await request('POST', '/api/v1/reviews/chk_404/decision', { decision: 'ACCEPT', reviewerId: 'reviewer_1' })
    expect(decision.status).toBe(404)

    const audit = await request('GET', '/api/v1/workflows/wf_missing/audit')
    expect(audit.status).toBe(404)
    expect(audit.body.data).toEqual({ code: 'WORKFLOW_NOT_FOUND' })
  })

  it('returns the audit trail and tool selections of a finished run', async () => {
    await request('POST', '/api/v1/invoices', acmeInvoice(1050))

    const audit = await request('GET', '/api/v1/workflows/wf_1/audit')
    expect(audit.status).toBe(200)
    expect(audit.body.workflowId).toBe('wf_1')
    expect(audit.body.auditLog).toHaveLength(18)
    expect(audit.body.auditLog.at(-1)).toMatchObject({ stage: 'COMPLETE', event: 'workflow_completed' })

    const selections = await request('GET', '/api/v1/tools/selections')
    expect(selections.body.selections.UNDERSTAND_ocr).toBe('aws_textract')
  })

  it('describes the workflow graph', async () => {
    const res = await request('GET', '/api/v1/workflow/graph')
    expect(res.status).toBe(200)
    expect(res.body.stages[0]).toEqual({
      name: 'INTAKE',
      description: 'Validate the submitted payload and persist the raw invoice.'
    })
    expect(res.body.capabilities.map((entry: { capability: string }) => entry.capability)).toContain('erp_connector')
  })
})

describe('toHttpError', () => {
  it('reports workflow definition defects as server errors', () => {
    const error = toHttpError(new UnknownCapabilityError('fax'))
    expect(error.statusCode).toBe(500)
    expect(error.statusMessage).toBe('Workflow definition error')
    expect(error.data).toEqual({ code: 'UNKNOWN_CAPABILITY' })
  })
})
