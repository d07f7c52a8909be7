// @vitest-environment node
import { describe, it, expect } from 'vitest'
import { auditEvent, createInitialState, reduceState } from '../src/workflow/state'

const at = new Date('2025-03-01T09:00:00.000Z')

describe('createInitialState', () => {
  it('takes the invoice id from the raw payload', () => {
    const state = createInitialState('wf_1', { invoiceId: ' INV-1 ' })
    expect(state).toEqual({
      workflowId: 'wf_1',
      invoiceId: 'INV-1',
      stageCursor: 'INTAKE',
      status: 'RUNNING',
      payload: { invoiceId: ' INV-1 ' },
      auditLog: [],
      toolSelections: {}
    })
  })

  it('marks payloads without an invoice id as unknown', () => {
    expect(createInitialState('wf_2', 'not an object').invoiceId).toBe('unknown')
    expect(createInitialState('wf_3', { invoiceId: 42 }).invoiceId).toBe('unknown')
  })
})

describe('reduceState', () => {
  it('appends audit events instead of replacing them', () => {
    const first = reduceState(createInitialState('wf_1', {}), {
      auditLog: [auditEvent('INTAKE', 'invoice_ingested', {}, at)]
    })
    const second = reduceState(first, {
      auditLog: [auditEvent('UNDERSTAND', 'invoice_understood', {}, at)]
    })
    expect(second.auditLog.map((event) => event.event)).toEqual(['invoice_ingested', 'invoice_understood'])
    expect(first.auditLog).toHaveLength(1)
  })

  it('merges tool selections key by key', () => {
    const first = reduceState(createInitialState('wf_1', {}), { toolSelections: { INTAKE_storage: 'local_fs' } })
    const second = reduceState(first, { toolSelections: { UNDERSTAND_ocr: 'aws_textract', INTAKE_storage: 's3' } })
    expect(second.toolSelections).toEqual({ INTAKE_storage: 's3', UNDERSTAND_ocr: 'aws_textract' })
  })

  it('replaces owned fields wholesale', () => {
    const state = reduceState(createInitialState('wf_1', {}), {
      approval: { status: 'AUTO_APPROVED', approverId: 'system', policy: 'p1' }
    })
    const next = reduceState(state, {
      approval: { status: 'REQUIRES_APPROVAL', approverId: 'finance_manager', policy: 'p2' }
    })
    expect(next.approval).toEqual({ status: 'REQUIRES_APPROVAL', approverId: 'finance_manager', policy: 'p2' })
  })

  it('keeps identity fields even when an update smuggles them in', () => {
    const state = createInitialState('wf_1', { invoiceId: 'INV-1' })
    const update = { status: 'FAILED' as const, workflowId: 'wf_other', invoiceId: 'INV-other' }
    const next = reduceState(state, update)
    expect(next.workflowId).toBe('wf_1')
    expect(next.invoiceId).toBe('INV-1')
    expect(next.status).toBe('FAILED')
  })
})
