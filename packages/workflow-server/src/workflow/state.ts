import type { AuditEvent, StageName, WorkflowState } from '@ledgerline/shared'

type IdentityField = 'workflowId' | 'invoiceId'
type MergedField = 'auditLog' | 'toolSelections'

export type StateUpdate = Partial<Omit<WorkflowState, IdentityField | MergedField>> & {
  auditLog?: AuditEvent[]
  toolSelections?: Record<string, string>
}

function readInvoiceId(payload: unknown): string {
  if (payload && typeof payload === 'object' && 'invoiceId' in payload) {
    const value = payload.invoiceId
    if (typeof value === 'string' && value.trim().length) return value.trim()
  }
  return 'unknown'
}

export function createInitialState(workflowId: string, payload: unknown): WorkflowState {
  return {
    workflowId,
    invoiceId: readInvoiceId(payload),
    stageCursor: 'INTAKE',
    status: 'RUNNING',
    payload,
    auditLog: [],
    toolSelections: {}
  }
}

/**
 * Single merge point for every state change.
 *
 * - `workflowId` / `invoiceId` never change after creation
 * - `auditLog` is appended to, never replaced
 * - `toolSelections` is merged key-wise; a later selection for the same key wins
 * - every other field is owned by one stage and replaced wholesale
 */
export function reduceState(state: WorkflowState, update: StateUpdate): WorkflowState {
  const { auditLog, toolSelections, ...owned } = update
  return {
    ...state,
    ...owned,
    workflowId: state.workflowId,
    invoiceId: state.invoiceId,
    auditLog: auditLog && auditLog.length ? [...state.auditLog, ...auditLog] : state.auditLog,
    toolSelections: toolSelections ? { ...state.toolSelections, ...toolSelections } : state.toolSelections
  }
}

export function auditEvent(
  stage: StageName,
  event: string,
  detail: Record<string, unknown>,
  at: Date
): AuditEvent {
  return { stage, event, timestamp: at.toISOString(), detail }
}
