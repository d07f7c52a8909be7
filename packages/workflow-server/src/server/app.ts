import {
  createApp,
  createError,
  createRouter,
  defineEventHandler,
  getRequestHeader,
  getRouterParam,
  readBody,
  setResponseHeader,
  type H3Event
} from 'h3'
import { ZodError } from 'zod'
import { HumanDecisionInputSchema } from '@ledgerline/shared'
import { isProgrammingError, WorkflowError } from '../services/errors'
import type { InvoiceWorkflowService } from '../services/invoice-workflow-service'
import { genCorrelationId, getLogger } from '../services/logger'

const STATUS_BY_CODE: Record<string, { statusCode: number; statusMessage: string }> = {
  CHECKPOINT_NOT_FOUND: { statusCode: 404, statusMessage: 'Checkpoint not found' },
  WORKFLOW_NOT_FOUND: { statusCode: 404, statusMessage: 'Workflow not found' },
  ALREADY_RESOLVED: { statusCode: 409, statusMessage: 'Checkpoint already resolved' },
  DUPLICATE_CHECKPOINT: { statusCode: 409, statusMessage: 'Duplicate checkpoint' }
}

export function toHttpError(error: unknown) {
  if (error instanceof ZodError) {
    return createError({
      statusCode: 400,
      statusMessage: 'Invalid request',
      data: { code: 'invalid_request', issues: error.issues.map((issue) => issue.message) }
    })
  }
  if (isProgrammingError(error)) {
    return createError({ statusCode: 500, statusMessage: 'Workflow definition error', message: error.message, data: { code: error.code } })
  }
  if (error instanceof WorkflowError) {
    const mapped = STATUS_BY_CODE[error.code] ?? { statusCode: 500, statusMessage: 'Workflow error' }
    return createError({ ...mapped, message: error.message, data: { code: error.code } })
  }
  return error instanceof Error ? createError(error) : createError({ statusCode: 500, statusMessage: String(error) })
}

function requireParam(event: H3Event, name: string): string {
  const value = getRouterParam(event, name, { decode: true })
  if (!value) {
    throw createError({ statusCode: 400, statusMessage: `${name} required`, data: { code: `${name}_required` } })
  }
  return value
}

export function createWorkflowApp(service: InvoiceWorkflowService) {
  const log = getLogger()

  const app = createApp({
    onRequest(event) {
      const cid = getRequestHeader(event, 'x-correlation-id') || genCorrelationId()
      event.context.correlationId = cid
      event.context.startedAt = Date.now()
      setResponseHeader(event, 'x-correlation-id', cid)
      log.info('request_received', { cid, method: event.method, path: event.path })
    },
    onAfterResponse(event) {
      const startedAt = typeof event.context.startedAt === 'number' ? event.context.startedAt : Date.now()
      log.info('request_completed', {
        cid: event.context.correlationId,
        method: event.method,
        path: event.path,
        statusCode: event.node.res.statusCode,
        durationMs: Date.now() - startedAt
      })
    }
  })

  const router = createRouter()
  const handle = <T>(fn: (event: H3Event) => Promise<T> | T) =>
    defineEventHandler(async (event) => {
      try {
        return await fn(event)
      } catch (error) {
        throw toHttpError(error)
      }
    })

  router.get('/health', handle(() => ({ ok: true, service: 'workflow-server', timestamp: new Date().toISOString() })))

  router.post(
    '/api/v1/invoices',
    handle(async (event) => {
      const body: unknown = await readBody(event)
      return service.submit(body)
    })
  )

  router.get('/api/v1/reviews/pending', handle(() => service.listPendingReviews()))
  router.get('/api/v1/reviews/history', handle(() => service.getDecisionHistory()))
  router.get('/api/v1/reviews/:checkpointId', handle((event) => service.getReview(requireParam(event, 'checkpointId'))))

  router.post(
    '/api/v1/reviews/:checkpointId/decision',
    handle(async (event) => {
      const checkpointId = requireParam(event, 'checkpointId')
      const body: unknown = await readBody(event)
      const input = HumanDecisionInputSchema.parse(body)
      return service.submitDecision(checkpointId, input.decision, input.reviewerId, input.notes ?? null)
    })
  )

  router.get(
    '/api/v1/workflows/:workflowId/audit',
    handle(async (event) => {
      const workflowId = requireParam(event, 'workflowId')
      return { workflowId, auditLog: await service.getAuditLog(workflowId) }
    })
  )

  router.get('/api/v1/workflow/graph', handle(() => service.describeGraph()))
  router.get('/api/v1/tools/selections', handle(() => ({ selections: service.getSelectionHistory() })))

  app.use(router)
  return app
}
