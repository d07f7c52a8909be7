import { WorkflowStateSchema, type WorkflowState } from '@ledgerline/shared'
import { eq, getDb, workflowRuns, type Database } from '@ledgerline/db'

export interface WorkflowRunRepository {
  save(state: WorkflowState): Promise<void>
  get(workflowId: string): Promise<WorkflowState | null>
}

export class DatabaseWorkflowRunRepository implements WorkflowRunRepository {
  constructor(private readonly db: Database = getDb()) {}

  async save(state: WorkflowState): Promise<void> {
    const now = new Date()
    const snapshot = structuredClone(state)
    await this.db
      .insert(workflowRuns)
      .values({
        workflowId: state.workflowId,
        invoiceId: state.invoiceId,
        status: state.status,
        stageCursor: state.stageCursor,
        stateJson: snapshot,
        createdAt: now,
        updatedAt: now
      })
      .onConflictDoUpdate({
        target: workflowRuns.workflowId,
        set: {
          status: state.status,
          stageCursor: state.stageCursor,
          stateJson: snapshot,
          updatedAt: now
        }
      })
  }

  async get(workflowId: string): Promise<WorkflowState | null> {
    const [row] = await this.db
      .select()
      .from(workflowRuns)
      .where(eq(workflowRuns.workflowId, workflowId))
      .limit(1)
    return row ? WorkflowStateSchema.parse(row.stateJson) : null
  }
}

export class InMemoryWorkflowRunRepository implements WorkflowRunRepository {
  private readonly runs = new Map<string, WorkflowState>()

  async save(state: WorkflowState): Promise<void> {
    this.runs.set(state.workflowId, structuredClone(state))
  }

  async get(workflowId: string): Promise<WorkflowState | null> {
    const state = this.runs.get(workflowId)
    return state ? structuredClone(state) : null
  }
}

let activeRepository: WorkflowRunRepository | null = null

export function getWorkflowRunRepository(): WorkflowRunRepository {
  if (!activeRepository) {
    activeRepository = process.env.DATABASE_URL
      ? new DatabaseWorkflowRunRepository()
      : new InMemoryWorkflowRunRepository()
  }
  return activeRepository
}

export function setWorkflowRunRepository(repo: WorkflowRunRepository) {
  activeRepository = repo
}

export function resetWorkflowRunRepository() {
  activeRepository = new InMemoryWorkflowRunRepository()
}
