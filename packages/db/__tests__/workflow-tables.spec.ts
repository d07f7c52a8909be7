import { describe, it, expect } from 'vitest'
import { getTableConfig } from 'drizzle-orm/pg-core'
import { humanReviewQueue, workflowCheckpoints, workflowRuns } from '../src/schema'

describe('workflow persistence schema', () => {
  it('stores checkpoint decisions in snake_case columns', () => {
    expect(workflowCheckpoints.checkpointId.name).toBe('checkpoint_id')
    expect(workflowCheckpoints.stateJson.name).toBe('state_json')
    expect(workflowCheckpoints.pausedReason.name).toBe('paused_reason')
    expect(workflowCheckpoints.decisionNotes.name).toBe('decision_notes')
    expect(workflowCheckpoints.resolvedAt.name).toBe('resolved_at')
  })

  it('defaults checkpoint and queue status to PENDING', () => {
    expect(workflowCheckpoints.status.default).toBe('PENDING')
    expect(humanReviewQueue.status.default).toBe('PENDING')
    expect(workflowRuns.status.default).toBe('RUNNING')
  })

  it('links review queue rows to their checkpoint', () => {
    const config = getTableConfig(humanReviewQueue)
    expect(config.name).toBe('human_review_queue')
    expect(config.foreignKeys).toHaveLength(1)
    expect(humanReviewQueue.reasonForHold.name).toBe('reason_for_hold')
  })

  it('indexes pending checkpoints by status', () => {
    const config = getTableConfig(workflowCheckpoints)
    expect(config.indexes.map((idx) => idx.config.name)).toEqual([
      'workflow_checkpoints_status_idx',
      'workflow_checkpoints_workflow_idx'
    ])
  })
})
