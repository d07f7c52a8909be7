// PROGRAMMING errors are defects in the workflow definition and abort the run.
// STATE errors are legitimate outcomes the caller is expected to handle.
export type WorkflowErrorKind = 'PROGRAMMING' | 'STATE'

export type WorkflowErrorCode =
  | 'UNKNOWN_CAPABILITY'
  | 'EMPTY_CANDIDATE_POOL'
  | 'MISSING_PRECONDITION'
  | 'DUPLICATE_CHECKPOINT'
  | 'CHECKPOINT_NOT_FOUND'
  | 'ALREADY_RESOLVED'
  | 'WORKFLOW_NOT_FOUND'

export class WorkflowError extends Error {
  constructor(
    message: string,
    readonly code: WorkflowErrorCode,
    readonly kind: WorkflowErrorKind
  ) {
    super(message)
    this.name = 'WorkflowError'
  }
}

export class UnknownCapabilityError extends WorkflowError {
  constructor(readonly capability: string) {
    super(`Unknown capability: ${capability}`, 'UNKNOWN_CAPABILITY', 'PROGRAMMING')
    this.name = 'UnknownCapabilityError'
  }
}

export class EmptyCandidatePoolError extends WorkflowError {
  constructor(readonly capability: string) {
    super(`No available tools for capability ${capability}`, 'EMPTY_CANDIDATE_POOL', 'PROGRAMMING')
    this.name = 'EmptyCandidatePoolError'
  }
}

export class MissingPreconditionError extends WorkflowError {
  constructor(readonly stage: string, readonly field: string) {
    super(`Stage ${stage} requires state field "${field}"`, 'MISSING_PRECONDITION', 'PROGRAMMING')
    this.name = 'MissingPreconditionError'
  }
}

export class DuplicateCheckpointError extends WorkflowError {
  constructor(readonly checkpointId: string) {
    super(`Checkpoint ${checkpointId} already exists`, 'DUPLICATE_CHECKPOINT', 'STATE')
    this.name = 'DuplicateCheckpointError'
  }
}

export class CheckpointNotFoundError extends WorkflowError {
  constructor(readonly checkpointId: string) {
    super(`Checkpoint ${checkpointId} not found`, 'CHECKPOINT_NOT_FOUND', 'STATE')
    this.name = 'CheckpointNotFoundError'
  }
}

export class AlreadyResolvedError extends WorkflowError {
  constructor(readonly checkpointId: string) {
    super(`Checkpoint ${checkpointId} has already been resolved`, 'ALREADY_RESOLVED', 'STATE')
    this.name = 'AlreadyResolvedError'
  }
}

export class WorkflowNotFoundError extends WorkflowError {
  constructor(readonly workflowId: string) {
    super(`Workflow ${workflowId} not found`, 'WORKFLOW_NOT_FOUND', 'STATE')
    this.name = 'WorkflowNotFoundError'
  }
}

export function isProgrammingError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError && error.kind === 'PROGRAMMING'
}
