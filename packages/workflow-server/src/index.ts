export * from './services/errors'
export { getLogger, genCorrelationId } from './services/logger'
export { loadServerConfig, getServerConfig, type ServerConfig } from './services/config'
export { CapabilityRouter, scoreTool, resolveWeights, type SelectionContext, type SelectionSink } from './services/capability-router'
export { SelectionHistory, getSelectionHistory, resetSelectionHistory } from './services/selection-history'
export {
  DatabaseCheckpointStore,
  InMemoryCheckpointStore,
  getCheckpointStore,
  setCheckpointStore,
  resetCheckpointStore,
  type CheckpointStore
} from './services/checkpoint-store'
export {
  DatabaseWorkflowRunRepository,
  InMemoryWorkflowRunRepository,
  getWorkflowRunRepository,
  setWorkflowRunRepository,
  resetWorkflowRunRepository,
  type WorkflowRunRepository
} from './services/workflow-run-repository'
export { WorkflowOrchestrator, BRANCH_TRANSITIONS, type WorkflowRunResult } from './services/workflow-orchestrator'
export { InvoiceWorkflowService, type WorkflowGraph } from './services/invoice-workflow-service'
export { createWorkflowApp } from './server/app'
export { ToolDispatcher } from './tools/tool-dispatcher'
export { CAPABILITY_CATALOG } from './capabilities/catalog'
export { createInvoiceStageRegistry } from './workflow/stages'
export { StageRegistry, type StageDefinition, type StageContext, type WorkflowSettings } from './workflow/stage-registry'
export { reduceState, createInitialState, type StateUpdate } from './workflow/state'
