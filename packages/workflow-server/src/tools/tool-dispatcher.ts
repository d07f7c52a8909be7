import type { CapabilityName, CapabilitySelection, ErpDirectory, ToolBackendKind } from '@ledgerline/shared'
import { getLogger } from '../services/logger'
import { loadErpDirectory } from './erp-directory'
import { ExternalToolBackend } from './external-backend'
import { LocalToolBackend } from './local-backend'
import type { CapabilityTools, ToolBackend } from './types'

export class ToolDispatcher {
  private readonly backends: Record<ToolBackendKind, ToolBackend>

  constructor(backends?: Partial<Record<ToolBackendKind, ToolBackend>>, directory?: ErpDirectory) {
    this.backends = {
      LOCAL: backends?.LOCAL ?? new LocalToolBackend(),
      EXTERNAL: backends?.EXTERNAL ?? new ExternalToolBackend(directory ?? loadErpDirectory())
    }
  }

  dispatch<C extends CapabilityName>(capability: C, selection: CapabilitySelection): CapabilityTools[C] {
    if (selection.capability !== capability) {
      throw new Error(`Selection ${selection.selectionKey} was made for ${selection.capability}, not ${capability}`)
    }
    const backend = this.backends[selection.backend]
    const tool = backend.bind(capability, selection.chosen)
    if (!tool) {
      throw new Error(`${selection.backend} backend has no adapter for capability ${capability}`)
    }
    getLogger().debug('tool_dispatched', {
      capability,
      tool: selection.chosen,
      backend: selection.backend,
      stage: selection.stage
    })
    return tool
  }
}
