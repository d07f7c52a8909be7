import type { CapabilityName } from '@ledgerline/shared'
import type { CapabilityTools, DbTool, StorageTool, ToolBackend, ToolFactories } from './types'

function createStorageTool(toolName: string): StorageTool {
  return {
    async persistRawInvoice(invoice) {
      return {
        rawId: `RAW_${invoice.invoiceId}`,
        location: `${toolName}://invoices/raw/${invoice.invoiceId}.json`
      }
    }
  }
}

// Records are acknowledged, not retained
function createDbTool(toolName: string): DbTool {
  return {
    async saveRecord(collection, id) {
      return { recordId: `${toolName}:${collection}:${id}` }
    }
  }
}

// Tools that run inside this process
export class LocalToolBackend implements ToolBackend {
  readonly kind = 'LOCAL' as const
  private readonly factories: ToolFactories

  constructor() {
    this.factories = {
      storage: (toolName) => createStorageTool(toolName),
      db: (toolName) => createDbTool(toolName)
    }
  }

  bind<C extends CapabilityName>(capability: C, toolName: string): CapabilityTools[C] | null {
    const factory = this.factories[capability]
    return factory ? factory(toolName) : null
  }
}
