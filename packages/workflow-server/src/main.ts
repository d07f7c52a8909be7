import 'dotenv/config'
import { createServer } from 'node:http'
import { toNodeListener } from 'h3'
import { closeDb } from '@ledgerline/db'
import { createWorkflowApp } from './server/app'
import { getServerConfig } from './services/config'
import { InvoiceWorkflowService } from './services/invoice-workflow-service'
import { getLogger } from './services/logger'
import { loadErpDirectory } from './tools/erp-directory'
import { ToolDispatcher } from './tools/tool-dispatcher'

const config = getServerConfig()
const log = getLogger()

const directory = config.erpDirectoryPath ? loadErpDirectory(config.erpDirectoryPath) : loadErpDirectory()
const service = new InvoiceWorkflowService(
  {
    matchThreshold: config.matchThreshold,
    twoWayTolerancePct: config.twoWayTolerancePct,
    autoApproveLimit: config.autoApproveLimit,
    reviewBaseUrl: config.reviewBaseUrl
  },
  { dispatcher: new ToolDispatcher(undefined, directory) }
)
const server = createServer(toNodeListener(createWorkflowApp(service)))

server.listen(config.port, () => {
  log.info('server_listening', {
    port: config.port,
    durable: Boolean(config.databaseUrl),
    matchThreshold: config.matchThreshold
  })
})

function shutdown(signal: string) {
  log.info('server_shutdown', { signal })
  server.close(() => {
    closeDb().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error('db_close_failed', { error: error instanceof Error ? error.message : String(error) })
        process.exit(1)
      }
    )
  })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
