import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { ErpDirectorySchema, type ErpDirectory } from '@ledgerline/shared'

export const DEFAULT_ERP_DIRECTORY_PATH = fileURLToPath(new URL('./fixtures/erp-directory.json', import.meta.url))

export function loadErpDirectory(path: string = DEFAULT_ERP_DIRECTORY_PATH): ErpDirectory {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'))
  const parsed = ErpDirectorySchema.safeParse(raw)
  if (!parsed.success) {
    throw new Error(`Invalid ERP directory at ${path}: ${parsed.error.message}`)
  }
  return parsed.data
}
