export { eq, and, desc } from 'drizzle-orm'
export { getDb, getPool, closeDb } from './client'
export type { Database } from './client'
export * from './schema'
