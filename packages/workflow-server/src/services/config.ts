import { z } from 'zod'

const EnvSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.9),
  TWO_WAY_TOLERANCE_PCT: z.coerce.number().min(0).max(100).default(5),
  AUTO_APPROVE_LIMIT: z.coerce.number().positive().default(5000),
  REVIEW_BASE_URL: z.string().url().default('http://localhost:3001/review'),
  // Falls back to the bundled fixture directory
  ERP_DIRECTORY_PATH: z.string().min(1).optional(),
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info')
})

export type Env = z.infer<typeof EnvSchema>

export type ServerConfig = {
  databaseUrl: string | null
  matchThreshold: number
  twoWayTolerancePct: number
  autoApproveLimit: number
  reviewBaseUrl: string
  erpDirectoryPath: string | null
  port: number
  logLevel: Env['LOG_LEVEL']
}

const emptyToUndefined = (value: string | undefined) => (value && value.trim().length ? value : undefined)

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse({
    DATABASE_URL: emptyToUndefined(env.DATABASE_URL),
    MATCH_THRESHOLD: emptyToUndefined(env.MATCH_THRESHOLD),
    TWO_WAY_TOLERANCE_PCT: emptyToUndefined(env.TWO_WAY_TOLERANCE_PCT),
    AUTO_APPROVE_LIMIT: emptyToUndefined(env.AUTO_APPROVE_LIMIT),
    REVIEW_BASE_URL: emptyToUndefined(env.REVIEW_BASE_URL),
    ERP_DIRECTORY_PATH: emptyToUndefined(env.ERP_DIRECTORY_PATH),
    PORT: emptyToUndefined(env.PORT),
    LOG_LEVEL: emptyToUndefined(env.LOG_LEVEL)
  })
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${parsed.error.message}`)
  }
  const data = parsed.data
  return {
    databaseUrl: data.DATABASE_URL ?? null,
    matchThreshold: data.MATCH_THRESHOLD,
    twoWayTolerancePct: data.TWO_WAY_TOLERANCE_PCT,
    autoApproveLimit: data.AUTO_APPROVE_LIMIT,
    reviewBaseUrl: data.REVIEW_BASE_URL.replace(/\/+$/, ''),
    erpDirectoryPath: data.ERP_DIRECTORY_PATH ?? null,
    port: data.PORT,
    logLevel: data.LOG_LEVEL
  }
}

let cachedConfig: ServerConfig | null = null

export function getServerConfig(): ServerConfig {
  if (!cachedConfig) cachedConfig = loadServerConfig()
  return cachedConfig
}
