import type { Config } from 'drizzle-kit'
import { config as loadEnv } from 'dotenv'

for (const filename of ['.env', '.env.local']) {
  loadEnv({ path: filename, override: true })
}

export default {
  schema: './packages/db/src/schema.ts',
  out: './packages/db/drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env.DATABASE_URL || ''
  }
} satisfies Config
