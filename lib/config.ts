import 'server-only'
import z from 'zod'

const DEFAULT_API_URL = 'https://api.semanticscholar.org/graph/v1'

// Server-only env (do not expose to client)
const serverSchema = z.object({
  SEMANTIC_SCHOLAR_API_KEY: z.string().min(1, 'SEMANTIC_SCHOLAR_API_KEY is required'),
  SEMANTIC_SCHOLAR_API_URL: z.string().url().default(DEFAULT_API_URL),
  PAPER_SOURCE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  PAPER_SOURCE_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  PAPER_SOURCE_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2_000),
  PAPER_SOURCE_MAX_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(10_000),
  PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(100),
  PAGE_DELAY_MS: z.coerce.number().int().min(0).default(1_000),
  DOCUMENT_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  DOCUMENT_CACHE_SIZE: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
})

export type ServerEnv = z.infer<typeof serverSchema>

export function parseEnv(env: Partial<NodeJS.ProcessEnv>): ServerEnv {
  const parsed = serverSchema.safeParse(env)
  if (!parsed.success) {
    const formatted = parsed.error.issues
      .map(i => `${i.path.join('.')}: ${i.message}`)
      .join('; ')
    throw new Error(`Invalid environment configuration: ${formatted}`)
  }
  return parsed.data
}

let cached: ServerEnv | null = null

/**
 * Parsed once per process. Called from `register()` in instrumentation.ts so
 * a missing API key stops the server at startup.
 */
export function getServerEnv(): ServerEnv {
  if (!cached) {
    cached = parseEnv(process.env)
  }
  return cached
}

export function resetServerEnv(): void {
  cached = null
}
