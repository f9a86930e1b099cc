import 'server-only'
import { getServerEnv } from '@/lib/config'
import { DocumentStore } from '@/lib/jobs/document-store'
import { JobOrchestrator } from '@/lib/jobs/orchestrator'
import { ChannelRegistry } from '@/lib/progress/channel-registry'
import { ProgressNotifier } from '@/lib/progress/notifier'
import { createSemanticScholarSource } from '@/lib/services/semantic-scholar'

export interface Runtime {
  registry: ChannelRegistry
  store: DocumentStore
  orchestrator: JobOrchestrator
}

// Route handlers can be bundled separately; pin the shared state to the process
declare global {
  // eslint-disable-next-line no-var
  var __bibliographyRuntime: Runtime | undefined
}

function createRuntime(): Runtime {
  const env = getServerEnv()
  const registry = new ChannelRegistry()
  const store = new DocumentStore({ maxSize: env.DOCUMENT_CACHE_SIZE, maxAgeMs: env.DOCUMENT_TTL_MS })
  const orchestrator = new JobOrchestrator({
    source: createSemanticScholarSource({
      apiKey: env.SEMANTIC_SCHOLAR_API_KEY,
      baseUrl: env.SEMANTIC_SCHOLAR_API_URL,
      timeoutMs: env.PAPER_SOURCE_TIMEOUT_MS
    }),
    notifier: new ProgressNotifier(registry),
    store,
    settings: {
      pageSize: env.PAGE_SIZE,
      pageDelayMs: env.PAGE_DELAY_MS,
      retry: {
        retries: env.PAPER_SOURCE_MAX_RETRIES,
        factor: 2,
        minTimeout: env.PAPER_SOURCE_RETRY_DELAY_MS,
        maxTimeout: env.PAPER_SOURCE_MAX_RETRY_DELAY_MS
      }
    }
  })
  return { registry, store, orchestrator }
}

export function getRuntime(): Runtime {
  const runtime = globalThis.__bibliographyRuntime ?? createRuntime()
  globalThis.__bibliographyRuntime = runtime
  return runtime
}

export function resetRuntime(): void {
  globalThis.__bibliographyRuntime?.registry.clear()
  globalThis.__bibliographyRuntime = undefined
}
