/**
 * Next.js startup hook: refuse to serve without a usable configuration.
 */
export async function register() {
  if (process.env.NEXT_RUNTIME !== 'nodejs') return

  const { getServerEnv } = await import('@/lib/config')
  const { info } = await import('@/lib/utils/logger')
  const env = getServerEnv()
  info({ api_url: env.SEMANTIC_SCHOLAR_API_URL, page_size: env.PAGE_SIZE }, 'Configuration loaded')
}
