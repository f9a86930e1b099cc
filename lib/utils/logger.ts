/**
 * Structured logging for the bibliography pipeline
 */

import pino from 'pino'

interface SearchMetrics {
  query: string
  duration_ms: number
  requests: number
  results_count: number
  added_count: number
  retry_count: number
  failed: boolean
  error?: string
}

interface JobMetrics {
  session_id?: string
  title: string
  queries: number
  requested: number
  papers: number
  failed_queries: number
  duration_ms: number
}

const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => {
      return { level: label }
    }
  },
  timestamp: pino.stdTimeFunctions.isoTime
})

export const debug = logger.debug.bind(logger)
export const info = logger.info.bind(logger)
export const warn = logger.warn.bind(logger)

export const logSearchMetrics = (metrics: SearchMetrics) => {
  const level = metrics.failed ? 'warn' : 'info'
  logger[level]({
    type: 'search_metrics',
    ...metrics
  }, `Search "${metrics.query}" ${metrics.failed ? 'failed' : 'completed'} with ${metrics.results_count} results`)
}

export const logJobMetrics = (metrics: JobMetrics) => {
  logger.info({
    type: 'job_metrics',
    ...metrics
  }, `Job "${metrics.title}" produced ${metrics.papers}/${metrics.requested} papers in ${metrics.duration_ms}ms`)
}

export const createTimer = () => {
  const start = Date.now()
  return {
    end: () => Date.now() - start
  }
}

export const logError = (err: Error, context: Record<string, unknown> = {}) => {
  logger.error({
    type: 'error',
    error_name: err.name,
    error_message: err.message,
    error_stack: err.stack,
    ...context
  }, `Error: ${err.message}`)
}

export type { SearchMetrics, JobMetrics }

export default logger
