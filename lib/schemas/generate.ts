import { z } from 'zod'

export const MAX_TOTAL_PAPERS = 10_000
/** SSE event name carrying one progress line, `{ message }` */
export const LOG_MESSAGE_EVENT = 'log_message'

export const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/

const blankToUndefined = (value: unknown) => (value === '' || value === null ? undefined : value)

export const SessionIdSchema = z.string().regex(SESSION_ID_PATTERN, 'sid must be 1-128 letters, digits, _ or -')

/**
 * Form fields of POST /generate_json (plus `sid` from the query string)
 */
export const GenerateRequestSchema = z.object({
  queries: z.string({ required_error: 'queries is required' })
    .transform(value => value.split(',').map(q => q.trim()).filter(q => q.length > 0))
    .pipe(z.array(z.string()).min(1, 'at least one non-empty query is required')),
  total_papers: z.preprocess(
    blankToUndefined,
    z.coerce.number({ required_error: 'total_papers is required', invalid_type_error: 'total_papers must be a number' })
      .int('total_papers must be an integer')
      .positive('total_papers must be a positive integer')
      .max(MAX_TOTAL_PAPERS, `total_papers must be at most ${MAX_TOTAL_PAPERS}`)
  ),
  title: z.string({ required_error: 'title is required' }).trim().min(1, 'title is required'),
  sid: z.preprocess(blankToUndefined, SessionIdSchema.optional())
})

export interface RawGenerateRequest {
  queries?: string
  total_papers?: string | number
  title?: string
  sid?: string
}

export type GenerateRequest = z.output<typeof GenerateRequestSchema>

/**
 * Body of the /generate_json response as the browser reads it
 */
export const GenerateResponseSchema = z.union([
  z.object({ error: z.string(), code: z.string().optional() }),
  z.object({ json_data: z.string(), filename: z.string() })
])

export type GenerateResponse = z.infer<typeof GenerateResponseSchema>
