import { z } from 'zod'

/**
 * Semantic Scholar records are passed through as returned; only the fields the
 * bibliography graph reads are typed; everything else is kept by `passthrough`.
 */
export const PaperAuthorSchema = z.object({
  authorId: z.string().nullable().optional(),
  name: z.string().nullable().optional()
}).passthrough()

export const PaperSummarySchema = z.object({
  paperId: z.string().nullable(),
  title: z.string().nullable().optional(),
  url: z.string().nullable().optional(),
  citationCount: z.number().nullable().optional(),
  publicationDate: z.string().nullable().optional(),
  authors: z.array(PaperAuthorSchema).nullable().optional()
}).passthrough()

export const PaperSchema = PaperSummarySchema.extend({
  paperId: z.string().min(1),
  references: z.array(PaperSummarySchema).nullable().optional(),
  citations: z.array(PaperSummarySchema).nullable().optional()
})

/**
 * `/paper/search` envelope. Records are validated one by one so a single odd
 * entry doesn't sink the page.
 */
export const PaperSearchResponseSchema = z.object({
  total: z.number().int().nonnegative().optional(),
  offset: z.number().int().nonnegative().optional(),
  next: z.number().int().nonnegative().optional(),
  data: z.array(z.unknown()).default([])
})

export type PaperAuthor = z.infer<typeof PaperAuthorSchema>
export type PaperSummary = z.infer<typeof PaperSummarySchema>
export type Paper = z.infer<typeof PaperSchema>
export type PaperSearchResponse = z.infer<typeof PaperSearchResponseSchema>
