import type { Paper, PaperAuthor, PaperSummary } from '@/lib/schemas/paper'

export interface CitationLink {
  source: string
  target: string
}

export interface BibliographyDocument {
  title: string
  papers: Paper[]
  /** paper → reference and citing paper → paper edges */
  links: CitationLink[]
  /** ids each query contributed to `papers` */
  queries: Record<string, string[]>
  /** `queries` plus the references and citations of those papers */
  queries_more: Record<string, string[]>
  authors: Record<string, string>
}

function collectAuthors(authors: PaperAuthor[] | null | undefined, into: Map<string, string>) {
  for (const author of authors ?? []) {
    if (author.authorId && author.name) {
      into.set(author.authorId, author.name)
    }
  }
}

function relatedIds(related: PaperSummary[] | null | undefined): string[] {
  const ids: string[] = []
  for (const entry of related ?? []) {
    if (entry.paperId) ids.push(entry.paperId)
  }
  return ids
}

export function buildBibliographyDocument(
  title: string,
  papers: Paper[],
  queryHits: ReadonlyMap<string, readonly string[]> = new Map()
): BibliographyDocument {
  const links: CitationLink[] = []
  const authors = new Map<string, string>()
  const byId = new Map<string, Paper>()

  for (const paper of papers) {
    byId.set(paper.paperId, paper)
    collectAuthors(paper.authors, authors)

    for (const ref of paper.references ?? []) {
      collectAuthors(ref.authors, authors)
      if (ref.paperId) links.push({ source: paper.paperId, target: ref.paperId })
    }
    for (const cite of paper.citations ?? []) {
      collectAuthors(cite.authors, authors)
      if (cite.paperId) links.push({ source: cite.paperId, target: paper.paperId })
    }
  }

  // Query text is user input; a `__proto__` query must stay an own key
  const queries: [string, string[]][] = []
  const queriesMore: [string, string[]][] = []

  for (const [query, hits] of queryHits) {
    const included = hits.filter(id => byId.has(id))
    queries.push([query, included])

    const more = new Set<string>()
    for (const id of included) {
      const paper = byId.get(id)
      if (!paper) continue
      for (const relatedId of [...relatedIds(paper.references), ...relatedIds(paper.citations)]) {
        more.add(relatedId)
      }
      more.add(id)
    }
    queriesMore.push([query, Array.from(more)])
  }

  return {
    title,
    papers,
    links,
    queries: Object.fromEntries(queries),
    queries_more: Object.fromEntries(queriesMore),
    authors: Object.fromEntries(authors)
  }
}

export function serializeDocument(document: BibliographyDocument): string {
  return JSON.stringify(document, null, 4)
}
