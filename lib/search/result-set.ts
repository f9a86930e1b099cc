import type { Paper } from '@/lib/schemas/paper'

export type AddOutcome = 'added' | 'duplicate' | 'full'

/**
 * Papers keyed by `paperId` in first-seen order, never holding more than
 * `capacity` entries.
 */
export class ResultSet {
  private readonly papers = new Map<string, Paper>()

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`ResultSet capacity must be a positive integer, got ${capacity}`)
    }
  }

  get size(): number {
    return this.papers.size
  }

  get isFull(): boolean {
    return this.papers.size >= this.capacity
  }

  add(paper: Paper): AddOutcome {
    if (this.papers.has(paper.paperId)) return 'duplicate'
    if (this.isFull) return 'full'
    this.papers.set(paper.paperId, paper)
    return 'added'
  }

  toArray(): Paper[] {
    return Array.from(this.papers.values())
  }
}
