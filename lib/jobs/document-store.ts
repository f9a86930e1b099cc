import QuickLRU from 'quick-lru'

export interface GeneratedDocument {
  filename: string
  content: string
  paperCount: number
  createdAt: number
}

export interface DocumentStoreOptions {
  maxSize: number
  maxAgeMs: number
}

/**
 * Generated bibliographies waiting to be downloaded, keyed by filename.
 * Entries expire after `maxAgeMs`; a new job with the same title replaces the
 * previous file.
 */
export class DocumentStore {
  private readonly cache: QuickLRU<string, GeneratedDocument>

  constructor(options: DocumentStoreOptions) {
    this.cache = new QuickLRU({ maxSize: options.maxSize, maxAge: options.maxAgeMs })
  }

  get size(): number {
    return this.cache.size
  }

  put(document: GeneratedDocument): void {
    this.cache.set(document.filename, document)
  }

  get(filename: string): GeneratedDocument | undefined {
    return this.cache.get(filename)
  }
}
