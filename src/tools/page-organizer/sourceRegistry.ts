import type { PDFSource } from '@/types/index.ts'

/**
 * Opened source documents by id. A source stays registered while at least
 * one page entry refers to it.
 */
export class SourceRegistry {
  private readonly sources = new Map<string, PDFSource>()

  constructor(private readonly onRelease?: (sourceId: string) => void) {}

  register(source: PDFSource): string {
    this.sources.set(source.id, source)
    return source.id
  }

  lookup(sourceId: string): PDFSource | undefined {
    return this.sources.get(sourceId)
  }

  release(sourceId: string): boolean {
    if (!this.sources.delete(sourceId)) return false
    this.onRelease?.(sourceId)
    return true
  }

  /** Release every source not in `activeIds`; returns the released ids */
  retainOnly(activeIds: ReadonlySet<string>): string[] {
    const released: string[] = []
    for (const sourceId of [...this.sources.keys()]) {
      if (!activeIds.has(sourceId) && this.release(sourceId)) {
        released.push(sourceId)
      }
    }
    return released
  }

  clear(): void {
    for (const sourceId of [...this.sources.keys()]) {
      this.release(sourceId)
    }
  }

  get size(): number {
    return this.sources.size
  }
}
