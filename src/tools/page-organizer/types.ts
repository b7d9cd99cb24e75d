import type { PageHandle, Size } from '@/types/index.ts'

// ── Thumbnails ──────────────────────────────────────────────

/** Box every page thumbnail is scaled to fit (PDF points → px at 1x) */
export const THUMBNAIL_SIZE: Size = { width: 140, height: 180 }

/** Renders started together; the next batch waits for all of them */
export const THUMBNAIL_BATCH_SIZE = 5

export interface CacheLimits {
  maxEntries: number
  maxCost: number              // bytes
}

export const THUMBNAIL_CACHE_LIMITS: CacheLimits = {
  maxEntries: 100,
  maxCost: 50 * 1024 * 1024,
}

export interface CacheStats {
  entries: number
  cost: number
  hits: number
  misses: number
}

export interface RenderRequest {
  id: string                   // page entry id
  page: PageHandle
}

// ── Export ──────────────────────────────────────────────────

export const DEFAULT_EXPORT_NAME = 'merged_document.pdf'

// ── Import ──────────────────────────────────────────────────

export interface SourceOpenFailure {
  fileName: string
  message: string
}

export interface AddFilesResult {
  addedSources: number
  addedPages: number
  failures: SourceOpenFailure[]
}

// ── Messages ────────────────────────────────────────────────

export const MESSAGES = {
  invalidSelection: 'Cannot delete all pages or no pages selected.',
  nothingToExport: 'No pages to export.',
  noDocumentsOpened: 'None of the selected files could be opened as a PDF.',
  exported: 'PDF exported successfully!',
  added: (count: number) => `Added ${count} document(s)`,
  deleted: (count: number) => `Successfully deleted ${count} page(s)!`,
} as const
