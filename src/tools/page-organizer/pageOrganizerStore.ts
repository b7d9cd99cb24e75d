import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import type {
  DocumentSource, ExportSink, OperationResult, PageEntry, PageHandle, PDFSource,
  RenderBackend, Size, SourceFile, Thumbnail,
} from '@/types/index.ts'
import { appStore } from '@/stores/appStore.ts'
import { createMupdfRenderBackend, createPdfExportSink, generateId, loadPDFFile } from '@/utils/pdf.ts'
import {
  errorMessage, ExportError, InvalidSelectionError, SourceOpenError,
} from './errors.ts'
import type { RenderError } from './errors.ts'
import { SourceRegistry } from './sourceRegistry.ts'
import { ThumbnailCache } from './thumbnailCache.ts'
import { ThumbnailPipeline } from './thumbnailPipeline.ts'
import type { AddFilesResult, CacheLimits } from './types.ts'
import { DEFAULT_EXPORT_NAME, MESSAGES } from './types.ts'

// ── State ───────────────────────────────────────────────────

export interface PageOrganizerState {
  pages: PageEntry[]
  selectedIds: ReadonlySet<string>
  isLoading: boolean
  lastResult: OperationResult | null

  // Import
  addFiles: (files: readonly SourceFile[]) => Promise<AddFilesResult>
  addSource: (source: PDFSource) => string[]

  // Structure
  deletePages: (ids: Iterable<string>) => number
  deleteSelected: () => boolean
  movePage: (fromId: string, toId: string) => void
  removePage: (id: string) => void
  reverseOrder: () => void
  clearAll: () => void

  // Selection
  selectPage: (id: string) => void
  deselectPage: (id: string) => void
  togglePageSelection: (id: string) => void
  selectAll: () => void
  clearSelection: () => void

  // Output
  exportDocument: (destination?: string) => Promise<boolean>
  dismissResult: () => void
  whenThumbnailsIdle: () => Promise<void>
}

export interface PageOrganizerOptions {
  documentSource?: DocumentSource
  renderBackend?: RenderBackend
  exportSink?: ExportSink
  batchSize?: number
  thumbnailSize?: Size
  cacheLimits?: Partial<CacheLimits>
  /** Receives every user-facing result; defaults to an app toast */
  notify?: (result: OperationResult) => void
  onRenderError?: (error: RenderError) => void
}

export interface PageOrganizer {
  store: StoreApi<PageOrganizerState>
  pipeline: ThumbnailPipeline
  cache: ThumbnailCache
  registry: SourceRegistry
}

// ── Selectors ───────────────────────────────────────────────

export const selectDocumentCount = (s: PageOrganizerState): number =>
  new Set(s.pages.map((p) => p.sourceId)).size

export const selectHasPages = (s: PageOrganizerState): boolean => s.pages.length > 0

export const selectSelectedCount = (s: PageOrganizerState): number => s.selectedIds.size

export const selectPageHandles = (s: PageOrganizerState): PageHandle[] =>
  s.pages.map((p) => p.page)

// ── Helpers ─────────────────────────────────────────────────

/** Renumber display indices 1..N, reusing entries that already match */
function reindex(pages: PageEntry[]): PageEntry[] {
  return pages.map((p, i) => p.displayIndex === i + 1 ? p : { ...p, displayIndex: i + 1 })
}

function notifyToast(result: OperationResult) {
  appStore.getState().addToast({ type: result.type, message: result.message })
}

// ── Factory ─────────────────────────────────────────────────

export function createPageOrganizer(options: PageOrganizerOptions = {}): PageOrganizer {
  const documentSource: DocumentSource = options.documentSource ?? { open: loadPDFFile }
  const renderBackend = options.renderBackend ?? createMupdfRenderBackend()
  const exportSink = options.exportSink ?? createPdfExportSink()
  const notify = options.notify ?? notifyToast

  const cache = new ThumbnailCache(options.cacheLimits)
  const registry = new SourceRegistry((sourceId) => renderBackend.release?.(sourceId))

  const publishThumbnail = (id: string, thumbnail: Thumbnail) => {
    const { pages } = store.getState()
    // The page may have been deleted while it rendered
    if (!pages.some((p) => p.id === id)) return
    store.setState({
      pages: pages.map((p) => p.id === id ? { ...p, thumbnail } : p),
    })
  }

  const pipeline = new ThumbnailPipeline({
    backend: renderBackend,
    cache,
    publish: publishThumbnail,
    batchSize: options.batchSize,
    targetSize: options.thumbnailSize,
    onError: options.onRenderError,
  })

  const store = createStore<PageOrganizerState>((set, get) => {
    // addFiles and exportDocument may overlap; loading until both finish
    let busy = 0
    const beginWork = () => {
      busy++
      set({ isLoading: true })
    }
    const endWork = () => {
      busy--
      set({ isLoading: busy > 0 })
    }

    const report = (result: OperationResult) => {
      set({ lastResult: result })
      notify(result)
    }

    /** Drop pages by id: cancel their renders, unselect, renumber, free unused sources */
    const removeEntries = (doomed: ReadonlySet<string>) => {
      for (const id of doomed) {
        pipeline.cancel(id)
      }
      const { pages, selectedIds } = get()
      const remaining = reindex(pages.filter((p) => !doomed.has(p.id)))
      const selected = new Set([...selectedIds].filter((id) => !doomed.has(id)))
      set({ pages: remaining, selectedIds: selected })
      registry.retainOnly(new Set(remaining.map((p) => p.sourceId)))
    }

    return {
      pages: [],
      selectedIds: new Set<string>(),
      isLoading: false,
      lastResult: null,

      addFiles: async (files) => {
        const result: AddFilesResult = { addedSources: 0, addedPages: 0, failures: [] }
        if (files.length === 0) return result

        beginWork()
        try {
          for (const file of files) {
            let source: PDFSource
            try {
              source = await documentSource.open(file)
            } catch (err) {
              // One bad file never stops the rest of the batch
              const error = new SourceOpenError(file.name, err)
              console.error(`[Page Organizer] ${error.message}`)
              result.failures.push({ fileName: file.name, message: errorMessage(err) })
              continue
            }
            const ids = get().addSource(source)
            result.addedSources++
            result.addedPages += ids.length
          }
        } finally {
          endWork()
        }

        if (result.addedSources > 0) {
          report({ type: 'success', message: MESSAGES.added(result.addedSources) })
        } else {
          report({ type: 'error', message: MESSAGES.noDocumentsOpened })
        }
        return result
      },

      addSource: (source) => {
        if (source.pages.length === 0) return []
        registry.register(source)

        const { pages } = get()
        const added: PageEntry[] = source.pages.map((page, i) => ({
          id: generateId(),
          sourceId: source.id,
          sourceLabel: source.name,
          originIndex: page.pageIndex,
          displayIndex: pages.length + i + 1,
          page,
        }))
        set({ pages: [...pages, ...added] })

        void pipeline.schedule(added.map((p) => ({ id: p.id, page: p.page })))
        return added.map((p) => p.id)
      },

      deletePages: (ids) => {
        const { pages } = get()
        const present = new Set(pages.map((p) => p.id))
        const doomed = new Set([...ids].filter((id) => present.has(id)))
        if (doomed.size === 0 || doomed.size >= pages.length) {
          throw new InvalidSelectionError(MESSAGES.invalidSelection)
        }
        removeEntries(doomed)
        return doomed.size
      },

      deleteSelected: () => {
        try {
          const count = get().deletePages(get().selectedIds)
          set({ selectedIds: new Set<string>() })
          report({ type: 'success', message: MESSAGES.deleted(count) })
          return true
        } catch (err) {
          if (!(err instanceof InvalidSelectionError)) throw err
          report({ type: 'error', message: err.message })
          return false
        }
      },

      movePage: (fromId, toId) => {
        const { pages } = get()
        const fromIdx = pages.findIndex((p) => p.id === fromId)
        const toIdx = pages.findIndex((p) => p.id === toId)
        if (fromIdx < 0 || toIdx < 0 || fromIdx === toIdx) return

        const next = [...pages]
        const [moved] = next.splice(fromIdx, 1)
        next.splice(toIdx, 0, moved)
        set({ pages: reindex(next) })
      },

      removePage: (id) => {
        if (!get().pages.some((p) => p.id === id)) return
        removeEntries(new Set([id]))
      },

      reverseOrder: () => {
        set((s) => ({ pages: reindex([...s.pages].reverse()) }))
      },

      clearAll: () => {
        pipeline.cancelAll()
        registry.clear()
        cache.clear()
        set({ pages: [], selectedIds: new Set<string>() })
      },

      selectPage: (id) => {
        const { pages, selectedIds } = get()
        if (selectedIds.has(id) || !pages.some((p) => p.id === id)) return
        set({ selectedIds: new Set([...selectedIds, id]) })
      },

      deselectPage: (id) => {
        const { selectedIds } = get()
        if (!selectedIds.has(id)) return
        set({ selectedIds: new Set([...selectedIds].filter((s) => s !== id)) })
      },

      togglePageSelection: (id) => {
        if (get().selectedIds.has(id)) {
          get().deselectPage(id)
        } else {
          get().selectPage(id)
        }
      },

      selectAll: () => set((s) => ({ selectedIds: new Set(s.pages.map((p) => p.id)) })),

      clearSelection: () => set({ selectedIds: new Set<string>() }),

      exportDocument: async (destination = DEFAULT_EXPORT_NAME) => {
        const handles = selectPageHandles(get())
        if (handles.length === 0) {
          report({ type: 'error', message: MESSAGES.nothingToExport })
          return false
        }

        beginWork()
        try {
          await exportSink.write(handles, destination)
          report({ type: 'success', message: MESSAGES.exported })
          return true
        } catch (err) {
          const error = new ExportError(err)
          console.error('[Page Organizer] Export failed:', error.message)
          report({ type: 'error', message: error.message })
          return false
        } finally {
          endWork()
        }
      },

      dismissResult: () => set({ lastResult: null }),

      whenThumbnailsIdle: () => pipeline.idle(),
    }
  })

  return { store, pipeline, cache, registry }
}
