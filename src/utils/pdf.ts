/**
 * PDF utilities for the page organizer.
 * Uses pdf-lib for opening and merging, and mupdf (WASM) for rasterizing
 * thumbnails. Works on Uint8Arrays; only the export sink touches the disk.
 */

import { randomUUID } from 'node:crypto'
import { PDFDocument } from 'pdf-lib'
import type * as MuPDF from 'mupdf'
import type {
  ExportSink, PageHandle, PDFSource, RenderBackend, Size, SourceFile, Thumbnail,
} from '@/types/index.ts'
import { hasExtension, stripExtension } from '@/utils/fileReader.ts'
import { saveBytes } from '@/utils/save.ts'

export function generateId(): string {
  return randomUUID()
}

/**
 * Open a picked file as a PDF source.
 * Throws if the file is not a PDF or cannot be parsed.
 */
export async function loadPDFFile(file: SourceFile): Promise<PDFSource> {
  if (!hasExtension(file.name, ['pdf'])) {
    throw new Error('Not a PDF file')
  }

  const data = await file.read()
  if (data.byteLength === 0) {
    throw new Error('File is empty')
  }

  const doc = await PDFDocument.load(data)

  const source: PDFSource = {
    id: generateId(),
    name: stripExtension(file.name),
    data,
    pageCount: doc.getPageCount(),
    pages: [],
  }

  source.pages = doc.getPages().map((page, pageIndex) => {
    const { width, height } = page.getSize()
    // Quarter-turned pages are displayed with swapped sides
    const sideways = Math.abs(page.getRotation().angle) % 180 === 90
    return {
      source,
      pageIndex,
      width: sideways ? height : width,
      height: sideways ? width : height,
    }
  })

  return source
}

/** Scale that fits a page box inside the target box, aspect ratio kept */
export function fitScale(page: Size, target: Size): number {
  if (page.width <= 0 || page.height <= 0) return 1
  return Math.min(target.width / page.width, target.height / page.height)
}

// ============================================
// Thumbnails
// ============================================

// Simple LRU cache for opened mupdf documents (max 10)
interface CachedDoc {
  doc: MuPDF.Document
  lastAccess: number
}

let mupdfModule: Promise<typeof MuPDF> | null = null

/** mupdf instantiates its WASM module on import, so load it on first use */
function loadMupdf(): Promise<typeof MuPDF> {
  mupdfModule ??= import('mupdf')
  return mupdfModule
}

export interface MupdfRenderBackend extends RenderBackend {
  release: (sourceId: string) => void
  /** Number of source documents currently held open */
  openDocumentCount: () => number
}

function renderPage(mupdf: typeof MuPDF, doc: MuPDF.Document, page: PageHandle, target: Size): Thumbnail {
  if (page.pageIndex < 0 || page.pageIndex >= doc.countPages()) {
    throw new Error(`Invalid page index ${page.pageIndex}`)
  }

  const pdfPage = doc.loadPage(page.pageIndex)
  const bounds = pdfPage.getBounds()
  const pageWidth = bounds[2] - bounds[0]
  const pageHeight = bounds[3] - bounds[1]
  const scale = fitScale({ width: pageWidth, height: pageHeight }, target)

  const width = Math.max(1, Math.floor(pageWidth * scale))
  const height = Math.max(1, Math.floor(pageHeight * scale))

  const pixmap = new mupdf.Pixmap(mupdf.ColorSpace.DeviceRGB, [0, 0, width, height], false)
  pixmap.clear(255)
  const device = new mupdf.DrawDevice(mupdf.Matrix.identity, pixmap)

  // Move the page origin to (0,0) before scaling into the pixmap
  const matrix = mupdf.Matrix.concat(
    mupdf.Matrix.translate(-bounds[0], -bounds[1]),
    mupdf.Matrix.scale(scale, scale),
  )

  try {
    pdfPage.run(device, matrix)
    device.close()
    return {
      width: pixmap.getWidth(),
      height: pixmap.getHeight(),
      mimeType: 'image/png',
      data: pixmap.asPNG(),
    }
  } finally {
    device.destroy()
    pixmap.destroy()
    pdfPage.destroy()
  }
}

/**
 * Render backend rasterizing pages with mupdf on a white background.
 * Opened documents are kept per source until released or evicted.
 */
export function createMupdfRenderBackend(maxDocuments: number = 10): MupdfRenderBackend {
  const docCache = new Map<string, CachedDoc>()
  // Bumped on every release, so a render that straddled one can tell
  const releases = new Map<string, number>()
  let clock = 0

  function evictOldest() {
    if (docCache.size <= maxDocuments) return
    let oldestKey: string | null = null
    let oldestTime = Infinity
    for (const [key, val] of docCache) {
      if (val.lastAccess < oldestTime) {
        oldestTime = val.lastAccess
        oldestKey = key
      }
    }
    if (oldestKey) {
      docCache.get(oldestKey)?.doc.destroy()
      docCache.delete(oldestKey)
    }
  }

  function getCachedDoc(mupdf: typeof MuPDF, source: PDFSource): MuPDF.Document {
    const cached = docCache.get(source.id)
    if (cached) {
      cached.lastAccess = ++clock
      return cached.doc
    }

    const doc = mupdf.Document.openDocument(source.data, 'application/pdf')
    docCache.set(source.id, { doc, lastAccess: ++clock })
    evictOldest()
    return doc
  }

  return {
    async render(page: PageHandle, target: Size): Promise<Thumbnail> {
      const sourceId = page.source.id
      const generation = releases.get(sourceId) ?? 0
      const mupdf = await loadMupdf()

      if ((releases.get(sourceId) ?? 0) === generation) {
        return renderPage(mupdf, getCachedDoc(mupdf, page.source), page, target)
      }

      // Released while mupdf was loading: render without keeping the document
      const doc = mupdf.Document.openDocument(page.source.data, 'application/pdf')
      try {
        return renderPage(mupdf, doc, page, target)
      } finally {
        doc.destroy()
      }
    },

    release(sourceId: string): void {
      releases.set(sourceId, (releases.get(sourceId) ?? 0) + 1)
      const cached = docCache.get(sourceId)
      if (cached) {
        cached.doc.destroy()
        docCache.delete(sourceId)
      }
    },

    openDocumentCount: () => docCache.size,
  }
}

// ============================================
// Merge
// ============================================

/**
 * Merge pages from multiple PDFs in a custom order.
 * Each handle names a source and a single page index.
 */
export async function mergePDFPages(
  pages: readonly PageHandle[],
  onProgress?: (current: number, total: number) => void,
): Promise<Uint8Array> {
  const mergedPdf = await PDFDocument.create()
  // Parse each source once, however many of its pages are used
  const pdfCache = new Map<string, PDFDocument>()

  for (let i = 0; i < pages.length; i++) {
    const { source, pageIndex } = pages[i]

    let sourcePdf = pdfCache.get(source.id)
    if (!sourcePdf) {
      sourcePdf = await PDFDocument.load(source.data)
      pdfCache.set(source.id, sourcePdf)
    }

    const [copiedPage] = await mergedPdf.copyPages(sourcePdf, [pageIndex])
    mergedPdf.addPage(copiedPage)

    onProgress?.(i + 1, pages.length)
  }

  return mergedPdf.save()
}

/**
 * Export sink that merges the pages with pdf-lib and writes the result.
 */
export function createPdfExportSink(): ExportSink {
  return {
    async write(pages, destination) {
      const bytes = await mergePDFPages(pages)
      await saveBytes(bytes, destination)
    },
  }
}
