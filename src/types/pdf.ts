/** A file the user picked, readable on demand */
export interface SourceFile {
  name: string
  read: () => Promise<Uint8Array>
}

/** Represents an opened source PDF */
export interface PDFSource {
  id: string
  name: string             // file name without extension, shown as the page label
  data: Uint8Array
  pageCount: number
  pages: PageHandle[]
}

/**
 * Non-owning reference to one page of a source. Only valid while the source
 * stays registered.
 */
export interface PageHandle {
  source: PDFSource
  pageIndex: number        // 0-based page index in the source PDF
  width: number            // page box in PDF points, rotation applied
  height: number
}

export interface Size {
  width: number
  height: number
}

/** Rendered page raster */
export interface Thumbnail {
  width: number
  height: number
  mimeType: 'image/png'
  data: Uint8Array
}

/** Represents a single page within the organized document */
export interface PageEntry {
  id: string
  sourceId: string
  sourceLabel: string
  originIndex: number      // 0-based page index in the source PDF
  displayIndex: number     // 1-based position in the current order
  page: PageHandle
  thumbnail?: Thumbnail
}

export interface DocumentSource {
  open: (file: SourceFile) => Promise<PDFSource>
}

export interface RenderBackend {
  render: (page: PageHandle, target: Size) => Promise<Thumbnail>
  /** Drop anything kept for a source that left the collection */
  release?: (sourceId: string) => void
}

export interface ExportSink {
  write: (pages: readonly PageHandle[], destination: string) => Promise<void>
}
