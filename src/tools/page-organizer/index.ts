export {
  createPageOrganizer,
  selectDocumentCount,
  selectHasPages,
  selectPageHandles,
  selectSelectedCount,
} from './pageOrganizerStore.ts'
export type { PageOrganizer, PageOrganizerOptions, PageOrganizerState } from './pageOrganizerStore.ts'
export { ThumbnailPipeline } from './thumbnailPipeline.ts'
export type { ThumbnailPipelineOptions } from './thumbnailPipeline.ts'
export { ThumbnailCache, thumbnailKey } from './thumbnailCache.ts'
export { SourceRegistry } from './sourceRegistry.ts'
export {
  ExportError, InvalidSelectionError, PageOrganizerError, RenderError, SourceOpenError,
} from './errors.ts'
export type { PageOrganizerErrorKind } from './errors.ts'
export * from './types.ts'
