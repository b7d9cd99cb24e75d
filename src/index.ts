export * from '@/tools/page-organizer/index.ts'
export { appStore } from '@/stores/appStore.ts'
export {
  createMupdfRenderBackend, createPdfExportSink, fitScale, loadPDFFile, mergePDFPages,
} from '@/utils/pdf.ts'
export type { MupdfRenderBackend } from '@/utils/pdf.ts'
export { fileFromBytes, fileFromPath } from '@/utils/fileReader.ts'
export { saveBytes } from '@/utils/save.ts'
export type * from '@/types/index.ts'
