export type * from './common.ts'
export type * from './pdf.ts'
