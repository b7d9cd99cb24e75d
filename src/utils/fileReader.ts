import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import type { SourceFile } from '@/types/index.ts'

/**
 * Read a file from disk as a Uint8Array.
 */
export async function readFileAsUint8Array(filePath: string): Promise<Uint8Array> {
  const buffer = await readFile(filePath)
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength)
}

/**
 * Wrap a path as a SourceFile. Bytes are read when the file is opened,
 * not when it is picked.
 */
export function fileFromPath(filePath: string): SourceFile {
  return {
    name: basename(filePath),
    read: () => readFileAsUint8Array(filePath),
  }
}

/**
 * Wrap in-memory bytes as a SourceFile.
 */
export function fileFromBytes(name: string, data: Uint8Array): SourceFile {
  return {
    name,
    read: async () => data,
  }
}

/**
 * Check if a file name matches expected extensions.
 */
export function hasExtension(fileName: string, extensions: string[]): boolean {
  const dot = fileName.lastIndexOf('.')
  if (dot < 0) return false
  return extensions.includes(fileName.slice(dot + 1).toLowerCase())
}

/** "report.final.pdf" → "report.final" */
export function stripExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.')
  return dot > 0 ? fileName.slice(0, dot) : fileName
}
