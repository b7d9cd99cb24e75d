import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

/**
 * Write bytes to disk, creating the parent directory if needed.
 */
export async function saveBytes(data: Uint8Array, filePath: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true })
  await writeFile(filePath, data)
}
