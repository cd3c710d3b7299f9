import { readFile, stat, writeFile, mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'

interface FSX {
  readonly exists: (path: string) => Promise<boolean>
  readonly readText: (path: string) => Promise<string | undefined>
  readonly writeText: (path: string, data: string) => Promise<void>
}

async function exists(path: string): Promise<boolean> {
  try { const s = await stat(path); return s.isFile() || s.isDirectory() } catch { return false }
}

/** File contents, or undefined when the file does not exist. */
async function readText(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined
    throw err
  }
}

async function writeText(path: string, data: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, data, 'utf8')
}

export const fsx: FSX = { exists, readText, writeText }
