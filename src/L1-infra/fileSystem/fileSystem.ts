import { promises as fsp, existsSync, readFileSync } from 'fs'
import type { Stats } from 'fs'
import tmp from 'tmp'
import { dirname, basename } from '../paths/paths.js'

// Enable graceful cleanup of all tmp resources on process exit
tmp.setGracefulCleanup()

export type { Stats }

function isNotFound(err: unknown): boolean {
  return (err as NodeJS.ErrnoException)?.code === 'ENOENT'
}

// ── Reads ──────────────────────────────────────────────────────

/** Read a text file as UTF-8 string. Throws "File not found: <path>" on ENOENT. */
export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fsp.readFile(filePath, 'utf-8')
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** Sync variant of readTextFile. */
export function readTextFileSync(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8')
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** Read a file as a raw Buffer. Throws "File not found: <path>" on ENOENT. */
export async function readFileBuffer(filePath: string): Promise<Buffer> {
  try {
    return await fsp.readFile(filePath)
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** Read a file, or `undefined` when it does not exist. */
export async function readFileBufferIfExists(filePath: string): Promise<Buffer | undefined> {
  try {
    return await fsp.readFile(filePath)
  } catch (err: unknown) {
    if (isNotFound(err)) return undefined
    throw err
  }
}

/** List directory contents, or an empty list when the directory is missing. */
export async function listDirectoryIfExists(dirPath: string): Promise<string[]> {
  try {
    return await fsp.readdir(dirPath)
  } catch (err: unknown) {
    if (isNotFound(err)) return []
    throw err
  }
}

/** Check if file/dir exists (async, using stat). */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsp.stat(filePath)
    return true
  } catch (err: unknown) {
    if (isNotFound(err)) return false
    throw err
  }
}

/** Check if file/dir exists (sync). */
export function fileExistsSync(filePath: string): boolean {
  return existsSync(filePath)
}

/** Get file stats. Throws "File not found: <path>" on ENOENT. */
export async function getFileStats(filePath: string): Promise<Stats> {
  try {
    return await fsp.stat(filePath)
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

// ── Writes ─────────────────────────────────────────────────────

/** Write data as pretty-printed JSON. Creates parent dirs. */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fsp.mkdir(dirname(filePath), { recursive: true })
  await fsp.writeFile(filePath, JSON.stringify(data, null, 2) + '\n', 'utf-8')
}

/** Write a Buffer or string to a file. Creates parent dirs. */
export async function writeFileBuffer(filePath: string, data: Buffer | string): Promise<void> {
  await fsp.mkdir(dirname(filePath), { recursive: true })
  await fsp.writeFile(filePath, data)
}

/**
 * Write via a sibling temp file and rename, so readers only ever see the old
 * content or the complete new content.
 */
export async function writeFileAtomic(filePath: string, data: Buffer | string): Promise<void> {
  // tmp resolves the temp name inside the target directory, so it must exist first
  await fsp.mkdir(dirname(filePath), { recursive: true })
  const tempPath = tempPathBeside(filePath)
  await fsp.writeFile(tempPath, data)
  try {
    await fsp.rename(tempPath, filePath)
  } catch (err: unknown) {
    await removeFile(tempPath)
    throw err
  }
}

/** Ensure directory exists (recursive). */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsp.mkdir(dirPath, { recursive: true })
}

/** Rename a file within one filesystem. */
export async function renameFile(oldPath: string, newPath: string): Promise<void> {
  await fsp.rename(oldPath, newPath)
}

/** Remove file (ignores ENOENT). */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fsp.unlink(filePath)
  } catch (err: unknown) {
    if (isNotFound(err)) return
    throw err
  }
}

// ── Temp files ─────────────────────────────────────────────────

/**
 * A unique, not-yet-existing path in the same directory as `filePath`
 * (hidden, `.partial` suffix), suitable as a rename source.
 */
export function tempPathBeside(filePath: string): string {
  return tmp.tmpNameSync({
    tmpdir: dirname(filePath),
    prefix: `.${basename(filePath)}-`,
    postfix: '.partial',
  })
}
