import { describe, it, expect, afterEach } from 'vitest'
import { promises as fsp } from 'fs'
import os from 'os'
import { basename, dirname, join } from 'path'
import {
  listDirectoryIfExists,
  readFileBufferIfExists,
  readTextFileSync,
  removeFile,
  tempPathBeside,
  writeFileAtomic,
  writeJsonFile,
} from '../../../L1-infra/fileSystem/fileSystem.js'

let tempDirs: string[] = []

async function makeTempDir(): Promise<string> {
  const dir = await fsp.mkdtemp(join(os.tmpdir(), 'framecast-fs-test-'))
  tempDirs.push(dir)
  return dir
}

afterEach(async () => {
  for (const d of tempDirs) {
    await fsp.rm(d, { recursive: true, force: true }).catch(() => {})
  }
  tempDirs = []
})

describe('readTextFileSync', () => {
  it('throws "File not found" on ENOENT', () => {
    expect(() => readTextFileSync('/no/such/file.txt')).toThrow('File not found: /no/such/file.txt')
  })
})

describe('optional reads', () => {
  it('returns undefined or an empty list when the target is missing', async () => {
    expect(await readFileBufferIfExists('/no/such/file.bin')).toBeUndefined()
    expect(await listDirectoryIfExists('/no/such/dir')).toEqual([])
  })
})

describe('writeJsonFile', () => {
  it('creates parent directories and pretty-prints', async () => {
    const dir = await makeTempDir()
    const fp = join(dir, 'nested', 'deep', 'out.json')
    await writeJsonFile(fp, { a: 1 })
    expect(await fsp.readFile(fp, 'utf-8')).toBe('{\n  "a": 1\n}\n')
  })
})

describe('tempPathBeside', () => {
  it('returns a hidden partial path in the same directory', async () => {
    const dir = await fsp.realpath(await makeTempDir())
    const target = join(dir, 'video.mp4')
    const temp = tempPathBeside(target)

    expect(dirname(temp)).toBe(dir)
    expect(basename(temp).startsWith('.video.mp4-')).toBe(true)
    expect(temp.endsWith('.partial')).toBe(true)
    expect(tempPathBeside(target)).not.toBe(temp)
  })
})

describe('writeFileAtomic', () => {
  it('writes the content and leaves no temp file behind', async () => {
    const dir = await makeTempDir()
    const fp = join(dir, 'object')
    await writeFileAtomic(fp, Buffer.from('first'))
    await writeFileAtomic(fp, Buffer.from('second'))

    expect(await fsp.readFile(fp, 'utf-8')).toBe('second')
    expect(await fsp.readdir(dir)).toEqual(['object'])
  })

  it('creates missing parent directories', async () => {
    const dir = await makeTempDir()
    const fp = join(dir, 'objects', 'ab', 'abcdef')
    await writeFileAtomic(fp, 'payload')

    expect(await fsp.readFile(fp, 'utf-8')).toBe('payload')
    expect(await fsp.readdir(join(dir, 'objects', 'ab'))).toEqual(['abcdef'])
  })
})

describe('removeFile', () => {
  it('ignores missing files', async () => {
    await expect(removeFile('/no/such/file')).resolves.toBeUndefined()
  })
})
