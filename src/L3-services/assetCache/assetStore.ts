import {
  fileExists,
  listDirectoryIfExists,
  readFileBufferIfExists,
  writeFileAtomic,
} from '../../L1-infra/fileSystem/fileSystem.js'
import { join } from '../../L1-infra/paths/paths.js'
import { sha256Hex } from '../../L1-infra/hash/hash.js'

// ── Layout ───────────────────────────────────────────────────────────────────
//
//   <root>/objects/<aa>/<digest>   raw asset bytes, write-once
//   <root>/refs/<sha256(key)>      digest a URL reference last resolved to

const DIGEST_RE = /^[0-9a-f]{64}$/

export function isDigest(value: string): boolean {
  return DIGEST_RE.test(value)
}

/** Content-addressed object store plus a URL → digest index on disk. */
export class AssetStore {
  constructor(readonly root: string) {}

  objectPath(digest: string): string {
    return join(this.root, 'objects', digest.slice(0, 2), digest)
  }

  refPath(key: string): string {
    return join(this.root, 'refs', sha256Hex(key))
  }

  async hasObject(digest: string): Promise<boolean> {
    return isDigest(digest) && fileExists(this.objectPath(digest))
  }

  /** Stored bytes for a digest, or `undefined` when absent. */
  async readObject(digest: string): Promise<Buffer | undefined> {
    if (!isDigest(digest)) return undefined
    return readFileBufferIfExists(this.objectPath(digest))
  }

  /** Store bytes under their digest. An existing object is never rewritten. */
  async writeObject(digest: string, bytes: Buffer): Promise<void> {
    const path = this.objectPath(digest)
    if (await fileExists(path)) return
    await writeFileAtomic(path, bytes)
  }

  /** Replace a corrupt object; the only case where an object is overwritten. */
  async repairObject(digest: string, bytes: Buffer): Promise<void> {
    await writeFileAtomic(this.objectPath(digest), bytes)
  }

  /** Digest a reference key last resolved to, or `undefined`. */
  async readRef(key: string): Promise<string | undefined> {
    const raw = await readFileBufferIfExists(this.refPath(key))
    if (!raw) return undefined
    const digest = raw.toString('utf-8').trim()
    return isDigest(digest) ? digest : undefined
  }

  async writeRef(key: string, digest: string): Promise<void> {
    await writeFileAtomic(this.refPath(key), `${digest}\n`)
  }

  /** Every digest present under `objects/`. */
  async listObjects(): Promise<string[]> {
    const objectsDir = join(this.root, 'objects')
    const digests: string[] = []
    for (const shard of (await listDirectoryIfExists(objectsDir)).sort()) {
      for (const name of (await listDirectoryIfExists(join(objectsDir, shard))).sort()) {
        if (isDigest(name) && name.startsWith(shard)) digests.push(name)
      }
    }
    return digests
  }
}
