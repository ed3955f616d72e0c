import type { AssetReference } from '../types/index.js'

/** Short human-readable description of a reference, for logs and error messages. */
export function describeReference(reference: AssetReference): string {
  switch (reference.type) {
    case 'url':
      return reference.url
    case 'file':
      return reference.path
    case 'bytes':
      return reference.label ?? `<${reference.bytes.length} inline bytes>`
  }
}

/** A reference that names a location, as opposed to carrying its bytes inline. */
export type LocatedReference = Exclude<AssetReference, { type: 'bytes' }>

/** Stable cache key of a located reference. */
export function referenceKey(reference: LocatedReference): string {
  switch (reference.type) {
    case 'url':
      return `url:${reference.url}`
    case 'file':
      return `file:${reference.path}`
  }
}

/** `http:` / `https:` URL strings are remote; anything else is a file path. */
export function isRemote(location: string): boolean {
  return /^https?:\/\//i.test(location)
}
