import { createHash } from 'crypto'

/** Lowercase hex SHA-256 of a buffer or UTF-8 string. */
export function sha256Hex(data: Buffer | string): string {
  return createHash('sha256').update(data).digest('hex')
}
