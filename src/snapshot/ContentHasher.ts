import crypto from 'crypto'

export const DIGEST_ALGORITHM = 'sha256'
export const DIGEST_HEX_LENGTH = 64

/**
 * Calculate the fingerprint of file content
 */
export function fingerprint(bytes: Uint8Array): string {
  return crypto.createHash(DIGEST_ALGORITHM).update(bytes).digest('hex')
}
