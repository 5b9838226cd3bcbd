import { randomBytes, createCipheriv, createDecipheriv } from 'crypto'

const ALGORITHM = 'aes-256-gcm'
const IV_LENGTH = 12
const TAG_LENGTH = 16

function toKey(secret: string): Buffer {
  if (secret.length < 32) {
    throw new Error('Encryption secret must be at least 32 characters')
  }
  // First 32 bytes of the secret are the AES-256 key
  return Buffer.from(secret.slice(0, 32), 'utf-8')
}

export function encrypt(plaintext: string, secret: string): string {
  const iv = randomBytes(IV_LENGTH)
  const cipher = createCipheriv(ALGORITHM, toKey(secret), iv)
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf-8'), cipher.final()])
  const tag = cipher.getAuthTag()
  // Format: base64url(iv + tag + ciphertext)
  return Buffer.concat([iv, tag, encrypted]).toString('base64url')
}

export function decrypt(token: string, secret: string): string {
  const key = toKey(secret)
  const data = Buffer.from(token, 'base64url')
  if (data.length < IV_LENGTH + TAG_LENGTH) {
    throw new Error('Invalid encrypted value')
  }
  const iv = data.subarray(0, IV_LENGTH)
  const tag = data.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH)
  const ciphertext = data.subarray(IV_LENGTH + TAG_LENGTH)
  const decipher = createDecipheriv(ALGORITHM, key, iv)
  decipher.setAuthTag(tag)
  return decipher.update(ciphertext, undefined, 'utf-8') + decipher.final('utf-8')
}
