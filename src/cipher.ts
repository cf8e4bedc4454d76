/**
 * AES-256-CBC adapter (PKCS#7 padding) over @noble/ciphers
 *
 * The avalanche analyzer only sees EncryptFn; this is the production cipher
 * plugged into it, plus a minimal send/receive channel with a fresh IV per
 * message.
 */
import { cbc } from '@noble/ciphers/aes.js'
import { randomBytes } from '@noble/hashes/utils.js'
import { InvalidParameterError } from './errors.js'
import type { EncryptFn } from './avalanche.js'

export const AES_BLOCK_SIZE = 16
export const AES_256_KEY_SIZE = 32

/** Fixed all-zero IV, used where runs must be comparable (avalanche baselines) */
export const ZERO_IV = new Uint8Array(AES_BLOCK_SIZE)

function checkParams(key: Uint8Array, iv: Uint8Array): void {
  if (key.length !== AES_256_KEY_SIZE) {
    throw new InvalidParameterError(`AES-256 key must be ${AES_256_KEY_SIZE} bytes, got ${key.length}`)
  }
  if (iv.length !== AES_BLOCK_SIZE) {
    throw new InvalidParameterError(`IV must be ${AES_BLOCK_SIZE} bytes, got ${iv.length}`)
  }
}

export const encrypt: EncryptFn = (key, iv, plaintext) => {
  checkParams(key, iv)
  return cbc(key, iv).encrypt(plaintext)
}

export function decrypt(key: Uint8Array, iv: Uint8Array, ciphertext: Uint8Array): Uint8Array {
  checkParams(key, iv)
  return cbc(key, iv).decrypt(ciphertext)
}

export interface SealedMessage {
  iv: Uint8Array
  ciphertext: Uint8Array
}

export function send(
  message: Uint8Array,
  key: Uint8Array,
  ivSource: (n: number) => Uint8Array = randomBytes,
): SealedMessage {
  const iv = ivSource(AES_BLOCK_SIZE)
  return { iv, ciphertext: encrypt(key, iv, message) }
}

export function receive(sealed: SealedMessage, key: Uint8Array): Uint8Array {
  return decrypt(key, sealed.iv, sealed.ciphertext)
}
