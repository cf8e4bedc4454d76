/**
 * AES-256 key generation
 *
 * Debiased bits are hashed with SHA-256 (privacy amplification) so any
 * residual bias in the 256 source bits does not reach the key directly.
 */
import { sha256 } from '@noble/hashes/sha2.js'
import { utf8ToBytes } from '@noble/hashes/utils.js'
import { type Bitstring, bitsToBytes, bytesToBits } from './bits.js'
import { InvalidParameterError } from './errors.js'
import type { Extractor } from './extractor.js'
import type { RandomSource } from './random.js'
import { shannonEntropy } from './stats.js'

export const KEY_BITS = 256

export type KeySourceKind = 'qrng' | 'classical_random' | 'classical_fixed_seed'

export interface GeneratedKey {
  kind: KeySourceKind
  key: Uint8Array        // 32 bytes
  sourceBits: Bitstring  // bits the key was derived from, before hashing
  keyEntropy: number     // Shannon entropy of the final key bits
}

export function deriveKeyFromBits(bits: Bitstring): Uint8Array {
  if (bits.length !== KEY_BITS) {
    throw new InvalidParameterError(`Key derivation needs exactly ${KEY_BITS} bits, got ${bits.length}`)
  }
  return sha256(bitsToBytes(bits))
}

export function keyEntropy(key: Uint8Array): number {
  return shannonEntropy(bytesToBits(key))
}

export async function generateQrngKey(extractor: Extractor, signal?: AbortSignal): Promise<GeneratedKey> {
  const { bits } = await extractor.extractFixedLength(KEY_BITS, signal)
  const key = deriveKeyFromBits(bits)
  return { kind: 'qrng', key, sourceBits: bits, keyEntropy: keyEntropy(key) }
}

/**
 * Classical baseline: SHA-256 of the decimal text of a single PRNG draw.
 * With a seeded source this yields the same key every run.
 */
export function generateClassicalKey(random: RandomSource, kind: 'classical_random' | 'classical_fixed_seed' = 'classical_random'): GeneratedKey {
  const material = utf8ToBytes(String(random.next()))
  const key = sha256(material)
  return { kind, key, sourceBits: bytesToBits(material), keyEntropy: keyEntropy(key) }
}
