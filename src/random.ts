/**
 * Injectable randomness for trial indices, simulated sources and classical
 * baselines. Pass a seeded source to make a run reproducible.
 */
import { randomBytes } from '@noble/hashes/utils.js'
import { InvalidParameterError } from './errors.js'

/** `next()` returns a float in [0, 1) */
export interface RandomSource {
  next(): number
}

/** Mulberry32: small, fast, 32-bit state. Not for key material. */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return {
    next() {
      state = (state + 0x6d2b79f5) >>> 0
      let t = state
      t = Math.imul(t ^ (t >>> 15), t | 1)
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296
    },
  }
}

/** CSPRNG-backed source: 32 random bits per draw */
export function cryptoRandom(): RandomSource {
  return {
    next() {
      const b = randomBytes(4)
      const u32 = ((b[0] << 24) | (b[1] << 16) | (b[2] << 8) | b[3]) >>> 0
      return u32 / 4294967296
    },
  }
}

export const mathRandom: RandomSource = { next: () => Math.random() }

/** Uniform integer in [0, maxExclusive) */
export function randomInt(random: RandomSource, maxExclusive: number): number {
  if (!Number.isInteger(maxExclusive) || maxExclusive < 1) {
    throw new InvalidParameterError(`maxExclusive must be a positive integer, got ${maxExclusive}`)
  }
  return Math.min(maxExclusive - 1, Math.floor(random.next() * maxExclusive))
}
