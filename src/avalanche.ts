/**
 * Avalanche (key sensitivity) analysis
 *
 * Flip one random key bit, re-encrypt the same plaintext under the same IV,
 * and measure how many ciphertext bits changed. A well-behaved cipher sits
 * near 50 %.
 */
import { InvalidParameterError } from './errors.js'
import { type RandomSource, cryptoRandom, randomInt } from './random.js'
import { log } from './log.js'

export type EncryptFn = (key: Uint8Array, iv: Uint8Array, plaintext: Uint8Array) => Uint8Array

export interface AvalancheSample {
  bitIndexFlipped: number
  percentChanged: number
}

export interface AvalancheSummary {
  mean: number
  populationStdDev: number
  samples: AvalancheSample[]
}

export interface AvalancheOptions {
  key: Uint8Array
  plaintext: Uint8Array
  iv: Uint8Array
  encrypt: EncryptFn
  trials?: number  // default 5
  random?: RandomSource
}

export const DEFAULT_AVALANCHE_TRIALS = 5

/** Copy of `key` with bit `index` flipped; bit i lives in byte i >> 3 at mask 1 << (i & 7) */
export function flipKeyBit(key: Uint8Array, index: number): Uint8Array {
  const totalBits = key.length * 8
  if (!Number.isInteger(index) || index < 0 || index >= totalBits) {
    throw new InvalidParameterError(`bit index must be within [0, ${totalBits - 1}], got ${index}`)
  }
  const out = Uint8Array.from(key)
  out[index >> 3] ^= 1 << (index & 7)
  return out
}

function popcount8(b: number): number {
  let c = 0
  while (b) {
    c += b & 1
    b >>= 1
  }
  return c
}

/** Percentage of differing bits over the shorter of the two inputs */
export function avalanchePercent(c1: Uint8Array, c2: Uint8Array): number {
  const minBytes = Math.min(c1.length, c2.length)
  if (minBytes === 0) return 0
  let changed = 0
  for (let i = 0; i < minBytes; i++) changed += popcount8(c1[i] ^ c2[i])
  return (changed / (minBytes * 8)) * 100
}

export function populationStdDev(values: readonly number[]): number {
  const n = values.length
  if (n === 0) return 0
  const m = values.reduce((s, v) => s + v, 0) / n
  return Math.sqrt(values.reduce((s, v) => s + (v - m) ** 2, 0) / n)
}

export function avalanche(options: AvalancheOptions): AvalancheSummary {
  const { key, plaintext, iv, encrypt } = options
  const trials = options.trials ?? DEFAULT_AVALANCHE_TRIALS
  const random = options.random ?? cryptoRandom()
  if (key.length === 0) throw new InvalidParameterError('key must not be empty')
  if (!Number.isInteger(trials) || trials < 1) {
    throw new InvalidParameterError(`trials must be a positive integer, got ${trials}`)
  }

  const baseline = encrypt(key, iv, plaintext)
  const keyBits = key.length * 8
  const samples: AvalancheSample[] = []

  for (let t = 0; t < trials; t++) {
    const bitIndexFlipped = randomInt(random, keyBits)
    const flipped = encrypt(flipKeyBit(key, bitIndexFlipped), iv, plaintext)
    const percentChanged = avalanchePercent(baseline, flipped)
    samples.push({ bitIndexFlipped, percentChanged })
    log.debug({ component: 'avalanche', trial: t + 1, bitIndexFlipped, percentChanged }, 'Avalanche trial')
  }

  const values = samples.map((s) => s.percentChanged)
  const summary: AvalancheSummary = {
    mean: values.reduce((s, v) => s + v, 0) / values.length,
    populationStdDev: populationStdDev(values),
    samples,
  }
  log.info({ component: 'avalanche', trials, mean: summary.mean, std: summary.populationStdDev }, 'Avalanche complete')
  return summary
}
