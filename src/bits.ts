/**
 * Bitstrings
 *
 * A bitstring is a plain string over the symbols '0' and '1'. Strings are
 * immutable, indexable and cheap to slice, which is all the pipeline needs.
 */
import { InvalidParameterError } from './errors.js'

export type Bitstring = string

const BIT_PATTERN = /^[01]*$/

export function isBitstring(value: string): boolean {
  return BIT_PATTERN.test(value)
}

export function assertBitstring(value: string, label = 'bitstring'): Bitstring {
  if (!isBitstring(value)) {
    throw new InvalidParameterError(`${label} may only contain '0' and '1'`)
  }
  return value
}

export function countOnes(bits: Bitstring): number {
  let ones = 0
  for (let i = 0; i < bits.length; i++) {
    if (bits.charCodeAt(i) === 49) ones++
  }
  return ones
}

/** Big-endian per byte: bit 0 of the string is the MSB of byte 0 */
export function bytesToBits(bytes: Uint8Array): Bitstring {
  return Array.from(bytes)
    .map((b) => b.toString(2).padStart(8, '0'))
    .join('')
}

/** Inverse of bytesToBits. Length must be a multiple of 8. */
export function bitsToBytes(bits: Bitstring): Uint8Array {
  assertBitstring(bits)
  if (bits.length % 8 !== 0) {
    throw new InvalidParameterError(`Bit length must be a multiple of 8, got ${bits.length}`)
  }
  const out = new Uint8Array(bits.length / 8)
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(bits.slice(i * 8, i * 8 + 8), 2)
  }
  return out
}

/** Binary Shannon entropy from the 0/1 frequencies, in bits per bit */
export function binaryEntropy(p1: number): number {
  const p0 = 1 - p1
  let h = 0
  if (p0 > 0) h -= p0 * Math.log2(p0)
  if (p1 > 0) h -= p1 * Math.log2(p1)
  return h
}

export interface BitMetrics {
  length: number
  zeros: number
  ones: number
  p0: number | null
  p1: number | null
  bias: number | null   // |p1 - 0.5|
  entropy: number | null
}

export function bitMetrics(bits: Bitstring): BitMetrics {
  const length = bits.length
  if (length === 0) {
    return { length: 0, zeros: 0, ones: 0, p0: null, p1: null, bias: null, entropy: null }
  }
  const ones = countOnes(bits)
  const zeros = length - ones
  const p1 = ones / length
  return {
    length,
    zeros,
    ones,
    p0: zeros / length,
    p1,
    bias: Math.abs(p1 - 0.5),
    entropy: binaryEntropy(p1),
  }
}
