/**
 * Numbers from extracted bits
 *
 * Floats use the mantissa trick: OR the top mantissa bits into the exponent
 * pattern of 1.0, giving a value in [1, 2), then subtract 1.
 */
import { type Bitstring, assertBitstring } from './bits.js'
import { InvalidParameterError } from './errors.js'
import type { Extractor } from './extractor.js'

function requireLength(bits: Bitstring, n: number): void {
  assertBitstring(bits)
  if (bits.length !== n) {
    throw new InvalidParameterError(`Expected ${n} bits, got ${bits.length}`)
  }
}

export function toInt32(bits: Bitstring): number {
  requireLength(bits, 32)
  return parseInt(bits, 2)
}

export function toInt64(bits: Bitstring): bigint {
  requireLength(bits, 64)
  return BigInt('0b' + bits)
}

/** 32 bits -> float in [min, max), using the top 23 bits */
export function toFloat32(bits: Bitstring, min = 0, max = 1): number {
  const u = (0x3f800000 | (toInt32(bits) >>> 9)) >>> 0
  const view = new DataView(new ArrayBuffer(4))
  view.setUint32(0, u)
  const unit = view.getFloat32(0) - 1
  return (max - min) * unit + min
}

/** 64 bits -> double in [min, max), using the top 52 bits */
export function toFloat64(bits: Bitstring, min = 0, max = 1): number {
  const u = 0x3ff0000000000000n | (toInt64(bits) >> 12n)
  const view = new DataView(new ArrayBuffer(8))
  view.setBigUint64(0, u)
  const unit = view.getFloat64(0) - 1
  return (max - min) * unit + min
}

export async function randomInt32(extractor: Extractor): Promise<number> {
  return toInt32((await extractor.extractFixedLength(32)).bits)
}

export async function randomInt64(extractor: Extractor): Promise<bigint> {
  return toInt64((await extractor.extractFixedLength(64)).bits)
}

export async function randomFloat(extractor: Extractor, min = 0, max = 1): Promise<number> {
  return toFloat32((await extractor.extractFixedLength(32)).bits, min, max)
}

export async function randomDouble(extractor: Extractor, min = 0, max = 1): Promise<number> {
  return toFloat64((await extractor.extractFixedLength(64)).bits, min, max)
}
