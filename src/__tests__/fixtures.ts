/**
 * Shared test sources — deterministic stand-ins for a hardware entropy source.
 */
import type { Bitstring } from '../bits.js'
import type { RawBitSource } from '../source.js'

export interface RecordingSource extends RawBitSource {
  calls: number[]
}

/** Returns exactly `count` bits, continuing `pattern` cyclically across calls */
export function cyclingSource(pattern: Bitstring): RecordingSource {
  let pos = 0
  const calls: number[] = []
  return {
    calls,
    async produceRawBits(count) {
      calls.push(count)
      let out = ''
      for (let i = 0; i < count; i++) out += pattern[(pos + i) % pattern.length]
      pos += count
      return out
    },
  }
}

/** Hands out the given chunks in order, ignoring the requested count */
export function scriptedSource(chunks: Bitstring[]): RecordingSource {
  const calls: number[] = []
  let next = 0
  return {
    calls,
    async produceRawBits(count) {
      calls.push(count)
      const chunk = chunks[next++]
      if (chunk === undefined) throw new Error('script exhausted')
      return chunk
    },
  }
}

/** Always rejects with `error` */
export function failingSource(error: unknown): RecordingSource {
  const calls: number[] = []
  return {
    calls,
    async produceRawBits(count) {
      calls.push(count)
      throw error
    },
  }
}
