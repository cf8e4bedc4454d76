/**
 * Raw entropy sources
 *
 * The extraction core only ever sees the RawBitSource interface. Hardware
 * backends live outside this package; the simulated register here stands in
 * for one during development, tests and classical baselines.
 */
import type { Bitstring } from './bits.js'
import { InvalidParameterError, requireInteger } from './errors.js'
import { type RandomSource, cryptoRandom } from './random.js'

export interface RawBitSource {
  /**
   * Produce at least `count` raw bits. Implementations choose their own chunk
   * size and may return more (e.g. whole shots of a qubit register).
   * May be slow; may reject. Callers own any retry policy.
   */
  produceRawBits(count: number, signal?: AbortSignal): Promise<Bitstring>
}

export interface ReadoutError {
  p01: number  // P(measure 1 | prepared 0)
  p10: number  // P(measure 0 | prepared 1)
}

export interface SimulatedRegisterOptions {
  qubits?: number              // bits per shot (default 8)
  pOne?: number                // probability an ideal measurement yields 1 (default 0.5)
  readoutError?: ReadoutError  // symmetric-noise model applied after measurement
  random?: RandomSource
}

export const DEFAULT_QUBITS = 8

function requireProbability(name: string, p: number): void {
  if (!(p >= 0 && p <= 1)) {
    throw new InvalidParameterError(`${name} must be within [0, 1], got ${p}`)
  }
}

/**
 * Simulated register of `qubits` qubits in equal superposition, measured
 * shot by shot. `pOne` != 0.5 models a biased device.
 */
export class SimulatedQubitSource implements RawBitSource {
  readonly qubits: number
  readonly pOne: number
  readonly readoutError: ReadoutError
  private readonly random: RandomSource
  shotsTaken = 0

  constructor(options: SimulatedRegisterOptions = {}) {
    this.qubits = options.qubits ?? DEFAULT_QUBITS
    this.pOne = options.pOne ?? 0.5
    this.readoutError = options.readoutError ?? { p01: 0, p10: 0 }
    this.random = options.random ?? cryptoRandom()
    requireInteger('qubits', this.qubits, 1)
    requireProbability('pOne', this.pOne)
    requireProbability('readoutError.p01', this.readoutError.p01)
    requireProbability('readoutError.p10', this.readoutError.p10)
  }

  async produceRawBits(count: number, signal?: AbortSignal): Promise<Bitstring> {
    signal?.throwIfAborted()
    requireInteger('count', count, 0)
    const shots = Math.max(1, Math.ceil(count / this.qubits))
    const out: string[] = []
    for (let s = 0; s < shots; s++) {
      for (let q = 0; q < this.qubits; q++) {
        out.push(this.measure())
      }
    }
    this.shotsTaken += shots
    return out.join('')
  }

  private measure(): '0' | '1' {
    const ideal = this.random.next() < this.pOne
    const { p01, p10 } = this.readoutError
    const flip = this.random.next() < (ideal ? p10 : p01)
    return ideal !== flip ? '1' : '0'
  }
}

/** Classical PRNG baseline: n independent fair bits from `random` */
export function generateClassicalBits(n: number, random: RandomSource): Bitstring {
  requireInteger('n', n, 0)
  let bits = ''
  for (let i = 0; i < n; i++) {
    bits += random.next() < 0.5 ? '0' : '1'
  }
  return bits
}

/** Wrap a RandomSource as a RawBitSource returning exactly `count` bits */
export function classicalBitSource(random: RandomSource): RawBitSource {
  return {
    async produceRawBits(count, signal) {
      signal?.throwIfAborted()
      return generateClassicalBits(count, random)
    },
  }
}
