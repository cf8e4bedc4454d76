/**
 * Von Neumann debiasing and adaptive fixed-length extraction
 *
 * Pairwise debiasing removes first-order bias: of each non-overlapping pair,
 * 01 -> 0, 10 -> 1, and 00/11 are dropped. The yield is data-dependent (at
 * most 1/2, roughly 1/4 for a fair source, lower for a biased one), so a
 * fixed-length request runs a feedback loop that sizes each raw request from
 * an exponentially smoothed yield estimate.
 */
import type { Bitstring } from './bits.js'
import { BitBuffer } from './buffer.js'
import { ExtractionStalledError, InvalidParameterError, requireInteger } from './errors.js'
import type { RawBitSource } from './source.js'
import { log } from './log.js'

export interface ExtractorConfig {
  initialEfficiency: number  // starting yield estimate, in (0, 1]
  smoothing: number          // weight of the prior estimate, in [0, 1)
  minEfficiency: number      // floor for observed yield and the estimate
  safetyMargin: number       // extra raw bits per request
  maxIterations: number      // stall bound for one extraction
}

export const DEFAULT_EXTRACTOR_CONFIG: Readonly<ExtractorConfig> = {
  initialEfficiency: 0.3,
  smoothing: 0.7,
  minEfficiency: 0.01,
  safetyMargin: 32, // 4 shots of an 8-qubit register
  maxIterations: 1000,
}

export interface ExtractionStats {
  rawBitsUsed: number
  finalBits: number
  efficiency: number | null  // finalBits / rawBitsUsed
}

export interface FixedLengthResult {
  bits: Bitstring
  stats: ExtractionStats
}

export interface VariableLengthResult {
  raw: Bitstring
  extracted: Bitstring
  efficiency: number  // extracted.length / raw.length
}

/** Per-call controller state, threaded through the loop by value */
export interface ExtractionState {
  rawBitsConsumed: number
  currentYieldEstimate: number
  extractedLength: number
  iterations: number
}

export function vonNeumann(bits: Bitstring): Bitstring {
  const out: string[] = []
  for (let i = 0; i + 1 < bits.length; i += 2) {
    const a = bits[i]
    const b = bits[i + 1]
    if (a === '0' && b === '1') out.push('0')
    else if (a === '1' && b === '0') out.push('1')
  }
  return out.join('')
}

export function validateExtractorConfig(config: ExtractorConfig): ExtractorConfig {
  const { initialEfficiency, smoothing, minEfficiency, safetyMargin, maxIterations } = config
  if (!(minEfficiency > 0 && minEfficiency <= 1)) {
    throw new InvalidParameterError(`minEfficiency must be within (0, 1], got ${minEfficiency}`)
  }
  if (!(initialEfficiency >= minEfficiency && initialEfficiency <= 1)) {
    throw new InvalidParameterError(`initialEfficiency must be within [minEfficiency, 1], got ${initialEfficiency}`)
  }
  if (!(smoothing >= 0 && smoothing < 1)) {
    throw new InvalidParameterError(`smoothing must be within [0, 1), got ${smoothing}`)
  }
  requireInteger('safetyMargin', safetyMargin, 0)
  requireInteger('maxIterations', maxIterations, 1)
  return config
}

/** Raw bits to request for the remaining output under the current estimate */
export function rawBitsNeeded(remaining: number, estimate: number, config: ExtractorConfig): number {
  return Math.ceil(remaining / Math.max(estimate, config.minEfficiency)) + config.safetyMargin
}

/** Fold one observation into the controller state */
export function updateYieldEstimate(
  state: ExtractionState,
  rawLength: number,
  outLength: number,
  config: ExtractorConfig,
): ExtractionState {
  const next: ExtractionState = {
    rawBitsConsumed: state.rawBitsConsumed + rawLength,
    currentYieldEstimate: state.currentYieldEstimate,
    extractedLength: state.extractedLength + outLength,
    iterations: state.iterations + 1,
  }
  if (rawLength > 0) {
    const observed = Math.max(config.minEfficiency, outLength / rawLength)
    const blended = config.smoothing * state.currentYieldEstimate + (1 - config.smoothing) * observed
    next.currentYieldEstimate = Math.max(config.minEfficiency, blended)
  }
  return next
}

export class Extractor {
  readonly buffer: BitBuffer
  readonly config: ExtractorConfig

  constructor(source: RawBitSource | BitBuffer, config: Partial<ExtractorConfig> = {}) {
    this.buffer = source instanceof BitBuffer ? source : new BitBuffer(source)
    this.config = validateExtractorConfig({ ...DEFAULT_EXTRACTOR_CONFIG, ...config })
  }

  /** Debias a fixed amount of raw input; output length varies */
  async extractVariableLength(rawCount: number, signal?: AbortSignal): Promise<VariableLengthResult> {
    requireInteger('rawCount', rawCount, 0)
    const raw = await this.buffer.request(rawCount, signal)
    const extracted = vonNeumann(raw)
    return {
      raw,
      extracted,
      efficiency: raw.length > 0 ? extracted.length / raw.length : 0,
    }
  }

  /** Exactly `n` debiased bits */
  async extractFixedLength(n: number, signal?: AbortSignal): Promise<FixedLengthResult> {
    requireInteger('n', n, 0)
    if (n === 0) {
      return { bits: '', stats: { rawBitsUsed: 0, finalBits: 0, efficiency: null } }
    }

    const config = this.config
    let state: ExtractionState = {
      rawBitsConsumed: 0,
      currentYieldEstimate: config.initialEfficiency,
      extractedLength: 0,
      iterations: 0,
    }
    const parts: string[] = []

    while (state.extractedLength < n) {
      if (state.iterations >= config.maxIterations) {
        log.warn({ component: 'extractor', iterations: state.iterations, extracted: state.extractedLength, target: n }, 'Extraction stalled')
        throw new ExtractionStalledError(state.iterations, state.extractedLength, n)
      }

      const request = rawBitsNeeded(n - state.extractedLength, state.currentYieldEstimate, config)
      const raw = await this.buffer.request(request, signal)
      const out = vonNeumann(raw)
      parts.push(out)
      state = updateYieldEstimate(state, raw.length, out.length, config)

      log.debug({
        component: 'extractor',
        iteration: state.iterations,
        requested: request,
        produced: out.length,
        estimate: Number(state.currentYieldEstimate.toFixed(4)),
      }, 'Extraction round')
    }

    const bits = parts.join('').slice(0, n)
    const stats: ExtractionStats = {
      rawBitsUsed: state.rawBitsConsumed,
      finalBits: n,
      efficiency: n / state.rawBitsConsumed,
    }
    log.debug({ component: 'extractor', ...stats, iterations: state.iterations }, 'Extraction complete')
    return { bits, stats }
  }

  /** Raw passthrough: exactly `n` undebiased bits */
  async rawBits(n: number, signal?: AbortSignal): Promise<FixedLengthResult> {
    requireInteger('n', n, 0)
    const bits = await this.buffer.request(n, signal)
    return { bits, stats: { rawBitsUsed: n, finalBits: n, efficiency: n > 0 ? 1 : null } }
  }
}
