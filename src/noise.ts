/**
 * Noise and bias analysis
 *
 * Bit-flip probabilities against a reference sequence, a readout-error
 * estimate, and a before/after comparison of raw versus debiased output.
 */
import { type Bitstring, type BitMetrics, bitMetrics } from './bits.js'
import type { ExtractionStats, Extractor } from './extractor.js'
import { type ScoreCard, type ScoreOptions, score } from './stats.js'
import { requireInteger } from './errors.js'
import { log } from './log.js'

export interface BitFlipProbability {
  p01: number  // P(measured 1 | reference 0)
  p10: number  // P(measured 0 | reference 1)
}

/** Compares position by position over the shorter of the two sequences */
export function bitFlipProbability(measured: Bitstring, reference: Bitstring): BitFlipProbability {
  const n = Math.min(measured.length, reference.length)
  let zeroTotal = 0
  let oneTotal = 0
  let flip01 = 0
  let flip10 = 0
  for (let i = 0; i < n; i++) {
    if (reference[i] === '0') {
      zeroTotal++
      if (measured[i] === '1') flip01++
    } else if (reference[i] === '1') {
      oneTotal++
      if (measured[i] === '0') flip10++
    }
  }
  return {
    p01: zeroTotal > 0 ? flip01 / zeroTotal : 0,
    p10: oneTotal > 0 ? flip10 / oneTotal : 0,
  }
}

export function readoutErrorEstimate(p01: number, p10: number): number {
  return (p01 + p10) / 2
}

export interface StreamReport {
  metrics: BitMetrics
  tests: ScoreCard
}

export interface ExtractionAnalysis {
  before: StreamReport
  after: StreamReport
  raw: Bitstring
  extracted: Bitstring
  stats: ExtractionStats
}

export function streamReport(bits: Bitstring, options?: ScoreOptions): StreamReport {
  return { metrics: bitMetrics(bits), tests: score(bits, options) }
}

/** n raw bits versus n debiased bits from the same source */
export async function analyzeExtraction(
  extractor: Extractor,
  n: number,
  options?: ScoreOptions,
  signal?: AbortSignal,
): Promise<ExtractionAnalysis> {
  requireInteger('n', n, 1)
  const raw = (await extractor.rawBits(n, signal)).bits
  const { bits: extracted, stats } = await extractor.extractFixedLength(n, signal)
  const before = streamReport(raw, options)
  const after = streamReport(extracted, options)
  log.info({
    component: 'noise',
    biasBefore: before.metrics.bias,
    biasAfter: after.metrics.bias,
    efficiency: stats.efficiency,
  }, 'Extraction analysis complete')
  return { before, after, raw, extracted, stats }
}
