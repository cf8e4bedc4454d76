/**
 * Repeated-trial scoring
 *
 * Draws `trials` independent bitstrings from a source, scores each with the
 * full battery, and reduces every metric to mean ± 95 % confidence half-width
 * and a pass count.
 */
import type { Bitstring } from './bits.js'
import { SourceUnavailableError, requireInteger } from './errors.js'
import { type MetricName, type ScoreOptions, METRICS, byMetric, metricValue, score } from './stats.js'
import { log } from './log.js'

export const Z_95 = 1.96

export type BitSourceFn = (n: number) => Bitstring | Promise<Bitstring>

export interface TrialSummary {
  mean: number | null                  // null when no trials ran
  confidenceInterval95: number | null  // half-width; null when no trials ran
  passCount: number
  totalTrials: number
}

export interface TrialReport {
  trials: number
  bitLength: number
  perMetric: Record<MetricName, TrialSummary>
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null
  return values.reduce((s, v) => s + v, 0) / values.length
}

/** Sample standard deviation (n - 1 divisor); 0 below two values */
export function sampleStdDev(values: readonly number[]): number {
  const n = values.length
  if (n < 2) return 0
  const m = values.reduce((s, v) => s + v, 0) / n
  const ss = values.reduce((s, v) => s + (v - m) ** 2, 0)
  return Math.sqrt(ss / (n - 1))
}

export function summarize(values: readonly number[], passCount: number): TrialSummary {
  const n = values.length
  if (n === 0) {
    return { mean: null, confidenceInterval95: null, passCount, totalTrials: 0 }
  }
  return {
    mean: mean(values),
    confidenceInterval95: n === 1 ? 0 : (Z_95 * sampleStdDev(values)) / Math.sqrt(n),
    passCount,
    totalTrials: n,
  }
}

export async function runTrials(
  source: BitSourceFn,
  trials: number,
  bitLength: number,
  options: ScoreOptions = {},
): Promise<TrialReport> {
  requireInteger('trials', trials, 0)
  requireInteger('bitLength', bitLength, 1)

  const values = byMetric<number[]>(() => [])
  const passes = byMetric(() => 0)

  for (let t = 0; t < trials; t++) {
    const bits = await source(bitLength)
    if (bits.length !== bitLength) {
      throw new SourceUnavailableError(`Trial ${t + 1}: source returned ${bits.length} bits, expected ${bitLength}`)
    }
    const card = score(bits, options)
    for (const metric of METRICS) {
      values[metric].push(metricValue(metric, card[metric]))
      if (card[metric].passed) passes[metric]++
    }
    log.debug({ component: 'trials', trial: t + 1, of: trials }, 'Trial scored')
  }

  const perMetric = byMetric((metric) => summarize(values[metric], passes[metric]))
  log.info({ component: 'trials', trials, bitLength }, 'Trials complete')
  return { trials, bitLength, perMetric }
}
