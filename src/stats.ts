/**
 * Statistical randomness tests
 *
 * Entropy, chi-square uniformity and four NIST SP 800-22 style hypothesis
 * tests. Every function is pure and total over well-formed bitstrings: empty
 * input yields an inapplicable result rather than an exception.
 */
import { type Bitstring, countOnes, binaryEntropy } from './bits.js'
import { InvalidParameterError } from './errors.js'
import { erfc, igamc } from './special.js'

export const SIGNIFICANCE_LEVEL = 0.01
export const CHI_SQUARE_CRITICAL_DF1 = 3.841 // df = 1, alpha = 0.05
export const ENTROPY_PASS_THRESHOLD = 0.99
export const DEFAULT_BLOCK_SIZE = 128
export const DEFAULT_PATTERN_LENGTH = 2

export type Verdict = 'pass' | 'fail' | 'inapplicable'

export interface TestResult {
  statistic: number
  pValue: number   // p-value, or the score itself for entropy
  passed: boolean  // verdict === 'pass'
  verdict: Verdict
}

function result(statistic: number, pValue: number, passed: boolean): TestResult {
  return { statistic, pValue, passed, verdict: passed ? 'pass' : 'fail' }
}

/**
 * Inapplicable results report p = 0 and passed = false, so callers that only
 * read `passed` see a failure. `verdict` keeps the distinction.
 */
export function inapplicable(statistic = 0): TestResult {
  return { statistic, pValue: 0, passed: false, verdict: 'inapplicable' }
}

export function shannonEntropy(bits: Bitstring): number {
  if (bits.length === 0) return 0
  return binaryEntropy(countOnes(bits) / bits.length)
}

export function entropyTest(bits: Bitstring, threshold = ENTROPY_PASS_THRESHOLD): TestResult {
  if (bits.length === 0) return inapplicable()
  const h = shannonEntropy(bits)
  return result(h, h, h >= threshold)
}

export function chiSquareTest(bits: Bitstring): TestResult {
  const n = bits.length
  if (n === 0) return inapplicable()
  const ones = countOnes(bits)
  const zeros = n - ones
  const expected = n / 2
  const chi = ((zeros - expected) ** 2) / expected + ((ones - expected) ** 2) / expected
  return result(chi, erfc(Math.sqrt(chi / 2)), chi < CHI_SQUARE_CRITICAL_DF1)
}

/** NIST frequency (monobit) test; statistic is |S_n| / sqrt(n) */
export function frequencyTest(bits: Bitstring): TestResult {
  const n = bits.length
  if (n === 0) return inapplicable()
  const s = 2 * countOnes(bits) - n
  const sObs = Math.abs(s) / Math.sqrt(n)
  const p = erfc(sObs / Math.SQRT2)
  return result(sObs, p, p >= SIGNIFICANCE_LEVEL)
}

/**
 * NIST runs test; statistic is the observed number of runs V_n.
 * Inapplicable when the ones proportion fails the frequency prerequisite
 * |pi - 1/2| < 2/sqrt(n).
 */
export function runsTest(bits: Bitstring): TestResult {
  const n = bits.length
  if (n < 2) return inapplicable()
  const pi = countOnes(bits) / n
  if (Math.abs(pi - 0.5) >= 2 / Math.sqrt(n)) return inapplicable()

  let runs = 1
  for (let i = 1; i < n; i++) {
    if (bits[i] !== bits[i - 1]) runs++
  }
  const spread = pi * (1 - pi)
  const numerator = Math.abs(runs - 2 * n * spread)
  const denominator = 2 * Math.sqrt(2 * n) * spread
  const p = denominator !== 0 ? erfc(numerator / denominator) : 0
  return result(runs, p, p >= SIGNIFICANCE_LEVEL)
}

/** NIST frequency-within-a-block test over floor(n / blockSize) blocks */
export function blockFrequencyTest(bits: Bitstring, blockSize = DEFAULT_BLOCK_SIZE): TestResult {
  const n = bits.length
  if (n === 0) return inapplicable()
  if (!Number.isInteger(blockSize) || blockSize < 1 || blockSize > n) {
    throw new InvalidParameterError(`blockSize must be an integer within [1, ${n}], got ${blockSize}`)
  }

  const blocks = Math.floor(n / blockSize)
  let sum = 0
  for (let i = 0; i < blocks; i++) {
    const ones = countOnes(bits.slice(i * blockSize, (i + 1) * blockSize))
    sum += (ones / blockSize - 0.5) ** 2
  }
  const chi = 4 * blockSize * sum
  const p = igamc(blocks / 2, chi / 2)
  return result(chi, p, p >= SIGNIFICANCE_LEVEL)
}

/** Sum of C_i * ln(C_i) over overlapping (wrapped) m-bit pattern frequencies */
function patternPhi(bits: Bitstring, m: number): number {
  if (m === 0) return 0
  const n = bits.length
  const wrapped = bits + bits.slice(0, m - 1)
  const counts = new Map<string, number>()
  for (let i = 0; i < n; i++) {
    const pattern = wrapped.slice(i, i + m)
    counts.set(pattern, (counts.get(pattern) ?? 0) + 1)
  }
  let phi = 0
  for (const count of counts.values()) {
    const c = count / n
    phi += c * Math.log(c)
  }
  return phi
}

/** NIST approximate entropy test; statistic is chi^2 = 2n(ln 2 - ApEn) */
export function approximateEntropyTest(bits: Bitstring, patternLength = DEFAULT_PATTERN_LENGTH): TestResult {
  const n = bits.length
  if (n === 0) return inapplicable()
  if (!Number.isInteger(patternLength) || patternLength < 1 || patternLength + 1 > n) {
    throw new InvalidParameterError(`patternLength must be an integer within [1, ${n - 1}], got ${patternLength}`)
  }

  const apEn = patternPhi(bits, patternLength) - patternPhi(bits, patternLength + 1)
  const chi = 2 * n * (Math.LN2 - apEn)
  const p = igamc(2 ** (patternLength - 1), chi / 2)
  return result(chi, p, p >= SIGNIFICANCE_LEVEL)
}

export type MetricName =
  | 'entropy'
  | 'chiSquare'
  | 'frequency'
  | 'runs'
  | 'blockFrequency'
  | 'approximateEntropy'

export const METRICS: readonly MetricName[] = [
  'entropy',
  'chiSquare',
  'frequency',
  'runs',
  'blockFrequency',
  'approximateEntropy',
]

export type ScoreCard = Record<MetricName, TestResult>

/** Build a record with one entry per metric */
export function byMetric<T>(make: (metric: MetricName) => T): Record<MetricName, T> {
  return {
    entropy: make('entropy'),
    chiSquare: make('chiSquare'),
    frequency: make('frequency'),
    runs: make('runs'),
    blockFrequency: make('blockFrequency'),
    approximateEntropy: make('approximateEntropy'),
  }
}

export interface ScoreOptions {
  entropyThreshold?: number
  blockSize?: number
  patternLength?: number
}

/**
 * Run the whole battery. Inputs shorter than the block size get one block of
 * the whole input; inputs too short for the pattern length get an
 * inapplicable approximate-entropy result.
 */
export function score(bits: Bitstring, options: ScoreOptions = {}): ScoreCard {
  const blockSize = options.blockSize ?? DEFAULT_BLOCK_SIZE
  const patternLength = options.patternLength ?? DEFAULT_PATTERN_LENGTH
  const n = bits.length
  return {
    entropy: entropyTest(bits, options.entropyThreshold),
    chiSquare: chiSquareTest(bits),
    frequency: frequencyTest(bits),
    runs: runsTest(bits),
    blockFrequency: n === 0 ? inapplicable() : blockFrequencyTest(bits, Math.min(blockSize, n)),
    approximateEntropy: patternLength + 1 > n ? inapplicable() : approximateEntropyTest(bits, patternLength),
  }
}

/** Scalar a trial aggregates for each metric: H, chi^2, or the p-value */
export function metricValue(metric: MetricName, r: TestResult): number {
  return metric === 'entropy' || metric === 'chiSquare' ? r.statistic : r.pValue
}
