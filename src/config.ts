/**
 * Runtime configuration from the environment
 *
 *   QRNG_QUBITS  bits per shot of the simulated register (default 8)
 *   QRNG_BIAS    probability of measuring 1 (default 0.5)
 *   QRNG_SEED    integer seed; unset means a CSPRNG-backed source
 *   LOG_LEVEL    pino level (read by log.ts)
 */
import { InvalidParameterError } from './errors.js'
import { DEFAULT_EXTRACTOR_CONFIG, type ExtractorConfig } from './extractor.js'
import { DEFAULT_QUBITS } from './source.js'

export interface QrngConfig {
  qubits: number
  pOne: number
  seed: number | null
  extractor: ExtractorConfig
}

function parseNumber(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined
  const n = Number(raw)
  if (!Number.isFinite(n)) throw new InvalidParameterError(`${name} must be a number, got '${raw}'`)
  return n
}

export function loadConfig(env: Record<string, string | undefined> = process.env): QrngConfig {
  const qubits = parseNumber('QRNG_QUBITS', env.QRNG_QUBITS) ?? DEFAULT_QUBITS
  if (!Number.isInteger(qubits) || qubits < 1) {
    throw new InvalidParameterError(`QRNG_QUBITS must be a positive integer, got ${qubits}`)
  }
  const pOne = parseNumber('QRNG_BIAS', env.QRNG_BIAS) ?? 0.5
  if (pOne < 0 || pOne > 1) {
    throw new InvalidParameterError(`QRNG_BIAS must be within [0, 1], got ${pOne}`)
  }
  const seed = parseNumber('QRNG_SEED', env.QRNG_SEED) ?? null
  if (seed !== null && !Number.isInteger(seed)) {
    throw new InvalidParameterError(`QRNG_SEED must be an integer, got ${seed}`)
  }
  return {
    qubits,
    pOne,
    seed,
    // safety margin tracks the register width: four shots
    extractor: { ...DEFAULT_EXTRACTOR_CONFIG, safetyMargin: qubits * 4 },
  }
}
