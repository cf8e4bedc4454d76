#!/usr/bin/env node
/**
 * qrng — command-line front end
 *
 * Runs the extraction and analysis core against the simulated qubit register
 * (or a classical PRNG baseline) and prints the results. Persistence and
 * plotting are left to whatever consumes this output.
 *
 * Commands:
 *   bits <n>        n debiased bits
 *   raw <n>         n raw bits
 *   analyze <n>     raw vs debiased metrics and test results
 *   trials          repeated scoring (--trials, --length, --source)
 *   avalanche       AES-256-CBC key sensitivity (--message, --trials, --source)
 *   int32 | int64 | float | double
 */
import { loadConfig, type QrngConfig } from './config.js'
import { Extractor } from './extractor.js'
import { SimulatedQubitSource, generateClassicalBits } from './source.js'
import { type RandomSource, cryptoRandom, seededRandom } from './random.js'
import { METRICS, type ScoreCard } from './stats.js'
import { runTrials, type BitSourceFn } from './trials.js'
import { avalanche } from './avalanche.js'
import { encrypt, decrypt, ZERO_IV } from './cipher.js'
import { type GeneratedKey, generateQrngKey, generateClassicalKey } from './keygen.js'
import { randomInt32, randomInt64, randomFloat, randomDouble } from './numbers.js'
import { analyzeExtraction, type StreamReport } from './noise.js'
import { InvalidParameterError } from './errors.js'
import { bytesToHex } from '@noble/hashes/utils.js'
import { banner, fmt, fmtMeanCi, truncBits, timeIt } from './utils.js'
import { log } from './log.js'

const FIXED_SEED = 42

const USAGE = `qrng — randomness extraction and statistical validation

Usage: qrng <command> [args] [options]

Commands:
  bits <n>             n debiased bits
  raw <n>              n raw (undebiased) bits
  analyze <n>          raw vs debiased metrics and test results (default 10000)
  trials               repeated scoring of a bit source
  avalanche            AES-256-CBC avalanche over one-bit key flips
  int32 | int64 | float | double

Options:
  --qubits <n>         simulated register width (env QRNG_QUBITS, default 8)
  --bias <p>           probability of measuring 1 (env QRNG_BIAS, default 0.5)
  --seed <n>           deterministic run (env QRNG_SEED)
  --trials <n>         trial count (trials: 10, avalanche: 5)
  --length <n>         bits per trial (default 10000)
  --source <kind>      trials: qrng | raw | classical
                       avalanche: qrng | classical | fixed-seed
  --message <text>     plaintext for avalanche
  -h, --help           Show this help`

interface CliArgs {
  command: string | null
  positional: string[]
  opts: Record<string, string>
}

function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = []
  const opts: Record<string, string> = {}
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === '--') continue
    if (arg === '--help' || arg === '-h') {
      opts['help'] = 'true'
    } else if (arg.startsWith('--') && i + 1 < argv.length) {
      opts[arg.slice(2)] = argv[++i]
    } else {
      positional.push(arg)
    }
  }
  return { command: positional.shift() ?? null, positional, opts }
}

function intArg(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback
  const n = Number(raw)
  if (!Number.isInteger(n)) throw new InvalidParameterError(`${name} must be an integer, got '${raw}'`)
  return n
}

function resolveConfig(opts: Record<string, string>): QrngConfig {
  return loadConfig({
    ...process.env,
    ...(opts['qubits'] !== undefined ? { QRNG_QUBITS: opts['qubits'] } : {}),
    ...(opts['bias'] !== undefined ? { QRNG_BIAS: opts['bias'] } : {}),
    ...(opts['seed'] !== undefined ? { QRNG_SEED: opts['seed'] } : {}),
  })
}

function randomFor(config: QrngConfig, offset = 0): RandomSource {
  return config.seed === null ? cryptoRandom() : seededRandom(config.seed + offset)
}

function createExtractor(config: QrngConfig): Extractor {
  const source = new SimulatedQubitSource({ qubits: config.qubits, pOne: config.pOne, random: randomFor(config) })
  return new Extractor(source, config.extractor)
}

function printScoreCard(title: string, report: StreamReport): void {
  const m = report.metrics
  console.log(`--- ${title} ---`)
  console.log(`  length   ${m.length}   zeros ${m.zeros}   ones ${m.ones}`)
  console.log(`  bias     ${fmt(m.bias)}`)
  console.log(`  entropy  ${fmt(m.entropy)}`)
  printTests(report.tests)
}

function printTests(card: ScoreCard): void {
  for (const metric of METRICS) {
    const r = card[metric]
    console.log(
      `  ${metric.padEnd(20)}stat ${r.statistic.toFixed(6).padStart(14)}   p ${r.pValue.toFixed(6).padStart(10)}   ${r.verdict.toUpperCase()}`
    )
  }
}

async function cmdBits(config: QrngConfig, n: number, debias: boolean): Promise<void> {
  const extractor = createExtractor(config)
  const { result, ms } = await timeIt(() => (debias ? extractor.extractFixedLength(n) : extractor.rawBits(n)))
  console.log(result.bits)
  log.info({ component: 'cli', ...result.stats, ms: Math.round(ms) }, debias ? 'Debiased bits produced' : 'Raw bits produced')
}

async function cmdAnalyze(config: QrngConfig, n: number): Promise<void> {
  banner(`Noise & bias analysis (${n} bits, pOne=${config.pOne})`)
  const analysis = await analyzeExtraction(createExtractor(config), n)

  printScoreCard('BEFORE (raw)', analysis.before)
  console.log()
  printScoreCard('AFTER (debiased)', analysis.after)

  console.log('\n--- Length / efficiency ---')
  console.log(`  raw bits used       ${analysis.stats.rawBitsUsed}`)
  console.log(`  von Neumann yield   ${fmt(analysis.stats.efficiency, 4)}`)
  console.log(`\n  raw       ${truncBits(analysis.raw)}`)
  console.log(`  debiased  ${truncBits(analysis.extracted)}`)
}

function trialSource(config: QrngConfig, kind: string): BitSourceFn {
  switch (kind) {
    case 'qrng': {
      const extractor = createExtractor(config)
      return async (n) => (await extractor.extractFixedLength(n)).bits
    }
    case 'raw': {
      const extractor = createExtractor(config)
      return async (n) => (await extractor.rawBits(n)).bits
    }
    case 'classical': {
      const random = randomFor(config, 1)
      return (n) => generateClassicalBits(n, random)
    }
    default:
      throw new InvalidParameterError(`Unknown trial source '${kind}' (expected qrng, raw or classical)`)
  }
}

async function cmdTrials(config: QrngConfig, opts: Record<string, string>): Promise<void> {
  const trials = intArg('--trials', opts['trials'], 10)
  const length = intArg('--length', opts['length'], 10_000)
  const kind = opts['source'] ?? 'qrng'

  banner(`Trials: ${trials} × ${length} bits (${kind})`)
  const report = await runTrials(trialSource(config, kind), trials, length)

  console.log('Metric'.padEnd(22) + 'Mean ± 95% CI'.padEnd(28) + 'Passed')
  console.log('-'.repeat(60))
  for (const metric of METRICS) {
    const s = report.perMetric[metric]
    console.log(metric.padEnd(22) + fmtMeanCi(s.mean, s.confidenceInterval95).padEnd(28) + `${s.passCount}/${s.totalTrials}`)
  }
}

async function keyFor(config: QrngConfig, kind: string): Promise<GeneratedKey> {
  switch (kind) {
    case 'qrng':
      return generateQrngKey(createExtractor(config))
    case 'classical':
      return generateClassicalKey(randomFor(config, 2), 'classical_random')
    case 'fixed-seed':
      return generateClassicalKey(seededRandom(FIXED_SEED), 'classical_fixed_seed')
    default:
      throw new InvalidParameterError(`Unknown key source '${kind}' (expected qrng, classical or fixed-seed)`)
  }
}

async function cmdAvalanche(config: QrngConfig, opts: Record<string, string>): Promise<void> {
  const message = opts['message'] ?? 'Quantum-secured communication channel'
  if (!message) throw new InvalidParameterError('--message must not be empty')
  const trials = intArg('--trials', opts['trials'], 5)
  const generated = await keyFor(config, opts['source'] ?? 'qrng')

  banner(`AES-256-CBC avalanche (${generated.kind})`)
  console.log(`Key entropy: ${generated.keyEntropy.toFixed(6)} bits`)

  const plaintext = new TextEncoder().encode(message)
  const ciphertext = encrypt(generated.key, ZERO_IV, plaintext)
  const roundTrip = new TextDecoder().decode(decrypt(generated.key, ZERO_IV, ciphertext))
  console.log(`Ciphertext:  ${bytesToHex(ciphertext)}`)
  console.log(`Decrypted:   ${roundTrip}\n`)

  const summary = avalanche({
    key: generated.key,
    plaintext,
    iv: ZERO_IV,
    encrypt,
    trials,
    random: randomFor(config, 3),
  })
  summary.samples.forEach((s, i) => {
    console.log(`Trial ${i + 1}: flipped bit ${String(s.bitIndexFlipped).padStart(3)}  → ${s.percentChanged.toFixed(2)} %`)
  })
  console.log(`\nAvalanche mean ± std = ${summary.mean.toFixed(2)} % ± ${summary.populationStdDev.toFixed(2)} %`)
}

async function cmdNumber(config: QrngConfig, kind: string): Promise<void> {
  const extractor = createExtractor(config)
  switch (kind) {
    case 'int32':
      console.log(await randomInt32(extractor))
      break
    case 'int64':
      console.log((await randomInt64(extractor)).toString())
      break
    case 'float':
      console.log(await randomFloat(extractor))
      break
    case 'double':
      console.log(await randomDouble(extractor))
      break
  }
}

async function main(): Promise<void> {
  const { command, positional, opts } = parseArgs(process.argv.slice(2))
  if (!command || opts['help']) {
    console.log(USAGE)
    return
  }
  const config = resolveConfig(opts)

  switch (command) {
    case 'bits':
    case 'raw':
      await cmdBits(config, intArg('n', positional[0], 256), command === 'bits')
      break
    case 'analyze':
      await cmdAnalyze(config, intArg('n', positional[0], 10_000))
      break
    case 'trials':
      await cmdTrials(config, opts)
      break
    case 'avalanche':
      await cmdAvalanche(config, opts)
      break
    case 'int32':
    case 'int64':
    case 'float':
    case 'double':
      await cmdNumber(config, command)
      break
    default:
      console.error(`Unknown command '${command}'\n`)
      console.log(USAGE)
      process.exitCode = 1
  }
}

main().catch((err) => {
  log.fatal({ component: 'cli', err }, 'qrng failed')
  process.exit(1)
})
