import { describe, it, expect } from 'vitest'
import {
  Extractor,
  vonNeumann,
  rawBitsNeeded,
  updateYieldEstimate,
  validateExtractorConfig,
  DEFAULT_EXTRACTOR_CONFIG,
  type ExtractionState,
} from '../extractor.js'
import { BitBuffer } from '../buffer.js'
import { SimulatedQubitSource } from '../source.js'
import { seededRandom } from '../random.js'
import { bitMetrics } from '../bits.js'
import { ExtractionStalledError, InvalidParameterError, SourceUnavailableError } from '../errors.js'
import { cyclingSource, scriptedSource } from './fixtures.js'

describe('vonNeumann', () => {
  it('maps 01 -> 0 and 10 -> 1, dropping 00 and 11', () => {
    expect(vonNeumann('01')).toBe('0')
    expect(vonNeumann('10')).toBe('1')
    expect(vonNeumann('00')).toBe('')
    expect(vonNeumann('11')).toBe('')
    expect(vonNeumann('0110001101')).toBe('010')
  })

  it('ignores a trailing odd bit', () => {
    expect(vonNeumann('101')).toBe('1')
    expect(vonNeumann('1')).toBe('')
    expect(vonNeumann('')).toBe('')
  })

  it('can be applied to its own output', async () => {
    const source = new SimulatedQubitSource({ pOne: 0.7, random: seededRandom(7) })
    const raw = await source.produceRawBits(2000)
    const once = vonNeumann(raw)
    const twice = vonNeumann(once)
    expect(once.length).toBeLessThanOrEqual(raw.length / 2)
    expect(twice.length).toBeLessThanOrEqual(Math.floor(once.length / 2))
  })
})

describe('adaptive controller', () => {
  const start: ExtractionState = { rawBitsConsumed: 0, currentYieldEstimate: 0.3, extractedLength: 0, iterations: 0 }

  it('sizes requests from the remaining output, estimate and margin', () => {
    expect(rawBitsNeeded(10, 0.3, DEFAULT_EXTRACTOR_CONFIG)).toBe(66)
    expect(rawBitsNeeded(100, 0.25, { ...DEFAULT_EXTRACTOR_CONFIG, safetyMargin: 0 })).toBe(400)
  })

  it('clamps a degenerate estimate to the floor', () => {
    expect(rawBitsNeeded(10, 0, DEFAULT_EXTRACTOR_CONFIG)).toBe(1032)
  })

  it('blends the prior estimate with the observed yield', () => {
    const next = updateYieldEstimate(start, 100, 20, DEFAULT_EXTRACTOR_CONFIG)
    expect(next.currentYieldEstimate).toBeCloseTo(0.27, 12)
    expect(next).toMatchObject({ rawBitsConsumed: 100, extractedLength: 20, iterations: 1 })
  })

  it('floors a zero observed yield', () => {
    const next = updateYieldEstimate(start, 100, 0, DEFAULT_EXTRACTOR_CONFIG)
    expect(next.currentYieldEstimate).toBeCloseTo(0.7 * 0.3 + 0.3 * 0.01, 12)
  })

  it('leaves the estimate alone when no raw bits were seen', () => {
    const next = updateYieldEstimate(start, 0, 0, DEFAULT_EXTRACTOR_CONFIG)
    expect(next.currentYieldEstimate).toBe(0.3)
    expect(next.iterations).toBe(1)
  })

  it('does not mutate the incoming state', () => {
    updateYieldEstimate(start, 100, 20, DEFAULT_EXTRACTOR_CONFIG)
    expect(start).toEqual({ rawBitsConsumed: 0, currentYieldEstimate: 0.3, extractedLength: 0, iterations: 0 })
  })

  it('validates configuration', () => {
    expect(() => validateExtractorConfig({ ...DEFAULT_EXTRACTOR_CONFIG, smoothing: 1 })).toThrow(InvalidParameterError)
    expect(() => validateExtractorConfig({ ...DEFAULT_EXTRACTOR_CONFIG, minEfficiency: 0 })).toThrow(InvalidParameterError)
    expect(() => validateExtractorConfig({ ...DEFAULT_EXTRACTOR_CONFIG, initialEfficiency: 0.001 })).toThrow(InvalidParameterError)
    expect(() => validateExtractorConfig({ ...DEFAULT_EXTRACTOR_CONFIG, maxIterations: 0 })).toThrow(InvalidParameterError)
    expect(() => new Extractor(cyclingSource('01'), { safetyMargin: -1 })).toThrow(InvalidParameterError)
  })
})

describe('Extractor.extractFixedLength', () => {
  it('returns exactly n bits for a range of n', async () => {
    const extractor = new Extractor(new SimulatedQubitSource({ pOne: 0.8, random: seededRandom(11) }))
    for (const n of [1, 7, 32, 100, 1000, 4097]) {
      const { bits, stats } = await extractor.extractFixedLength(n)
      expect(bits.length).toBe(n)
      expect(stats.finalBits).toBe(n)
      expect(stats.rawBitsUsed).toBeGreaterThanOrEqual(2 * n)
    }
  })

  it('returns the empty string for n = 0 without consulting the source', async () => {
    const source = cyclingSource('01')
    const result = await new Extractor(source).extractFixedLength(0)
    expect(result).toEqual({ bits: '', stats: { rawBitsUsed: 0, finalBits: 0, efficiency: null } })
    expect(source.calls).toEqual([])
  })

  it('adapts request sizes to the observed yield', async () => {
    // pairs alternate 01, 00: yield 1/4 of raw bits
    const source = cyclingSource('0100')
    const extractor = new Extractor(source, { safetyMargin: 0 })
    const { bits, stats } = await extractor.extractFixedLength(100)

    expect(source.calls).toEqual([334, 57, 8])
    expect(bits).toBe('0'.repeat(98) + '11')
    expect(stats.rawBitsUsed).toBe(399)
    expect(stats.efficiency).toBeCloseTo(100 / 399, 12)
  })

  it('debiases a biased source', async () => {
    const extractor = new Extractor(new SimulatedQubitSource({ pOne: 0.8, random: seededRandom(3) }))
    const raw = (await extractor.rawBits(4000)).bits
    const { bits } = await extractor.extractFixedLength(4000)
    expect(bitMetrics(raw).bias).toBeGreaterThan(0.25)
    expect(bitMetrics(bits).bias).toBeLessThan(0.05)
  })

  it('shares the buffer between calls without dropping surplus bits', async () => {
    const buffer = new BitBuffer(cyclingSource('0110'))
    const extractor = new Extractor(buffer)
    await extractor.extractFixedLength(10)
    await extractor.extractFixedLength(10)
    expect(buffer.totalReceived).toBe(buffer.totalDelivered + buffer.buffered)
  })

  it('throws ExtractionStalledError when the source never yields output', async () => {
    const extractor = new Extractor(cyclingSource('0'), { maxIterations: 5 })
    const err = await extractor.extractFixedLength(16).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ExtractionStalledError)
    expect(err).toMatchObject({ code: 'EXTRACTION_STALLED', iterations: 5, extractedLength: 0 })
  })

  it('fails as a unit when the source fails mid-extraction', async () => {
    const extractor = new Extractor(scriptedSource(['0110']))
    const err = await extractor.extractFixedLength(4).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(SourceUnavailableError)
    expect(err).toMatchObject({ message: 'Raw bit source failed: script exhausted' })
  })

  it('rejects invalid lengths before any work', async () => {
    const source = cyclingSource('01')
    const extractor = new Extractor(source)
    await expect(extractor.extractFixedLength(-3)).rejects.toThrow(InvalidParameterError)
    await expect(extractor.extractFixedLength(1.5)).rejects.toThrow(InvalidParameterError)
    expect(source.calls).toEqual([])
  })
})

describe('Extractor.extractVariableLength', () => {
  it('returns raw input, debiased output and observed efficiency', async () => {
    const result = await new Extractor(cyclingSource('0110')).extractVariableLength(10)
    expect(result).toEqual({ raw: '0110011001', extracted: '01010', efficiency: 0.5 })
  })

  it('reports zero efficiency for zero raw bits', async () => {
    const result = await new Extractor(cyclingSource('0110')).extractVariableLength(0)
    expect(result).toEqual({ raw: '', extracted: '', efficiency: 0 })
  })
})

describe('Extractor.rawBits', () => {
  it('passes raw bits through with efficiency 1', async () => {
    const result = await new Extractor(cyclingSource('110')).rawBits(7)
    expect(result).toEqual({ bits: '1101101', stats: { rawBitsUsed: 7, finalBits: 7, efficiency: 1 } })
  })
})
