import { describe, it, expect } from 'vitest'
import { seededRandom, cryptoRandom, randomInt } from '../random.js'
import { InvalidParameterError } from '../errors.js'

describe('seededRandom', () => {
  it('repeats its sequence for the same seed', () => {
    const a = seededRandom(123)
    const b = seededRandom(123)
    for (let i = 0; i < 20; i++) expect(a.next()).toBe(b.next())
  })

  it('stays within [0, 1)', () => {
    const r = seededRandom(0)
    for (let i = 0; i < 1000; i++) {
      const v = r.next()
      expect(v).toBeGreaterThanOrEqual(0)
      expect(v).toBeLessThan(1)
    }
  })
})

describe('cryptoRandom', () => {
  it('stays within [0, 1)', () => {
    const r = cryptoRandom()
    for (let i = 0; i < 100; i++) {
      const v = r.next()
      expect(v).toBeGreaterThanOrEqual(0)
      expect(v).toBeLessThan(1)
    }
  })
})

describe('randomInt', () => {
  it('covers [0, max)', () => {
    const r = seededRandom(9)
    const seen = new Set<number>()
    for (let i = 0; i < 500; i++) seen.add(randomInt(r, 10))
    expect([...seen].sort((x, y) => x - y)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9])
  })

  it('clamps a source that reaches 1', () => {
    expect(randomInt({ next: () => 1 }, 10)).toBe(9)
    expect(randomInt({ next: () => 0 }, 10)).toBe(0)
  })

  it('rejects a non-positive bound', () => {
    expect(() => randomInt(seededRandom(1), 0)).toThrow(InvalidParameterError)
    expect(() => randomInt(seededRandom(1), 2.5)).toThrow(InvalidParameterError)
  })
})
