import type { Bitstring } from './bits.js'

export function banner(title: string): void {
  const line = '='.repeat(60)
  console.log(`\n${line}`)
  console.log(`  ${title}`)
  console.log(`${line}\n`)
}

/** First `len` bits, with an ellipsis when truncated */
export function truncBits(bits: Bitstring, len = 64): string {
  return bits.length > len ? bits.slice(0, len) + '...' : bits
}

/** Fixed-precision number, or '-' for a missing value */
export function fmt(value: number | null, digits = 6): string {
  return value === null ? '-' : value.toFixed(digits)
}

export function fmtMeanCi(mean: number | null, ci: number | null, digits = 6): string {
  if (mean === null || ci === null) return '-'
  return `${mean.toFixed(digits)} ± ${ci.toFixed(digits)}`
}

export async function timeIt<T>(fn: () => Promise<T>): Promise<{ result: T; ms: number }> {
  const start = performance.now()
  const result = await fn()
  const ms = performance.now() - start
  return { result, ms }
}
