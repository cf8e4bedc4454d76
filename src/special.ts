/**
 * Special functions for p-values
 *
 * igamc is the regularized upper incomplete gamma Q(a, x), evaluated by its
 * series for x < a + 1 and by a Lentz continued fraction otherwise.
 * erfc(x) = Q(1/2, x^2) for x >= 0.
 */
import { InvalidParameterError } from './errors.js'

const EPS = 1e-15
const FPMIN = 1e-300
const MAX_ITER = 10_000

// Lanczos approximation, g = 7, n = 9
const LANCZOS = [
  0.99999999999980993, 676.5203681218851, -1259.1392167224028, 771.32342877765313,
  -176.61502916214059, 12.507343278686905, -0.13857109526572012, 9.9843695780195716e-6,
  1.5056327351493116e-7,
]

export function lnGamma(z: number): number {
  if (z < 0.5) {
    // reflection
    return Math.log(Math.PI / Math.abs(Math.sin(Math.PI * z))) - lnGamma(1 - z)
  }
  const zz = z - 1
  let x = LANCZOS[0]
  for (let i = 1; i < LANCZOS.length; i++) x += LANCZOS[i] / (zz + i)
  const t = zz + 7.5
  return 0.5 * Math.log(2 * Math.PI) + (zz + 0.5) * Math.log(t) - t + Math.log(x)
}

function lowerSeries(a: number, x: number): number {
  let ap = a
  let del = 1 / a
  let sum = del
  for (let i = 0; i < MAX_ITER; i++) {
    ap += 1
    del *= x / ap
    sum += del
    if (Math.abs(del) < Math.abs(sum) * EPS) break
  }
  return sum * Math.exp(-x + a * Math.log(x) - lnGamma(a))
}

function upperContinuedFraction(a: number, x: number): number {
  let b = x + 1 - a
  let c = 1 / FPMIN
  let d = 1 / b
  let h = d
  for (let i = 1; i <= MAX_ITER; i++) {
    const an = -i * (i - a)
    b += 2
    d = an * d + b
    if (Math.abs(d) < FPMIN) d = FPMIN
    c = b + an / c
    if (Math.abs(c) < FPMIN) c = FPMIN
    d = 1 / d
    const del = d * c
    h *= del
    if (Math.abs(del - 1) < EPS) break
  }
  return Math.exp(-x + a * Math.log(x) - lnGamma(a)) * h
}

/** Regularized upper incomplete gamma Q(a, x) */
export function igamc(a: number, x: number): number {
  if (!(a > 0)) throw new InvalidParameterError(`igamc: a must be > 0, got ${a}`)
  if (x <= 0) return 1
  if (x < a + 1) return Math.max(0, 1 - lowerSeries(a, x))
  return upperContinuedFraction(a, x)
}

/** Complementary error function */
export function erfc(x: number): number {
  if (x === 0) return 1
  const q = igamc(0.5, x * x)
  return x > 0 ? q : 2 - q
}
