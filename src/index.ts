/**
 * qrng-core — randomness extraction and statistical validation
 *
 *   BitBuffer  -> Extractor (von Neumann, adaptive fixed length)
 *              -> score() / runTrials()
 *   avalanche() over any key and EncryptFn
 */
export * from './bits.js'
export * from './errors.js'
export * from './random.js'
export * from './source.js'
export { BitBuffer } from './buffer.js'
export * from './extractor.js'
export { erfc, igamc, lnGamma } from './special.js'
export * from './stats.js'
export * from './trials.js'
export * from './avalanche.js'
export * from './cipher.js'
export * from './keygen.js'
export * from './numbers.js'
export * from './noise.js'
export { loadConfig, type QrngConfig } from './config.js'
