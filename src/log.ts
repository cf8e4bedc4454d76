/**
 * Structured logger for qrng — powered by pino
 *
 * Usage:
 *   import { log } from './log.js'
 *   log.info({ component: 'extractor', rawBitsUsed: 3400 }, 'Extraction complete')
 *
 * Pipe to pino-pretty for human-readable dev output:
 *   npx tsx src/qrng.ts bits 256 | npx pino-pretty
 */
import pino from 'pino'

const transport = process.stdout.isTTY
  ? pino.transport({ target: 'pino-pretty', options: { colorize: true } })
  : undefined

export const log = pino(
  { name: 'qrng', level: process.env.LOG_LEVEL || 'info' },
  transport,
)
