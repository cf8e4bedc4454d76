/**
 * FIFO accumulator of raw bits
 *
 * Satisfies arbitrary-length requests by pulling from the source on demand and
 * keeping the surplus for the next request. Every bit received from the source
 * is delivered exactly once, in order.
 *
 * Not safe for concurrent callers: interleaved requests would race on the
 * queue. Give each concurrent consumer its own buffer.
 */
import { type Bitstring, isBitstring } from './bits.js'
import { SourceUnavailableError, requireInteger } from './errors.js'
import type { RawBitSource } from './source.js'
import { log } from './log.js'

export class BitBuffer {
  private queue: Bitstring = ''
  totalReceived = 0
  totalDelivered = 0

  constructor(readonly source: RawBitSource) {}

  get buffered(): number {
    return this.queue.length
  }

  async request(n: number, signal?: AbortSignal): Promise<Bitstring> {
    requireInteger('n', n, 0)
    if (n === 0) return ''

    while (this.queue.length < n) {
      signal?.throwIfAborted()
      const deficit = n - this.queue.length
      const chunk = await this.pull(deficit, signal)
      this.queue += chunk
      this.totalReceived += chunk.length
      log.debug({ component: 'buffer', requested: deficit, received: chunk.length, buffered: this.queue.length }, 'Pulled raw bits')
    }

    const out = this.queue.slice(0, n)
    this.queue = this.queue.slice(n)
    this.totalDelivered += n
    return out
  }

  private async pull(count: number, signal?: AbortSignal): Promise<Bitstring> {
    let chunk: Bitstring
    try {
      chunk = await this.source.produceRawBits(count, signal)
    } catch (err) {
      if (err instanceof SourceUnavailableError) throw err
      if (signal?.aborted && err === signal.reason) throw err
      throw new SourceUnavailableError(`Raw bit source failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err })
    }
    if (chunk.length === 0) {
      throw new SourceUnavailableError(`Raw bit source returned no bits (asked for ${count})`)
    }
    if (!isBitstring(chunk)) {
      throw new SourceUnavailableError('Raw bit source returned symbols other than 0 and 1')
    }
    return chunk
  }
}
