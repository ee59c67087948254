import type { ChunkSink, ChunkState, Logger } from '../core/types.js'
import type { TextCodec } from '../text/encoding.js'
import { BoundaryScanner } from './boundary.js'

export interface ChunkAccumulatorOptions {
  /** Minimum uncompressed size a chunk reaches before it is cut. */
  threshold: number
  lineEnding: string
  codec: TextCodec
}

/**
 * Holds the chunk being built and decides where to cut it.
 *
 * A chunk is cut at the first line boundary at or past the threshold. A line
 * longer than the threshold keeps the chunk growing until the line ends.
 * Bytes after the last boundary stay in the chunk for the next block to
 * complete.
 */
export class ChunkAccumulator {
  private parts: Buffer[] = []
  private size = 0
  /** Absolute input offset of the first held byte. */
  private start = 0
  private current: ChunkState = 'empty'
  private finished = false
  private readonly scanner: BoundaryScanner

  constructor(
    private readonly options: ChunkAccumulatorOptions,
    private readonly sink: ChunkSink,
    private readonly logger: Logger
  ) {
    if (!Number.isInteger(options.threshold) || options.threshold <= 0) {
      throw new Error('threshold must be a positive integer')
    }
    this.scanner = new BoundaryScanner(options.lineEnding, options.codec, (offset) => {
      this.logger.warn('boundary.decode_error', { offset, encoding: options.codec.name })
    })
  }

  get state(): ChunkState {
    return this.current
  }

  /** Bytes held and not yet emitted. */
  get pendingBytes(): number {
    return this.size
  }

  /** Appends a freshly read block, emitting every chunk it completes. */
  async push(block: Buffer): Promise<void> {
    if (this.finished) throw new Error('accumulator already finished')
    if (block.length === 0) return

    this.parts.push(block)
    this.size += block.length
    this.current = 'accumulating'
    await this.cutAt(this.scanner.feed(block))
  }

  /** Emits whatever is held as the final chunk, regardless of size. */
  async finish(): Promise<void> {
    if (this.finished) return
    this.finished = true

    await this.cutAt(this.scanner.end())
    if (this.size === 0) return

    this.current = 'final'
    await this.sink(this.take(this.size))
    this.current = 'empty'
  }

  private async cutAt(boundaries: number[]): Promise<void> {
    for (const boundary of boundaries) {
      const length = boundary - this.start
      if (length < this.options.threshold) continue

      this.current = 'ready'
      await this.sink(this.take(length))
      this.current = this.size > 0 ? 'accumulating' : 'empty'
    }
  }

  /** Removes and returns the first `length` held bytes. */
  private take(length: number): Buffer {
    const taken: Buffer[] = []
    let remaining = length

    while (remaining > 0) {
      const head = this.parts.shift()
      if (!head) break
      if (head.length <= remaining) {
        taken.push(head)
        remaining -= head.length
      } else {
        taken.push(head.subarray(0, remaining))
        this.parts.unshift(head.subarray(remaining))
        remaining = 0
      }
    }

    this.size -= length
    this.start += length
    return Buffer.concat(taken, length)
  }
}
