import { writeFile } from 'node:fs/promises'

import type { CompressionCodec } from '../compress/codec.js'
import { ChunkWriteError, CodecError } from '../core/errors.js'
import type { EmittedChunk, Logger } from '../core/types.js'

export interface ChunkEmitterOptions {
  outputPrefix: string
  codec: CompressionCodec
  level: number
}

const INDEX_WIDTH = 3

/** Builds `<prefix>.<NNN>.<ext>` for a chunk index; indices past 999 widen the field. */
export function chunkPath(outputPrefix: string, index: number, extension: string): string {
  return `${outputPrefix}.${String(index).padStart(INDEX_WIDTH, '0')}.${extension}`
}

/**
 * Compresses finished chunks and writes each one to its numbered file.
 *
 * Failures are not retried and files from earlier chunks are left in place.
 */
export class ChunkEmitter {
  constructor(
    private readonly options: ChunkEmitterOptions,
    private readonly logger: Logger
  ) {}

  async emit(chunk: Buffer, index: number): Promise<EmittedChunk> {
    if (!Number.isInteger(index) || index < 1) throw new Error(`invalid chunk index: ${index}`)

    const { codec, level, outputPrefix } = this.options
    let compressed: Buffer
    try {
      compressed = await codec.compress(chunk, level)
    } catch (error) {
      throw new CodecError(`${codec.name} compression failed for chunk ${index}`, index, { cause: error })
    }

    const path = chunkPath(outputPrefix, index, codec.extension)
    try {
      await writeFile(path, compressed)
    } catch (error) {
      throw new ChunkWriteError(path, { cause: error })
    }

    this.logger.info('chunk.written', {
      index,
      path,
      rawBytes: chunk.length,
      compressedBytes: compressed.length
    })
    return { index, path, rawBytes: chunk.length, compressedBytes: compressed.length }
  }
}
