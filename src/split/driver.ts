import { open } from 'node:fs/promises'

import { getCompressionCodec } from '../compress/codec.js'
import type { SplitConfig } from '../config/schema.js'
import type { Logger, SplitReport } from '../core/types.js'
import { getTextCodec } from '../text/encoding.js'
import { ChunkAccumulator } from './accumulator.js'
import { ChunkEmitter } from './emitter.js'

const MiB = 1024 * 1024

/**
 * Reads `path` in blocks of at most `blockSize` bytes.
 *
 * Every block is a fresh buffer, since the accumulator keeps references to
 * the blocks it holds.
 */
export async function* readBlocks(path: string, blockSize: number): AsyncGenerator<Buffer> {
  const handle = await open(path, 'r')
  try {
    for (;;) {
      const buffer = Buffer.allocUnsafe(blockSize)
      const { bytesRead } = await handle.read(buffer, 0, blockSize, null)
      if (bytesRead === 0) return
      yield buffer.subarray(0, bytesRead)
    }
  } finally {
    await handle.close()
  }
}

/**
 * Feeds every block of `source` to the accumulator, then flushes the final
 * chunk. Returns the number of bytes consumed.
 */
export async function runSplit(source: AsyncIterable<Buffer>, accumulator: ChunkAccumulator): Promise<number> {
  let total = 0
  for await (const block of source) {
    total += block.length
    await accumulator.push(block)
  }
  await accumulator.finish()
  return total
}

export interface SplitDependencies {
  logger: Logger
  now?: () => number
  source?: AsyncIterable<Buffer>
}

/** Splits the configured input file into numbered, compressed chunk files. */
export async function splitFile(config: SplitConfig, deps: SplitDependencies): Promise<SplitReport> {
  const now = deps.now ?? Date.now
  const startedAt = now()

  const compression = getCompressionCodec(config.compression.codec)
  const emitter = new ChunkEmitter(
    {
      outputPrefix: config.outputPrefix,
      codec: compression,
      level: config.compression.level ?? compression.defaultLevel
    },
    deps.logger
  )

  const files: string[] = []
  let compressedBytes = 0
  const accumulator = new ChunkAccumulator(
    {
      threshold: config.chunkSize,
      lineEnding: config.lineEnding,
      codec: getTextCodec(config.encoding)
    },
    async (chunk) => {
      const written = await emitter.emit(chunk, files.length + 1)
      files.push(written.path)
      compressedBytes += written.compressedBytes
    },
    deps.logger
  )

  const totalBytes = await runSplit(deps.source ?? readBlocks(config.inputPath, config.blockSize), accumulator)
  const durationMs = now() - startedAt
  const seconds = durationMs / 1000
  const totalMiB = totalBytes / MiB

  deps.logger.info('split.summary', {
    chunks: files.length,
    totalMiB: Number(totalMiB.toFixed(2)),
    compressedBytes,
    seconds: Number(seconds.toFixed(2)),
    mibPerSecond: seconds > 0 ? Number((totalMiB / seconds).toFixed(2)) : null
  })

  return { chunks: files.length, totalBytes, compressedBytes, durationMs, files }
}
