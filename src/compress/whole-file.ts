import { createReadStream, createWriteStream } from 'node:fs'
import { stat } from 'node:fs/promises'
import { pipeline } from 'node:stream/promises'

import type { Logger } from '../core/types.js'
import type { CompressionCodec } from './codec.js'

export interface PackResult {
  outputPath: string
  rawBytes: number
  compressedBytes: number
}

/**
 * Compresses a whole file to `<inputPath>.<ext>` without chunking.
 */
export async function packFile(
  inputPath: string,
  codec: CompressionCodec,
  level: number,
  logger: Logger
): Promise<PackResult> {
  const outputPath = `${inputPath}.${codec.extension}`
  await pipeline(createReadStream(inputPath), codec.createCompressStream(level), createWriteStream(outputPath))

  const [input, output] = await Promise.all([stat(inputPath), stat(outputPath)])
  logger.info('pack.written', { path: outputPath, rawBytes: input.size, compressedBytes: output.size })
  return { outputPath, rawBytes: input.size, compressedBytes: output.size }
}
