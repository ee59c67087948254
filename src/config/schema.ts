import { z } from 'zod'

import { COMPRESSION_CODECS, getCompressionCodec } from '../compress/codec.js'
import { TEXT_ENCODINGS } from '../text/encoding.js'

export const MiB = 1024 * 1024

export const compressionSchema = z
  .object({
    codec: z.enum(COMPRESSION_CODECS).default('gzip'),
    // Falls back to the codec's default level when omitted.
    level: z.number().int().min(0).optional()
  })
  .superRefine((value, ctx) => {
    if (value.level === undefined) return
    const { maxLevel } = getCompressionCodec(value.codec)
    if (value.level > maxLevel) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['level'],
        message: `${value.codec} level must be between 0 and ${maxLevel}`
      })
    }
  })

/**
 * Runtime configuration schema for a split run.
 */
export const splitConfigSchema = z.object({
  inputPath: z.string().min(1),
  outputPrefix: z.string().min(1),
  /** Chunk threshold in bytes. */
  chunkSize: z.number().int().positive(),
  lineEnding: z.string().min(1, 'line ending must not be empty'),
  encoding: z.enum(TEXT_ENCODINGS).default('utf-8'),
  /** Read block size in bytes. */
  blockSize: z.number().int().positive().default(8 * MiB),
  compression: compressionSchema.default({ codec: 'gzip' })
})

export type SplitConfig = z.infer<typeof splitConfigSchema>
export type CompressionConfig = z.infer<typeof compressionSchema>
