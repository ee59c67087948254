import type { Transform } from 'node:stream'
import { promisify } from 'node:util'
import {
  brotliCompress,
  brotliDecompress,
  constants,
  createBrotliCompress,
  createGzip,
  gunzip,
  gzip
} from 'node:zlib'

export const COMPRESSION_CODECS = ['gzip', 'brotli'] as const

export type CompressionName = (typeof COMPRESSION_CODECS)[number]

/**
 * Whole-buffer compressor plus a streaming variant for whole-file packing.
 */
export interface CompressionCodec {
  readonly name: CompressionName
  /** File extension without the leading dot. */
  readonly extension: string
  readonly defaultLevel: number
  readonly maxLevel: number
  compress(bytes: Buffer, level: number): Promise<Buffer>
  decompress(bytes: Buffer): Promise<Buffer>
  createCompressStream(level: number): Transform
}

const gzipAsync = promisify(gzip)
const gunzipAsync = promisify(gunzip)
const brotliCompressAsync = promisify(brotliCompress)
const brotliDecompressAsync = promisify(brotliDecompress)

function brotliParams(level: number, sizeHint?: number): Record<number, number> {
  const params: Record<number, number> = {
    [constants.BROTLI_PARAM_MODE]: constants.BROTLI_MODE_TEXT,
    [constants.BROTLI_PARAM_QUALITY]: level
  }
  if (sizeHint !== undefined) params[constants.BROTLI_PARAM_SIZE_HINT] = sizeHint
  return params
}

const gzipCodec: CompressionCodec = {
  name: 'gzip',
  extension: 'gz',
  defaultLevel: 6,
  maxLevel: 9,
  compress: (bytes, level) => gzipAsync(bytes, { level }),
  decompress: (bytes) => gunzipAsync(bytes),
  createCompressStream: (level) => createGzip({ level })
}

const brotliCodec: CompressionCodec = {
  name: 'brotli',
  extension: 'br',
  defaultLevel: 5,
  maxLevel: 11,
  compress: (bytes, level) => brotliCompressAsync(bytes, { params: brotliParams(level, bytes.length) }),
  decompress: (bytes) => brotliDecompressAsync(bytes),
  createCompressStream: (level) => createBrotliCompress({ params: brotliParams(level) })
}

/** Looks up the codec registered under `name`. */
export function getCompressionCodec(name: CompressionName): CompressionCodec {
  return name === 'brotli' ? brotliCodec : gzipCodec
}
