import { ConfigError } from '../core/errors.js'
import { resolveTextEncoding, type TextEncodingName } from '../text/encoding.js'

export const DEFAULT_CHUNK_SIZE_MB = 100
export const DEFAULT_LINE_ENDING = '\n'

export const USAGE = `Usage: chunkline <input_file> <output_prefix> [chunk_size_mb] [line_ending] [encoding]

Options:
  chunk_size_mb  chunk threshold in MiB (default ${DEFAULT_CHUNK_SIZE_MB})
  line_ending    LF     - Unix style (\\n, default)
                 CRLF   - Windows style (\\r\\n)
                 CR     - classic Mac style (\\r)
                 custom - custom terminator, e.g. custom:\\r\\n\\r\\n
  encoding       UTF-8 (default), GBK, GB18030, UTF-16LE

Environment:
  CHUNKLINE_BLOCK_SIZE_MB        read block size in MiB (default 8)
  CHUNKLINE_COMPRESSION          gzip (default) or brotli
  CHUNKLINE_COMPRESSION_LEVEL    codec level (codec default when unset)`

/**
 * Positional arguments of the split command.
 */
export interface SplitArgs {
  inputPath: string
  outputPrefix: string
  chunkSizeMb: number
  lineEnding: string
  encoding: TextEncodingName
}

const CUSTOM_PREFIX = 'custom:'

/** Maps a `line_ending` argument to the terminator it names. */
export function parseLineEnding(value: string): string {
  switch (value.toUpperCase()) {
    case 'LF':
      return '\n'
    case 'CRLF':
      return '\r\n'
    case 'CR':
      return '\r'
  }

  if (value.toLowerCase().startsWith(CUSTOM_PREFIX)) {
    const custom = value.slice(CUSTOM_PREFIX.length).replaceAll('\\n', '\n').replaceAll('\\r', '\r')
    if (!custom) throw new ConfigError('custom line ending must not be empty')
    return custom
  }

  throw new ConfigError(`invalid line ending "${value}"; use LF, CRLF, CR or custom:<literal>`)
}

/** Parses a positive whole number of MiB. */
export function parseChunkSizeMb(value: string): number {
  const trimmed = value.trim()
  const parsed = /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`invalid chunk size "${value}"; expected a positive number of MiB`)
  }
  return parsed
}

export function parseEncoding(value: string): TextEncodingName {
  const encoding = resolveTextEncoding(value)
  if (!encoding) throw new ConfigError(`unsupported encoding "${value}"; supported: UTF-8, GBK, GB18030, UTF-16LE`)
  return encoding
}

/**
 * Parses `<input_file> <output_prefix> [chunk_size_mb] [line_ending] [encoding]`.
 * `argv` excludes the node binary and script path.
 */
export function parseSplitArgs(argv: readonly string[]): SplitArgs {
  const [inputPath, outputPrefix, chunkSize, lineEnding, encoding, ...extra] = argv
  if (!inputPath || !outputPrefix) throw new ConfigError('missing <input_file> or <output_prefix>')
  if (extra.length > 0) throw new ConfigError(`unexpected arguments: ${extra.join(' ')}`)

  return {
    inputPath,
    outputPrefix,
    chunkSizeMb: chunkSize === undefined ? DEFAULT_CHUNK_SIZE_MB : parseChunkSizeMb(chunkSize),
    lineEnding: lineEnding === undefined ? DEFAULT_LINE_ENDING : parseLineEnding(lineEnding),
    encoding: encoding === undefined ? 'utf-8' : parseEncoding(encoding)
  }
}

/** Renders a terminator with visible escapes for log output. */
export function escapeLineEnding(lineEnding: string): string {
  return lineEnding.replaceAll('\r', '\\r').replaceAll('\n', '\\n').replaceAll('\t', '\\t')
}
