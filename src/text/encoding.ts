import iconv from 'iconv-lite'

/** Encodings accepted on the command line, keyed by their canonical label. */
export const TEXT_ENCODINGS = ['utf-8', 'gbk', 'gb18030', 'utf-16le'] as const

export type TextEncodingName = (typeof TEXT_ENCODINGS)[number]

/** Substitution character emitted for byte sequences the encoding rejects. */
export const REPLACEMENT_CHARACTER = '\uFFFD'

export interface DecodeResult {
  text: string
  hadErrors: boolean
}

/**
 * Stateful decoder: bytes of a character split across two writes are held
 * back until the rest of the character arrives.
 */
export interface IncrementalDecoder {
  write(bytes: Buffer): string
  end(): string
}

/**
 * Decode/encode pair for one encoding.
 *
 * Byte order marks are kept as text so that decoded offsets map back onto
 * the original bytes.
 */
export interface TextCodec {
  readonly name: TextEncodingName
  decode(bytes: Buffer): DecodeResult
  encode(text: string): Buffer
  byteLength(text: string): number
  createDecoder(): IncrementalDecoder
}

const decodeOptions = { stripBOM: false }

function createCodec(name: TextEncodingName): TextCodec {
  return {
    name,
    decode(bytes) {
      const text = iconv.decode(bytes, name, decodeOptions)
      return { text, hadErrors: text.includes(REPLACEMENT_CHARACTER) }
    },
    encode(text) {
      return iconv.encode(text, name)
    },
    byteLength(text) {
      if (name === 'utf-8') return Buffer.byteLength(text, 'utf8')
      return iconv.encode(text, name).length
    },
    createDecoder() {
      const stream = iconv.getDecoder(name, decodeOptions)
      return {
        write: (bytes) => stream.write(bytes),
        end: () => stream.end() ?? ''
      }
    }
  }
}

const codecs = new Map<TextEncodingName, TextCodec>()

/** Returns the shared codec for an encoding. */
export function getTextCodec(name: TextEncodingName): TextCodec {
  const existing = codecs.get(name)
  if (existing) return existing
  const codec = createCodec(name)
  codecs.set(name, codec)
  return codec
}

/** Resolves a user-supplied label (`UTF-8`, `gbk`, `utf8`...) to a supported encoding. */
export function resolveTextEncoding(label: string): TextEncodingName | undefined {
  const normalized = label.trim().toLowerCase()
  if (normalized === 'utf8') return 'utf-8'
  if (normalized === 'utf16le') return 'utf-16le'
  return TEXT_ENCODINGS.find((name) => name === normalized)
}
