import { REPLACEMENT_CHARACTER, type IncrementalDecoder, type TextCodec } from '../text/encoding.js'

/** Called with the byte offset of a block that did not decode cleanly. */
export type DecodeErrorHandler = (offset: number) => void

export interface LocateOptions {
  /**
   * When false, a match at the very end of the text that a longer
   * overlapping match could still replace is left unreported.
   */
  final?: boolean
  onDecodeError?: DecodeErrorHandler
}

interface TerminatorScan {
  /** Character offsets just past each accepted match. */
  ends: number[]
  /** Where the next search over the same text should start. */
  resume: number
}

/**
 * Finds line endings in `text` from `from` on. Where two matches overlap
 * (`\n\n` in `\n\n\n`) the later one wins, so a run of terminator characters
 * ends at its last character.
 */
function findTerminators(text: string, lineEnding: string, from: number, final: boolean): TerminatorScan {
  const ends: number[] = []
  let at = text.indexOf(lineEnding, from)

  while (at !== -1) {
    const next = text.indexOf(lineEnding, at + 1)
    if (next !== -1 && next < at + lineEnding.length) {
      at = next
      continue
    }
    if (next === -1 && !final && text.length < at + 2 * lineEnding.length - 1) {
      return { ends, resume: at }
    }
    ends.push(at + lineEnding.length)
    at = next
  }

  const last = ends[ends.length - 1] ?? from
  return { ends, resume: Math.max(last, text.length - lineEnding.length + 1) }
}

const MAX_CHARACTER_BYTES = 4

/**
 * Decodes `bytes` one character at a time and records, for every UTF-16 code
 * unit of the result, the byte offset its character ends at. A byte that
 * starts no valid character becomes a single U+FFFD.
 */
function decodeCharacters(bytes: Buffer, codec: TextCodec): { text: string; ends: number[] } {
  let text = ''
  const ends: number[] = []
  let offset = 0

  while (offset < bytes.length) {
    let length = 1
    let character = REPLACEMENT_CHARACTER
    const limit = Math.min(MAX_CHARACTER_BYTES, bytes.length - offset)
    for (let size = 1; size <= limit; size += 1) {
      const unit = bytes.subarray(offset, offset + size)
      const decoded = codec.decode(unit).text
      if (decoded.length > 0 && codec.encode(decoded).equals(unit)) {
        length = size
        character = decoded
        break
      }
    }

    offset += length
    text += character
    for (let i = 0; i < character.length; i += 1) ends.push(offset)
  }

  return { text, ends }
}

/**
 * Returns the byte offset just past every `lineEnding` in `bytes`, in order.
 *
 * The search runs on decoded text, so a double-byte character whose trail
 * byte equals an ASCII terminator is never mistaken for a line end. Clean
 * input is measured by re-encoding the text between matches; input with
 * invalid sequences is walked character by character so offsets stay on
 * the original bytes.
 */
export function locateBoundaries(
  bytes: Buffer,
  lineEnding: string,
  codec: TextCodec,
  options: LocateOptions = {}
): number[] {
  if (bytes.length === 0 || lineEnding.length === 0) return []
  const final = options.final ?? true

  const { text, hadErrors } = codec.decode(bytes)
  if (!hadErrors) {
    const boundaries: number[] = []
    let offset = 0
    let consumed = 0
    for (const end of findTerminators(text, lineEnding, 0, final).ends) {
      offset += codec.byteLength(text.slice(consumed, end))
      boundaries.push(offset)
      consumed = end
    }
    return boundaries
  }

  options.onDecodeError?.(0)
  const decoded = decodeCharacters(bytes, codec)
  return findTerminators(decoded.text, lineEnding, 0, final).ends.map((end) => decoded.ends[end - 1] ?? 0)
}

/**
 * Returns the byte offset just past the last `lineEnding` in `bytes`,
 * or `undefined` when the span holds none.
 */
export function locateLastBoundary(
  bytes: Buffer,
  lineEnding: string,
  codec: TextCodec,
  onDecodeError?: DecodeErrorHandler
): number | undefined {
  const boundaries = locateBoundaries(bytes, lineEnding, codec, { onDecodeError })
  return boundaries[boundaries.length - 1]
}

/**
 * Incremental boundary search over a byte stream.
 *
 * Only the partial line after the most recent boundary is retained, and a
 * cursor marks how far into it the search has already gone, so each
 * character is searched once (plus `lineEnding.length - 1` characters of
 * overlap for terminators split across blocks).
 *
 * Once a block fails to decode, re-encoding no longer gives true byte
 * lengths. The held bytes are then passed to `locateBoundaries` and the
 * decoder restarts at the last boundary found.
 */
export class BoundaryScanner {
  private decoder: IncrementalDecoder
  private partial = ''
  /** Absolute byte offset where `partial` begins. */
  private partialStart = 0
  private cursor = 0
  private bytesFed = 0
  /** Raw bytes from `partialStart` on. */
  private held: Buffer[] = []
  private heldLength = 0
  private dirty = false

  constructor(
    private readonly lineEnding: string,
    private readonly codec: TextCodec,
    private readonly onDecodeError?: DecodeErrorHandler
  ) {
    if (lineEnding.length === 0) throw new Error('lineEnding must not be empty')
    this.decoder = codec.createDecoder()
  }

  /** Feeds the next block; returns absolute offsets of the boundaries it completed. */
  feed(bytes: Buffer): number[] {
    if (bytes.length === 0) return []
    const offset = this.bytesFed
    this.bytesFed += bytes.length
    this.held.push(bytes)
    this.heldLength += bytes.length
    return this.scan(this.decoder.write(bytes), offset, false)
  }

  /** Flushes characters the decoder was still holding back. */
  end(): number[] {
    return this.scan(this.decoder.end(), this.bytesFed, true)
  }

  private scan(text: string, offset: number, final: boolean): number[] {
    if (text.includes(REPLACEMENT_CHARACTER)) {
      this.onDecodeError?.(offset)
      this.dirty = true
    }
    if (this.dirty) return this.resync(final)

    this.partial += text
    const start = this.partialStart
    const { ends, resume } = findTerminators(this.partial, this.lineEnding, this.cursor, final)
    const boundaries: number[] = []
    let consumed = 0
    for (const end of ends) {
      this.partialStart += this.codec.byteLength(this.partial.slice(consumed, end))
      boundaries.push(this.partialStart)
      consumed = end
    }

    if (consumed > 0) {
      this.release(this.partialStart - start)
      this.partial = this.partial.slice(consumed)
    }
    this.cursor = Math.max(0, resume - consumed)
    return boundaries
  }

  private resync(final: boolean): number[] {
    const raw = Buffer.concat(this.held, this.heldLength)
    const ends = locateBoundaries(raw, this.lineEnding, this.codec, { final })
    const consumed = ends[ends.length - 1] ?? 0
    const boundaries = ends.map((end) => this.partialStart + end)

    this.partialStart += consumed
    const rest = raw.subarray(consumed)
    this.held = rest.length > 0 ? [rest] : []
    this.heldLength = rest.length
    this.decoder = this.codec.createDecoder()
    this.partial = this.decoder.write(rest) + (final ? this.decoder.end() : '')
    this.dirty = this.partial.includes(REPLACEMENT_CHARACTER)
    this.cursor = 0
    return boundaries
  }

  /** Drops `count` bytes from the front of the held bytes. */
  private release(count: number): void {
    let remaining = count
    while (remaining > 0) {
      const head = this.held[0]
      if (head === undefined) break
      if (head.length <= remaining) {
        this.held.shift()
        remaining -= head.length
      } else {
        this.held[0] = head.subarray(remaining)
        remaining = 0
      }
    }
    this.heldLength -= count
  }
}
