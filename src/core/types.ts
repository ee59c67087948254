/**
 * Minimal structured logger interface used across modules.
 */
export interface Logger {
  info(event: string, data?: Record<string, unknown>): void
  warn(event: string, data?: Record<string, unknown>): void
  error(event: string, data?: Record<string, unknown>): void
}

/**
 * Lifecycle of the chunk currently held by the accumulator.
 *
 * `ready` covers the window between choosing a cut and handing the bytes to
 * the sink; `final` is the end-of-stream flush.
 */
export type ChunkState = 'empty' | 'accumulating' | 'ready' | 'final'

/** Receives each finished chunk, in order. */
export type ChunkSink = (chunk: Buffer) => Promise<void>

/**
 * Result of persisting one chunk.
 */
export interface EmittedChunk {
  index: number
  path: string
  rawBytes: number
  compressedBytes: number
}

/**
 * Totals for a finished split run.
 */
export interface SplitReport {
  chunks: number
  totalBytes: number
  compressedBytes: number
  durationMs: number
  files: string[]
}
