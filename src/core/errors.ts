/**
 * Bad argument count or value. Raised before any output is written.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/** Compressing a chunk failed. */
export class CodecError extends Error {
  constructor(
    message: string,
    readonly chunkIndex: number,
    options?: ErrorOptions
  ) {
    super(message, options)
    this.name = 'CodecError'
  }
}

/** Writing a compressed chunk to disk failed. */
export class ChunkWriteError extends Error {
  constructor(
    readonly path: string,
    options?: ErrorOptions
  ) {
    super(`failed to write chunk file ${path}`, options)
    this.name = 'ChunkWriteError'
  }
}

/** Formats any thrown value for a log line. */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error)
  if (error.cause instanceof Error) return `${error.message}: ${error.cause.message}`
  return error.message
}
