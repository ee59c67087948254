import { config as loadEnv } from 'dotenv'

import { ConfigError } from '../core/errors.js'
import { parseSplitArgs, type SplitArgs } from './args.js'
import { MiB, compressionSchema, splitConfigSchema, type CompressionConfig, type SplitConfig } from './schema.js'

type Env = Record<string, string | undefined>

function parseOptionalNumber(input: string | undefined): number | undefined {
  if (input === undefined || input.trim() === '') return undefined
  return Number(input)
}

function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ')
}

function readCompression(env: Env): unknown {
  return {
    codec: env.CHUNKLINE_COMPRESSION?.trim().toLowerCase() || undefined,
    level: parseOptionalNumber(env.CHUNKLINE_COMPRESSION_LEVEL)
  }
}

/** Reads compression settings from `CHUNKLINE_COMPRESSION*` variables. */
export function buildCompressionConfig(env: Env): CompressionConfig {
  const parsed = compressionSchema.safeParse(readCompression(env))
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error.issues))
  return parsed.data
}

/** Merges parsed arguments with tuning variables and validates the result. */
export function buildSplitConfig(args: SplitArgs, env: Env): Readonly<SplitConfig> {
  const blockSizeMb = parseOptionalNumber(env.CHUNKLINE_BLOCK_SIZE_MB)
  const parsed = splitConfigSchema.safeParse({
    inputPath: args.inputPath,
    outputPrefix: args.outputPrefix,
    chunkSize: args.chunkSizeMb * MiB,
    lineEnding: args.lineEnding,
    encoding: args.encoding,
    blockSize: blockSizeMb === undefined ? undefined : blockSizeMb * MiB,
    compression: readCompression(env)
  })
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error.issues))
  return Object.freeze(parsed.data)
}

/**
 * Loads runtime configuration from the command line and the environment.
 *
 * A `.env` file in the working directory is read first; variables already
 * set in the environment take priority over it.
 */
export function loadConfig(argv: readonly string[]): Readonly<SplitConfig> {
  loadEnv()
  return buildSplitConfig(parseSplitArgs(argv), process.env)
}
