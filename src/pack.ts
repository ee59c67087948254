#!/usr/bin/env node
import { config as loadEnv } from 'dotenv'

import { getCompressionCodec } from './compress/codec.js'
import { packFile } from './compress/whole-file.js'
import { buildCompressionConfig } from './config/load.js'
import type { CompressionConfig } from './config/schema.js'
import { ConfigError, describeError } from './core/errors.js'
import { logger } from './core/logger.js'

const USAGE = 'Usage: chunkline-pack <file_to_compress>'

/** Compresses one file whole, next to the original. */
async function main(): Promise<void> {
  const args = process.argv.slice(2)
  const [inputPath] = args
  if (args.length !== 1 || !inputPath) {
    process.stderr.write(`${USAGE}\n`)
    process.exitCode = 1
    return
  }

  loadEnv()
  let settings: CompressionConfig
  try {
    settings = buildCompressionConfig(process.env)
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error
    process.stderr.write(`error: ${error.message}\n`)
    process.exitCode = 2
    return
  }

  const codec = getCompressionCodec(settings.codec)
  await packFile(inputPath, codec, settings.level ?? codec.defaultLevel, logger)
}

main().catch((error: unknown) => {
  logger.error('fatal', { error: describeError(error) })
  process.exitCode = 1
})
