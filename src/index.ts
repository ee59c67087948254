#!/usr/bin/env node
import { USAGE, escapeLineEnding } from './config/args.js'
import { loadConfig } from './config/load.js'
import { MiB, type SplitConfig } from './config/schema.js'
import { ConfigError, describeError } from './core/errors.js'
import { logger } from './core/logger.js'
import { splitFile } from './split/driver.js'

/** Splits the input named on the command line into compressed, line-aligned chunks. */
async function main(): Promise<void> {
  let config: Readonly<SplitConfig>
  try {
    config = loadConfig(process.argv.slice(2))
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error
    process.stderr.write(`error: ${error.message}\n\n${USAGE}\n`)
    process.exitCode = 2
    return
  }

  logger.info('split.config', {
    input: config.inputPath,
    outputPrefix: config.outputPrefix,
    encoding: config.encoding,
    lineEnding: escapeLineEnding(config.lineEnding),
    chunkSizeMiB: config.chunkSize / MiB,
    compression: config.compression.codec
  })

  await splitFile(config, { logger })
}

main().catch((error: unknown) => {
  logger.error('fatal', { error: describeError(error) })
  process.exitCode = 1
})
