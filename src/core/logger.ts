import type { Logger } from './types.js'

type Level = 'INFO' | 'WARN' | 'ERROR'

export type LogWriter = (line: string) => void

const toStdout: LogWriter = (line) => {
  process.stdout.write(line)
}

const toStderr: LogWriter = (line) => {
  process.stderr.write(line)
}

/**
 * Builds a JSON-lines logger. INFO lines go to `out`, WARN and ERROR to `err`.
 */
export function createLogger(out: LogWriter = toStdout, err: LogWriter = toStderr): Logger {
  const emit = (level: Level, event: string, data?: Record<string, unknown>): void => {
    const payload = {
      ts: new Date().toISOString(),
      level,
      event,
      ...(data ?? {})
    }
    const write = level === 'INFO' ? out : err
    write(`${JSON.stringify(payload)}\n`)
  }

  return {
    info(event, data) {
      emit('INFO', event, data)
    },
    warn(event, data) {
      emit('WARN', event, data)
    },
    error(event, data) {
      emit('ERROR', event, data)
    }
  }
}

/** Process-wide logger used by the CLI entry points. */
export const logger: Logger = createLogger()
