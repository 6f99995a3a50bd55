import { createWriteStream, mkdirSync, type WriteStream } from 'node:fs'
import { join } from 'node:path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogSource = 'session' | 'server' | 'shell' | 'page' | 'system'

export type LogRecord = {
  ts: number
  source: LogSource
  level: LogLevel
  message: string
  meta?: Record<string, unknown> | undefined
}

export interface RunLogger {
  /** File the records are appended to, when the logger writes to disk. */
  readonly path?: string | undefined
  log(source: LogSource, level: LogLevel, message: string, meta?: Record<string, unknown>): void
  close(): void
}

// Error instances stringify to `{}`; keep what is useful when reading a run log.
const replaceErrors = (_key: string, value: unknown): unknown => {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack }
  }
  return value
}

export const formatLogRecord = (record: LogRecord): string =>
  JSON.stringify(record, replaceErrors)

class FileRunLogger implements RunLogger {
  readonly path: string
  #stream: WriteStream | null
  #mirror: boolean

  constructor(path: string, mirror: boolean) {
    this.path = path
    this.#stream = createWriteStream(path, { flags: 'a' })
    this.#mirror = mirror
  }

  log(source: LogSource, level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (!this.#stream) return
    const line = formatLogRecord({ ts: Date.now(), source, level, message, meta })
    this.#stream.write(`${line}\n`)
    if (this.#mirror) process.stderr.write(`[browser-test-session] ${line}\n`)
  }

  close() {
    this.#stream?.end()
    this.#stream = null
  }
}

/**
 * Opens a JSON-lines run log in `dir`. Set DEBUG_HARNESS=1 to mirror every record to stderr.
 */
export const openRunLogger = (dir: string, fileName = 'run.log'): RunLogger => {
  mkdirSync(dir, { recursive: true })
  return new FileRunLogger(join(dir, fileName), Boolean(process.env.DEBUG_HARNESS))
}
