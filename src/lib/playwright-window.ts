import type { ConsoleMessage, Page, Request, Response } from 'playwright'

import type { LogLevel, RunLogger } from './run-log.js'
import type { ShellWindow } from './types.js'

const PREFERRED_PREFIXES = [
  'app://',
  'file://',
  'http://localhost',
  'https://localhost',
  'http://127.0.0.1',
]

const mapConsoleLevel = (type: string): LogLevel => {
  if (type === 'warning') return 'warn'
  if (type === 'error') return 'error'
  if (type === 'debug') return 'debug'
  return 'info'
}

/**
 * Ranks candidate pages of a shell that opens its own windows; app-served pages win over
 * devtools and blank pages.
 */
export const scorePage = (page: Page): number => {
  const url = page.url()
  if (url.startsWith('devtools://')) return -1
  return PREFERRED_PREFIXES.some((prefix) => url.startsWith(prefix)) ? 5 : 0
}

export type PlaywrightWindowOptions = {
  logger?: RunLogger | null | undefined
  /** Releases what owns the page (context, browser, process) after the page is closed. */
  onClose?: (() => Promise<void>) | undefined
  /** Extra liveness condition, e.g. the browser connection still being up. */
  isAlive?: (() => boolean) | undefined
}

/**
 * Shell window backed by a Playwright page. Page errors, console output, failed requests and
 * error responses go to the session log.
 */
export class PlaywrightWindow implements ShellWindow {
  #page: Page
  #logger: RunLogger | null
  #onClose: (() => Promise<void>) | undefined
  #isAlive: (() => boolean) | undefined
  #closed = false
  #listeners = {
    pageerror: (error: Error) => {
      this.#log('error', error.message, { stack: error.stack })
    },
    console: (message: ConsoleMessage) => {
      this.#log(mapConsoleLevel(message.type()), message.text(), {
        url: message.location().url,
        line: message.location().lineNumber,
      })
    },
    requestfailed: (request: Request) => {
      this.#log('warn', 'request-failed', {
        url: request.url(),
        method: request.method(),
        error: request.failure()?.errorText,
      })
    },
    response: (response: Response) => {
      if (response.status() >= 400) {
        this.#log('warn', 'response>=400', {
          url: response.url(),
          status: response.status(),
          method: response.request().method(),
        })
      }
    },
  }

  constructor(page: Page, opts: PlaywrightWindowOptions = {}) {
    this.#page = page
    this.#logger = opts.logger ?? null
    this.#onClose = opts.onClose
    this.#isAlive = opts.isAlive
    page.on('pageerror', this.#listeners.pageerror)
    page.on('console', this.#listeners.console)
    page.on('requestfailed', this.#listeners.requestfailed)
    page.on('response', this.#listeners.response)
  }

  /** Underlying Playwright page, for assertions the bridge does not cover. */
  get page(): Page {
    return this.#page
  }

  #log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    this.#logger?.log('page', level, message, meta)
  }

  async load(url: string): Promise<void> {
    // Readiness is the session's business; only wait until the new document is committed.
    await this.#page.goto(url, { waitUntil: 'commit' })
  }

  async exists(): Promise<boolean> {
    if (this.#closed || this.#page.isClosed()) return false
    return this.#isAlive ? this.#isAlive() : true
  }

  async evaluate(expression: string): Promise<unknown> {
    return this.#page.evaluate<unknown>(expression)
  }

  async close(): Promise<void> {
    if (this.#closed) return
    this.#closed = true
    this.#page.off('pageerror', this.#listeners.pageerror)
    this.#page.off('console', this.#listeners.console)
    this.#page.off('requestfailed', this.#listeners.requestfailed)
    this.#page.off('response', this.#listeners.response)
    if (!this.#page.isClosed()) await this.#page.close()
    await this.#onClose?.()
  }
}
