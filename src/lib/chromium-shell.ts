import { chromium } from 'playwright'

import { PlaywrightWindow } from './playwright-window.js'
import type { BrowserShell, ShellWindow, WindowRequest } from './types.js'

export type ChromiumShellOptions = {
  /** Defaults to true unless E2E_HEADLESS=0. */
  headless?: boolean | undefined
  executablePath?: string | undefined
  channel?: string | undefined
  args?: string[] | undefined
}

/**
 * Launches a Chromium browser per window through Playwright.
 */
export class ChromiumShell implements BrowserShell {
  #opts: ChromiumShellOptions

  constructor(opts: ChromiumShellOptions = {}) {
    this.#opts = opts
  }

  async createWindow(request: WindowRequest = {}): Promise<ShellWindow> {
    const logger = request.logger ?? null
    const headless = this.#opts.headless ?? process.env.E2E_HEADLESS !== '0'
    const browser = await chromium.launch({
      headless,
      ...(this.#opts.executablePath ? { executablePath: this.#opts.executablePath } : {}),
      ...(this.#opts.channel ? { channel: this.#opts.channel } : {}),
      ...(this.#opts.args ? { args: this.#opts.args } : {}),
    })
    try {
      const context = await browser.newContext()
      const page = await context.newPage()
      logger?.log('shell', 'info', 'chromium-launched', { headless, version: browser.version() })
      return new PlaywrightWindow(page, {
        logger,
        isAlive: () => browser.isConnected(),
        onClose: async () => {
          await context.close()
          await browser.close()
          logger?.log('shell', 'info', 'chromium-closed')
        },
      })
    } catch (error) {
      await browser.close()
      throw error
    }
  }
}
