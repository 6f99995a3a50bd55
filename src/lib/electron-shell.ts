import { setTimeout as wait } from 'node:timers/promises'
import { type Browser, chromium, type Page } from 'playwright'

import { prepareArtifactRun } from './artifacts.js'
import { describeError, HarnessError } from './errors.js'
import { type LaunchOptions, launchElectron } from './launch-electron.js'
import { PlaywrightWindow, scorePage } from './playwright-window.js'
import type { BrowserShell, ShellWindow, WindowRequest } from './types.js'

export type ElectronShellOptions = Omit<LaunchOptions, 'runDir' | 'logger'> & {
  /** How long to wait for the application to open its first window. */
  windowTimeoutMs?: number | undefined
}

const pickWindow = async (browser: Browser, timeoutMs: number): Promise<Page> => {
  const deadline = Date.now() + timeoutMs
  for (;;) {
    const [best] = browser
      .contexts()
      .flatMap((context) => context.pages())
      .filter((page) => scorePage(page) >= 0)
      .sort((a, b) => scorePage(b) - scorePage(a))
    if (best) return best
    if (Date.now() >= deadline) {
      throw new HarnessError('E_NO_PAGE', 'Electron application opened no window', { timeoutMs })
    }
    await wait(100)
  }
}

/**
 * Runs an Electron application as the browser shell. The application's main script must open a
 * BrowserWindow; the session navigates that window to its endpoint.
 */
export class ElectronShell implements BrowserShell {
  #opts: ElectronShellOptions

  constructor(opts: ElectronShellOptions) {
    this.#opts = opts
  }

  async createWindow(request: WindowRequest = {}): Promise<ShellWindow> {
    const logger = request.logger ?? null
    const runDir = request.runDir ?? (await prepareArtifactRun()).dir
    const launch = await launchElectron({ ...this.#opts, runDir, logger })
    let browser: Browser | null = null
    try {
      browser = await chromium.connectOverCDP(launch.wsUrl)
      const connected = browser
      const page = await pickWindow(connected, this.#opts.windowTimeoutMs ?? 10_000)
      logger?.log('shell', 'info', 'electron-window', { url: page.url(), pid: launch.pid })
      return new PlaywrightWindow(page, {
        logger,
        isAlive: () => connected.isConnected(),
        onClose: async () => {
          // Only drops the CDP connection; the process is stopped by quit().
          await connected.close()
          await launch.quit()
        },
      })
    } catch (error) {
      const teardownErrors: unknown[] = []
      await browser?.close().catch((closeError: unknown) => {
        teardownErrors.push(closeError)
      })
      await launch.quit().catch((quitError: unknown) => {
        teardownErrors.push(quitError)
      })
      if (teardownErrors.length > 0) {
        throw new AggregateError(
          [error, ...teardownErrors],
          `${describeError(error)} (teardown also failed: ${teardownErrors.map(describeError).join('; ')})`,
        )
      }
      throw error
    }
  }
}
