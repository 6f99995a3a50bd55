import { mkdtemp } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { chromium } from 'playwright'
import { beforeEach, describe, expect, it, vi } from 'vitest'

import { ElectronShell } from '../src/lib/electron-shell.js'
import { launchElectron } from '../src/lib/launch-electron.js'
import { PlaywrightWindow } from '../src/lib/playwright-window.js'

vi.mock('playwright', () => ({
  chromium: {
    launch: vi.fn(),
    connectOverCDP: vi.fn(),
  },
}))

vi.mock('../src/lib/launch-electron.js', () => ({
  launchElectron: vi.fn(),
}))

const createPage = (url: string) => ({
  on: vi.fn(),
  off: vi.fn(),
  isClosed: vi.fn(() => false),
  close: vi.fn().mockResolvedValue(undefined),
  url: vi.fn(() => url),
})

describe('ElectronShell', () => {
  const quit = vi.fn().mockResolvedValue(undefined)
  let runDir: string

  beforeEach(async () => {
    vi.clearAllMocks()
    runDir = await mkdtemp(join(tmpdir(), 'electron-shell-'))
    vi.mocked(launchElectron).mockResolvedValue({
      wsUrl: 'ws://127.0.0.1:9333/devtools/browser/test',
      cdpPort: 9333,
      pid: 4242,
      quit,
    })
  })

  const connect = (pages: ReturnType<typeof createPage>[]) => {
    const browser = {
      contexts: vi.fn(() => [{ pages: () => pages }]),
      isConnected: vi.fn(() => true),
      close: vi.fn().mockResolvedValue(undefined),
    }
    vi.mocked(chromium.connectOverCDP).mockResolvedValue(browser as never)
    return browser
  }

  it('launches the application and drives its app window', async () => {
    const devtools = createPage('devtools://devtools/bundled/inspector.html')
    const app = createPage('app://index.html')
    connect([devtools, app])

    const window = await new ElectronShell({ command: 'electron', args: ['main.js'] }).createWindow({
      runDir,
    })

    expect(launchElectron).toHaveBeenCalledWith({
      command: 'electron',
      args: ['main.js'],
      runDir,
      logger: null,
    })
    expect(chromium.connectOverCDP).toHaveBeenCalledWith('ws://127.0.0.1:9333/devtools/browser/test')
    expect(window).toBeInstanceOf(PlaywrightWindow)
    expect(window instanceof PlaywrightWindow ? window.page : null).toBe(app)
  })

  it('disconnects and stops the process on close', async () => {
    const browser = connect([createPage('http://localhost:5173/')])
    const window = await new ElectronShell({ command: 'electron' }).createWindow({ runDir })
    await window.close()
    expect(browser.close).toHaveBeenCalledTimes(1)
    expect(quit).toHaveBeenCalledTimes(1)
  })

  it('fails with E_NO_PAGE and stops the process when no window opens', async () => {
    const browser = connect([createPage('devtools://devtools/bundled/inspector.html')])
    await expect(
      new ElectronShell({ command: 'electron', windowTimeoutMs: 50 }).createWindow({ runDir }),
    ).rejects.toMatchObject({ code: 'E_NO_PAGE', details: { timeoutMs: 50 } })
    expect(browser.close).toHaveBeenCalledTimes(1)
    expect(quit).toHaveBeenCalledTimes(1)
  })

  it('keeps the original error when stopping the process also fails', async () => {
    connect([createPage('devtools://devtools/bundled/inspector.html')])
    quit.mockRejectedValueOnce(new Error('process survived'))

    const error = await new ElectronShell({ command: 'electron', windowTimeoutMs: 50 })
      .createWindow({ runDir })
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(AggregateError)
    const errors = error instanceof AggregateError ? error.errors : []
    expect(errors[0]).toMatchObject({ code: 'E_NO_PAGE' })
    expect(errors[1]).toMatchObject({ message: 'process survived' })
    expect(error).toMatchObject({
      message: 'Electron application opened no window (teardown also failed: process survived)',
    })
  })
})
