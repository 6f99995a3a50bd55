import { createContext, runInContext } from 'node:vm'
import { describe, expect, it } from 'vitest'

import { RemoteScriptBridge } from '../src/lib/bridge.js'
import { HarnessError } from '../src/lib/errors.js'
import { harnessBootstrap } from '../src/lib/harness-client.js'
import { js, RemoteHandle } from '../src/lib/js.js'
import type { ShellWindow } from '../src/lib/types.js'

/** Window whose page is a bare script context, with the helper module installed on request. */
class ContextWindow implements ShellWindow {
  readonly expressions: string[] = []
  #context = createContext({
    document: { readyState: 'loading' },
    addEventListener: () => undefined,
  })

  install(cycle: number) {
    runInContext(harnessBootstrap(cycle), this.#context)
  }

  async load(): Promise<void> {}

  async exists(): Promise<boolean> {
    return true
  }

  async evaluate(expression: string): Promise<unknown> {
    this.expressions.push(expression)
    return runInContext(expression, this.#context)
  }

  async close(): Promise<void> {}
}

const fixedWindow = (result: unknown): ShellWindow => ({
  load: async () => {},
  exists: async () => true,
  evaluate: async () => result,
  close: async () => {},
})

describe('RemoteScriptBridge.evaluate', () => {
  it('returns JSON values from the page', async () => {
    const bridge = new RemoteScriptBridge(new ContextWindow())
    expect(await bridge.evaluate('1 + 1')).toBe(2)
    expect(await bridge.evaluate('({ a: [1, "x", null] })')).toEqual({ a: [1, 'x', null] })
  })

  it('awaits promises in the page', async () => {
    const bridge = new RemoteScriptBridge(new ContextWindow())
    expect(await bridge.evaluate('Promise.resolve("later")')).toBe('later')
  })

  it('maps undefined to null', async () => {
    const bridge = new RemoteScriptBridge(new ContextWindow())
    expect(await bridge.evaluate('undefined')).toBeNull()
  })

  it('wraps the expression for transfer', async () => {
    const window = new ContextWindow()
    await new RemoteScriptBridge(window).evaluate(js`${'a'}.length`)
    expect(window.expressions).toEqual([
      '(async () => { const value = await ("a".length); const text = JSON.stringify(value); return text === undefined ? null : text })()',
    ])
  })

  it('surfaces page errors as E_REMOTE_EVAL with the page message', async () => {
    const bridge = new RemoteScriptBridge(new ContextWindow())
    const error = await bridge
      .evaluate('(() => { throw new Error("nope") })()')
      .catch((e: unknown) => e)
    expect(error).toBeInstanceOf(HarnessError)
    expect(error).toMatchObject({
      code: 'E_REMOTE_EVAL',
      message: 'nope',
      details: { expression: '(() => { throw new Error("nope") })()' },
    })
  })

  it('reports values that cannot cross as JSON', async () => {
    const bridge = new RemoteScriptBridge(new ContextWindow())
    await expect(
      bridge.evaluate('(() => { const o = {}; o.self = o; return o })()'),
    ).rejects.toMatchObject({ code: 'E_REMOTE_EVAL', message: expect.stringContaining('circular') })
  })

  it('rejects results that are not JSON text', async () => {
    const bridge = new RemoteScriptBridge(fixedWindow(42))
    await expect(bridge.evaluate('x')).rejects.toMatchObject({
      code: 'E_REMOTE_EVAL',
      message: 'Bridge returned a value that is not JSON text',
      details: { expression: 'x', received: 'number' },
    })
  })
})

describe('RemoteScriptBridge.resolveHandle', () => {
  it('stores the value in the page handle table', async () => {
    const window = new ContextWindow()
    window.install(3)
    const bridge = new RemoteScriptBridge(window)
    const handle = await bridge.resolveHandle('({ n: 5 })', 3)
    expect(handle.id).toBe(1)
    expect(handle.cycle).toBe(3)
    expect(await bridge.evaluate(js`${handle}.n`)).toBe(5)
    expect((await bridge.resolveHandle('[]', 3)).id).toBe(2)
  })

  it('rejects handles of another serve cycle', async () => {
    const window = new ContextWindow()
    window.install(3)
    const bridge = new RemoteScriptBridge(window)
    await bridge.resolveHandle('({ n: 5 })', 3)
    await expect(bridge.evaluate(js`${new RemoteHandle(1, 2)}.n`)).rejects.toMatchObject({
      code: 'E_REMOTE_EVAL',
      message: 'Handle 1 belongs to serve cycle 2, the page is at cycle 3',
    })
  })

  it('rejects handles the page never issued', async () => {
    const window = new ContextWindow()
    window.install(1)
    await expect(
      new RemoteScriptBridge(window).evaluate(js`${new RemoteHandle(9, 1)}.n`),
    ).rejects.toMatchObject({ code: 'E_REMOTE_EVAL', message: 'Unknown handle 9' })
  })

  it('refuses to resolve null', async () => {
    const window = new ContextWindow()
    window.install(1)
    await expect(new RemoteScriptBridge(window).resolveHandle('null', 1)).rejects.toMatchObject({
      code: 'E_REMOTE_EVAL',
      message: 'Cannot resolve a handle to null',
    })
  })
})

describe('RemoteScriptBridge.readiness', () => {
  it('is null before the helper module is installed', async () => {
    expect(await new RemoteScriptBridge(new ContextWindow()).readiness()).toBeNull()
  })

  it('reads the cycle and flags of the installed module', async () => {
    const window = new ContextWindow()
    window.install(4)
    expect(await new RemoteScriptBridge(window).readiness()).toEqual({
      cycle: 4,
      ready: false,
      error: null,
    })
  })

  it('is null when the window cannot evaluate', async () => {
    const window: ShellWindow = {
      ...fixedWindow(null),
      evaluate: async () => {
        throw new Error('Target closed')
      },
    }
    expect(await new RemoteScriptBridge(window).readiness()).toBeNull()
  })
})
