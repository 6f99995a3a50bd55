import { z } from 'zod'

import { describeError, HarnessError } from './errors.js'
import { HARNESS_GLOBAL } from './harness-client.js'
import { type JsExpression, RemoteHandle, toSource } from './js.js'
import type { JsonValue, Readiness, ShellWindow } from './types.js'

const harnessRef = `globalThis.${HARNESS_GLOBAL}`

const readinessSchema = z
  .object({
    cycle: z.number(),
    ready: z.boolean(),
    error: z.string().nullable(),
  })
  .nullable()

// Results cross the bridge as JSON text so every shell returns the same shape.
const wrapForTransfer = (source: string) =>
  `(async () => { const value = await (${source}); const text = JSON.stringify(value); return text === undefined ? null : text })()`

/**
 * Evaluates script in the page of one shell window and resolves page-side objects to handles.
 */
export class RemoteScriptBridge {
  #window: ShellWindow

  constructor(window: ShellWindow) {
    this.#window = window
  }

  async evaluate(expression: JsExpression | string): Promise<JsonValue> {
    const source = toSource(expression)
    let transferred: unknown
    try {
      transferred = await this.#window.evaluate(wrapForTransfer(source))
    } catch (error) {
      throw new HarnessError(
        'E_REMOTE_EVAL',
        describeError(error),
        { expression: source },
        { cause: error },
      )
    }
    if (transferred === null || transferred === undefined) return null
    if (typeof transferred !== 'string') {
      throw new HarnessError('E_REMOTE_EVAL', 'Bridge returned a value that is not JSON text', {
        expression: source,
        received: typeof transferred,
      })
    }
    const value: JsonValue = JSON.parse(transferred)
    return value
  }

  /**
   * Stores the value of `expression` in the page's handle table. `cycle` stamps the handle with
   * the serve cycle it belongs to.
   */
  async resolveHandle(expression: JsExpression | string, cycle: number): Promise<RemoteHandle> {
    const source = toSource(expression)
    const id = await this.evaluate(`${harnessRef}.retain((${source}))`)
    if (typeof id !== 'number') {
      throw new HarnessError('E_REMOTE_EVAL', 'Page returned no handle id', { expression: source })
    }
    return new RemoteHandle(id, cycle)
  }

  /**
   * Reads the page's readiness flag and init-error slot. Returns `null` while the page has no
   * harness installed (blank window, navigation in progress).
   */
  async readiness(): Promise<Readiness | null> {
    let value: JsonValue
    try {
      value = await this.evaluate(
        `${harnessRef} ? { cycle: ${harnessRef}.cycle, ready: ${harnessRef}.ready, error: ${harnessRef}.error } : null`,
      )
    } catch {
      return null
    }
    const parsed = readinessSchema.safeParse(value)
    return parsed.success ? parsed.data : null
  }
}
