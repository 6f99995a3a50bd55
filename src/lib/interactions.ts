import assert from 'node:assert/strict'
import { setTimeout as delay } from 'node:timers/promises'

import { DEFAULT_TEST_ID_ATTRIBUTE } from './config.js'
import { js, type JsExpression, type RemoteHandle } from './js.js'
import type { TestSession } from './test-session.js'

/**
 * Dispatches keydown then keyup with `key` and `code` set to `code` (e.g. `'KeyRight'`,
 * `'Enter'`) on `target`, or on `document` when no target is given.
 */
export const triggerKeyPress = async (
  session: TestSession,
  code: string,
  target?: RemoteHandle,
): Promise<void> => {
  await session.evaluate(js`${session.scriptLibrary}.keyPress(${code}, ${target ?? null})`)
}

/**
 * Dispatches a mousemove at client coordinates `[x, y]` on `target`, or on the first canvas
 * of the page. Without either the page throws and the bridge error propagates.
 */
export const triggerMouseMove = async (
  session: TestSession,
  position: readonly [number, number],
  target?: RemoteHandle,
): Promise<void> => {
  await session.evaluate(
    js`${session.scriptLibrary}.mouseMove(${[position[0], position[1]]}, ${target ?? null})`,
  )
}

// Escapes a value for a double-quoted CSS string.
const cssString = (value: string): string =>
  `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\a ')}"`

export const testIdSelector = (id: string, attribute = DEFAULT_TEST_ID_ATTRIBUTE): string =>
  `[${attribute}=${cssString(id)}]`

/**
 * Expression selecting the element whose test-id attribute equals `id`. With a session, resolves
 * it to a handle; a missing element surfaces as the bridge's evaluation error.
 */
export function queryByTestId(id: string, attribute?: string): JsExpression
export function queryByTestId(session: TestSession, id: string): Promise<RemoteHandle>
export function queryByTestId(
  sessionOrId: TestSession | string,
  idOrAttribute?: string,
): JsExpression | Promise<RemoteHandle> {
  if (typeof sessionOrId === 'string') {
    return js`document.querySelector(${testIdSelector(sessionOrId, idOrAttribute)})`
  }
  const session = sessionOrId
  const id = idOrAttribute ?? ''
  return session.resolveHandle(
    js`document.querySelector(${testIdSelector(id, session.config.testIdAttribute)})`,
  )
}

export type WaitForOptions = {
  timeoutMs?: number | undefined
  intervalMs?: number | undefined
}

/**
 * Polls `predicate` until it holds or the timeout passes, then asserts it. A predicate that never
 * became true fails with an AssertionError naming the predicate.
 */
export const waitFor = async (
  predicate: () => boolean | Promise<boolean>,
  { timeoutMs = 10_000, intervalMs = 25 }: WaitForOptions = {},
): Promise<void> => {
  const deadline = Date.now() + timeoutMs
  let result = await predicate()
  while (!result && Date.now() < deadline) {
    await delay(intervalMs)
    result = await predicate()
  }
  assert.equal(
    result,
    true,
    `waitFor: predicate ${predicate.toString()} was still false after ${timeoutMs} ms`,
  )
}
