import { setTimeout as delay } from 'node:timers/promises'
import { z } from 'zod'

import { HarnessError } from './errors.js'

const PER_REQUEST_TIMEOUT_MS = 1_500

export type ProbeResult =
  | { kind: 'response'; status: number }
  | { kind: 'refused' }
  | { kind: 'unreachable'; error: unknown }

const hasCode = (value: unknown, code: string): boolean => {
  if (typeof value !== 'object' || value === null) return false
  if ('code' in value && value.code === code) return true
  if (value instanceof AggregateError && value.errors.some((inner) => hasCode(inner, code))) {
    return true
  }
  return 'cause' in value ? hasCode(value.cause, code) : false
}

/**
 * Issues one GET against `url`. A refused connection is reported as such instead of thrown: for
 * a stopped server it is the expected answer.
 */
export const probeEndpoint = async (
  url: string,
  timeoutMs = PER_REQUEST_TIMEOUT_MS,
): Promise<ProbeResult> => {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  try {
    const res = await fetch(url, { signal: controller.signal })
    await res.body?.cancel()
    return { kind: 'response', status: res.status }
  } catch (error) {
    if (hasCode(error, 'ECONNREFUSED')) return { kind: 'refused' }
    return { kind: 'unreachable', error }
  } finally {
    clearTimeout(timeout)
  }
}

const versionSchema = z.object({ webSocketDebuggerUrl: z.string().min(1) })

/**
 * Polls the Chrome DevTools /json/version endpoint and returns the webSocketDebuggerUrl.
 * Leaves process management to the caller.
 */
export const waitForCdpEndpoint = async (port: number, timeoutMs = 30_000): Promise<string> => {
  const deadline = Date.now() + timeoutMs
  const url = `http://127.0.0.1:${port}/json/version`
  let lastError: unknown
  while (Date.now() < deadline) {
    const remaining = deadline - Date.now()
    if (remaining <= 0) break

    const controller = new AbortController()
    const timeout = setTimeout(
      () => controller.abort(),
      Math.min(PER_REQUEST_TIMEOUT_MS, remaining),
    )
    try {
      const res = await fetch(url, { signal: controller.signal })
      if (res.ok) {
        const parsed = versionSchema.safeParse(await res.json())
        if (parsed.success) return parsed.data.webSocketDebuggerUrl
        lastError = parsed.error
      }
    } catch (error) {
      lastError = error
    } finally {
      clearTimeout(timeout)
    }
    await delay(400)
  }
  throw new HarnessError('E_CDP_TIMEOUT', `Timed out waiting for CDP on port ${port}`, {
    port,
    timeoutMs,
    lastError,
  })
}
