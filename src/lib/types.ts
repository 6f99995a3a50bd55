import type { IncomingMessage } from 'node:http'

import type { PageRoot } from './page.js'
import type { RunLogger } from './run-log.js'
import type { TestSession } from './test-session.js'

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

export type LifecycleState =
  | 'created'
  | 'starting'
  | 'awaiting-ready'
  | 'ready'
  | 'failed'
  | 'closed'

/**
 * Produces the content served for one serve cycle. Runs inside the application server's request
 * handling; a throw is captured and re-raised from `start`/`reload` as `E_HANDLER`.
 */
export type PageBuilder = (
  session: TestSession,
  request: IncomingMessage,
) => PageRoot | Promise<PageRoot>

/** One OS-level browser window (or page) the session drives. */
export interface ShellWindow {
  /** Navigates to `url`; resolves once the new document is committed, not when it is ready. */
  load(url: string): Promise<void>
  exists(): Promise<boolean>
  /** Evaluates a script expression in the page's main world, awaiting promises. */
  evaluate(expression: string): Promise<unknown>
  close(): Promise<void>
}

export type WindowRequest = {
  logger?: RunLogger | null | undefined
  /** Artifact directory of the session run, for shells that write process logs. */
  runDir?: string | undefined
}

export interface BrowserShell {
  createWindow(request?: WindowRequest): Promise<ShellWindow>
}

export type Readiness = {
  cycle: number
  ready: boolean
  error: string | null
}
