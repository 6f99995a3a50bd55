import type { IncomingMessage } from 'node:http'
import { setTimeout as delay } from 'node:timers/promises'

import { ApplicationServer, HEALTH_PATH, type PageResponse } from './app-server.js'
import { prepareArtifactRun } from './artifacts.js'
import { RemoteScriptBridge } from './bridge.js'
import { ChromiumShell } from './chromium-shell.js'
import { resolveSessionConfig, type SessionConfig, type SessionConfigInput } from './config.js'
import { describeError, HarnessError } from './errors.js'
import { HARNESS_GLOBAL, harnessBootstrap } from './harness-client.js'
import type { JsExpression, RemoteHandle } from './js.js'
import { escapeHtml, type PageRoot, renderDocument } from './page.js'
import { probeEndpoint } from './probe.js'
import { type LogLevel, openRunLogger, type RunLogger } from './run-log.js'
import { ServeCycle } from './serve-cycle.js'
import type { BrowserShell, JsonValue, LifecycleState, PageBuilder, ShellWindow } from './types.js'

export type SessionOptions = SessionConfigInput & {
  /** Browser shell hosting the window; a fresh ChromiumShell by default. */
  shell?: BrowserShell | undefined
  /** Defaults to a run log in a new directory under `artifactDir`. */
  logger?: RunLogger | undefined
}

const TRANSITIONS: Record<LifecycleState, readonly LifecycleState[]> = {
  created: ['starting', 'closed'],
  starting: ['awaiting-ready', 'failed', 'closed'],
  'awaiting-ready': ['ready', 'failed', 'closed'],
  ready: ['awaiting-ready', 'failed', 'closed'],
  failed: ['closed'],
  closed: [],
}

const urlHost = (host: string): string => {
  if (host === '0.0.0.0' || host === '::') return '127.0.0.1'
  return host.includes(':') ? `[${host}]` : host
}

// Upper bound of one readiness evaluation; a slower one counts as "not ready yet".
const READINESS_EVAL_CAP_MS = 250

/** Resolves with `undefined` when `promise` has not settled within `ms`. */
const settleWithin = async <T>(promise: Promise<T>, ms: number): Promise<T | undefined> => {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<undefined>((resolve) => {
    timer = setTimeout(() => resolve(undefined), ms)
  })
  try {
    return await Promise.race([promise, timeout])
  } finally {
    clearTimeout(timer)
  }
}

const errorPage = (error: unknown): string =>
  `<!doctype html><title>Page builder failed</title><pre>${escapeHtml(describeError(error))}</pre>`

const noCyclePage =
  '<!doctype html><title>No serve cycle</title><p>No serve cycle is pending for this session.</p>'

/**
 * One test's live application: an application server serving the page-builder's output, a
 * browser window showing it, and the bridge into the page's script runtime.
 *
 * ```ts
 * const session = new TestSession((session, request) => h('div', { id: 'app' }, 'hello'))
 * try {
 *   await session.start()
 *   await session.evaluate(js`document.getElementById('app').textContent`)
 * } finally {
 *   await session.close()
 * }
 * ```
 */
export class TestSession {
  readonly config: SessionConfig
  #builder: PageBuilder
  #shell: BrowserShell
  #state: LifecycleState = 'created'
  #server: ApplicationServer | null = null
  #boundPort: number | null = null
  #window: ShellWindow | null = null
  #bridge: RemoteScriptBridge | null = null
  #cycle: ServeCycle | null = null
  #cycleCount = 0
  #library: RemoteHandle | null = null
  #logger: RunLogger | null
  #ownsLogger: boolean

  constructor(builder: PageBuilder, options: SessionOptions = {}) {
    const { shell, logger, ...config } = options
    this.config = resolveSessionConfig(config)
    this.#builder = builder
    this.#shell = shell ?? new ChromiumShell()
    this.#logger = logger ?? null
    this.#ownsLogger = logger === undefined
  }

  get state(): LifecycleState {
    return this.#state
  }

  get endpoint(): string {
    return `http://${urlHost(this.config.host)}:${this.#boundPort ?? this.config.port}/`
  }

  /** The page-builder's return value for the current serve cycle. */
  get pageRoot(): PageRoot {
    return this.#served('read the page root').root
  }

  /** The HTTP request of the current serve cycle. */
  get request(): IncomingMessage {
    return this.#served('read the request').request
  }

  /** Handle to the helper script module of the current page. */
  get scriptLibrary(): RemoteHandle {
    this.#assertState('ready', 'use the script library')
    if (!this.#library) {
      throw new HarnessError('E_SESSION_STATE', 'Script library is not resolved')
    }
    return this.#library
  }

  /** Path of the run log, when the session writes one. */
  get logPath(): string | undefined {
    return this.#logger?.path
  }

  async start(): Promise<void> {
    if (this.#state !== 'created') {
      throw new HarnessError(
        'E_SESSION_STATE',
        `Cannot start a session in state ${this.#state}; create a new session instead`,
        { state: this.#state },
      )
    }
    this.#transition('starting')
    try {
      const runDir = await this.#openLog()
      if (!this.#server?.isRunning) {
        await this.#ensureExclusiveEndpoint()
        this.#server = await ApplicationServer.bind({
          host: this.config.host,
          port: this.config.port,
          handler: this.#servePage,
          logger: this.#logger,
        })
        this.#boundPort = this.#server.port
      }
      if (!this.#window || !(await this.#window.exists())) {
        this.#window = await this.#shell.createWindow({ logger: this.#logger, runDir })
        this.#bridge = new RemoteScriptBridge(this.#window)
      }
      await this.#navigate()
    } catch (error) {
      await this.#abort(error)
    }
  }

  /**
   * Serves a fresh page into the same window and waits for it to become ready again. Handles
   * resolved before the reload are invalid afterwards.
   */
  async reload(): Promise<void> {
    this.#assertState('ready', 'reload')
    try {
      await this.#navigate()
    } catch (error) {
      await this.#abort(error)
    }
  }

  /**
   * Stops the server and closes the window. Safe in every state and idempotent. Errors while
   * stopping the server are logged; errors while closing the window are thrown.
   */
  async close(): Promise<void> {
    if (this.#state === 'closed') return
    const server = this.#server
    const window = this.#window
    const endpoint = this.endpoint
    this.#server = null
    this.#window = null
    this.#bridge = null
    this.#library = null
    this.#transition('closed')
    try {
      if (server) await this.#stopServer(server, endpoint)
      if (window) {
        try {
          await window.close()
          this.#log('info', 'window-closed')
        } catch (error) {
          this.#log('error', 'window-close-failed', { error })
          throw error
        }
      }
    } finally {
      this.#log('info', 'session-closed')
      if (this.#ownsLogger) this.#logger?.close()
    }
  }

  async evaluate(expression: JsExpression | string): Promise<JsonValue> {
    return this.#readyBridge('evaluate script').evaluate(expression)
  }

  async resolveHandle(expression: JsExpression | string): Promise<RemoteHandle> {
    const bridge = this.#readyBridge('resolve a handle')
    return bridge.resolveHandle(expression, this.#cycleCount)
  }

  #log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    this.#logger?.log('session', level, message, meta)
  }

  #transition(next: LifecycleState) {
    if (!TRANSITIONS[this.#state].includes(next)) {
      throw new HarnessError('E_SESSION_STATE', `Invalid transition ${this.#state} -> ${next}`, {
        from: this.#state,
        to: next,
      })
    }
    this.#log('debug', 'state', { from: this.#state, to: next })
    this.#state = next
  }

  #assertState(expected: LifecycleState, action: string) {
    if (this.#state !== expected) {
      throw new HarnessError(
        'E_SESSION_STATE',
        `Cannot ${action} while the session is ${this.#state}`,
        { state: this.#state, expected },
      )
    }
  }

  #readyBridge(action: string): RemoteScriptBridge {
    this.#assertState('ready', action)
    if (!this.#bridge) throw new HarnessError('E_SESSION_STATE', 'Session has no window')
    return this.#bridge
  }

  #served(action: string) {
    this.#assertState('ready', action)
    const outcome = this.#cycle?.outcome
    if (outcome?.status !== 'served') {
      throw new HarnessError('E_SESSION_STATE', 'Current serve cycle produced no page')
    }
    return outcome
  }

  async #openLog(): Promise<string | undefined> {
    if (this.#logger) return undefined
    const run = await prepareArtifactRun({ artifactDir: this.config.artifactDir })
    this.#logger = openRunLogger(run.dir)
    return run.dir
  }

  /**
   * A fixed port can already answer behind the same host name (another process, or a listener
   * on the other address family); refuse to share it.
   */
  async #ensureExclusiveEndpoint() {
    if (this.config.port === 0) return
    const result = await probeEndpoint(this.endpoint, this.config.probeTimeoutMs)
    if (result.kind === 'response') {
      throw new HarnessError('E_BIND', `Something is already serving ${this.endpoint}`, {
        host: this.config.host,
        port: this.config.port,
        status: result.status,
      })
    }
  }

  async #assertServing(server: ApplicationServer) {
    const url = new URL(HEALTH_PATH, this.endpoint).href
    const result = server.isRunning
      ? await probeEndpoint(url, this.config.probeTimeoutMs)
      : ({ kind: 'refused' } as const)
    if (result.kind !== 'response' || result.status !== 200) {
      throw new HarnessError('E_NOT_SERVING', `Application server at ${this.endpoint} is not serving`, {
        probe: result,
      })
    }
  }

  async #navigate(): Promise<void> {
    const server = this.#server
    const window = this.#window
    const bridge = this.#bridge
    if (!server || !window || !bridge) {
      throw new HarnessError('E_SESSION_STATE', 'Session has no server or window to navigate')
    }
    await this.#assertServing(server)

    this.#cycleCount += 1
    const cycle = new ServeCycle(this.#cycleCount)
    this.#cycle = cycle
    this.#library = null
    this.#transition('awaiting-ready')
    this.#log('info', 'navigate', { url: this.endpoint, cycle: cycle.id })

    try {
      await window.load(this.endpoint)
    } catch (error) {
      await this.#checkCycle(window, cycle)
      throw error
    }
    await this.#awaitReady(window, bridge, cycle)
    this.#library = await bridge.resolveHandle(`globalThis.${HARNESS_GLOBAL}`, cycle.id)
    this.#transition('ready')
  }

  /** Throws if the window is gone or the page-builder threw in `cycle`. */
  async #checkCycle(window: ShellWindow, cycle: ServeCycle) {
    if (!(await window.exists())) {
      throw new HarnessError(
        'E_WINDOW_CLOSED',
        'Browser window closed before the page reported ready',
        { cycle: cycle.id },
      )
    }
    if (cycle.failed) {
      throw new HarnessError(
        'E_HANDLER',
        `Page builder failed: ${describeError(cycle.error)}`,
        { cycle: cycle.id },
        { cause: cycle.error },
      )
    }
  }

  // Polls instead of awaiting one signal: the window can disappear and the page-builder can
  // throw while the page's own readiness never arrives. A renderer stuck in a dialog or a busy
  // loop never answers an evaluation, so each one is bounded by the tick budget.
  async #awaitReady(window: ShellWindow, bridge: RemoteScriptBridge, cycle: ServeCycle) {
    const { readyTimeoutMs, pollIntervalMs } = this.config
    const startedAt = Date.now()
    const evalBudgetMs = Math.max(pollIntervalMs, READINESS_EVAL_CAP_MS)
    for (;;) {
      await this.#checkCycle(window, cycle)
      const remainingMs = Math.max(1, readyTimeoutMs - (Date.now() - startedAt))
      const budgetMs = Math.min(evalBudgetMs, remainingMs)
      const readiness = await settleWithin(bridge.readiness(), budgetMs)
      if (readiness?.cycle === cycle.id) {
        if (readiness.error !== null) {
          throw new HarnessError('E_PAGE_INIT', `Page failed to initialize: ${readiness.error}`, {
            cycle: cycle.id,
            error: readiness.error,
          })
        }
        if (readiness.ready) {
          this.#log('info', 'page-ready', { cycle: cycle.id, elapsedMs: Date.now() - startedAt })
          return
        }
      }
      const elapsedMs = Date.now() - startedAt
      if (elapsedMs >= readyTimeoutMs) {
        throw new HarnessError(
          'E_READY_TIMEOUT',
          `Page did not report ready within ${readyTimeoutMs} ms (waited ${elapsedMs} ms); check the page log for script errors or raise readyTimeoutMs`,
          { elapsedMs, timeoutMs: readyTimeoutMs, cycle: cycle.id },
        )
      }
      await delay(pollIntervalMs)
    }
  }

  async #stopServer(server: ApplicationServer, endpoint: string) {
    try {
      await server.stop()
    } catch (error) {
      this.#log('warn', 'server-stop-failed', { error })
    }
    const result = await probeEndpoint(endpoint, this.config.probeTimeoutMs)
    if (result.kind === 'refused') {
      this.#log('debug', 'server-shutdown-confirmed', { endpoint })
    } else if (result.kind === 'response') {
      this.#log('warn', 'server-still-answering', { endpoint, status: result.status })
    } else {
      this.#log('warn', 'server-shutdown-unconfirmed', { endpoint, error: result.error })
    }
  }

  /** Failure path of start/reload: tear everything down, then rethrow the original error. */
  async #abort(error: unknown): Promise<never> {
    this.#log('error', 'session-failed', { state: this.#state, error })
    if (TRANSITIONS[this.#state].includes('failed')) this.#transition('failed')
    try {
      await this.close()
    } catch (closeError) {
      throw new AggregateError(
        [error, closeError],
        `${describeError(error)} (teardown also failed: ${describeError(closeError)})`,
      )
    }
    throw error
  }

  // Runs inside the application server's request handling. The builder's throw cannot reach the
  // waiting caller through the call stack; it is parked in the serve cycle instead.
  #servePage = async (request: IncomingMessage): Promise<PageResponse> => {
    const cycle = this.#cycle
    if (!cycle || !cycle.claim()) {
      this.#log('warn', 'page-request-outside-cycle', { cycle: cycle?.id, url: request.url })
      return { status: 409, html: noCyclePage }
    }
    try {
      const root = await this.#builder(this, request)
      const html = renderDocument(root, {
        title: this.config.title,
        headScripts: [harnessBootstrap(cycle.id)],
      })
      cycle.succeed(root, request)
      return { status: 200, html }
    } catch (error) {
      cycle.fail(error)
      this.#log('error', 'page-builder-failed', { cycle: cycle.id, error })
      return { status: 500, html: errorPage(error) }
    }
  }
}

/** Creates and starts a session. When this rejects the session is already closed. */
export const createTestSession = async (
  builder: PageBuilder,
  options: SessionOptions = {},
): Promise<TestSession> => {
  const session = new TestSession(builder, options)
  await session.start()
  return session
}

/** Runs `fn` against a started session and always closes it afterwards. */
export const withTestSession = async <T>(
  builder: PageBuilder,
  fn: (session: TestSession) => T | Promise<T>,
  options: SessionOptions = {},
): Promise<T> => {
  const session = await createTestSession(builder, options)
  try {
    return await fn(session)
  } finally {
    await session.close()
  }
}
