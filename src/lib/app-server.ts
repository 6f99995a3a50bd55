import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from 'node:http'

import { HarnessError } from './errors.js'
import type { LogLevel, RunLogger } from './run-log.js'

/** Answers 200 without invoking the page-builder; used to probe a session's endpoint. */
export const HEALTH_PATH = '/__harness/health'

export type PageResponse = { status: number; html: string }

export type PageRequestHandler = (request: IncomingMessage) => Promise<PageResponse>

export type BindOptions = {
  host: string
  port: number
  handler: PageRequestHandler
  logger?: RunLogger | null | undefined
}

/**
 * HTTP server of one session. Serves the page at `/`, the health probe, and 404 for anything
 * else (favicon requests included).
 */
export class ApplicationServer {
  readonly host: string
  readonly port: number
  #server: Server
  #handler: PageRequestHandler
  #logger: RunLogger | null

  private constructor(
    server: Server,
    host: string,
    port: number,
    handler: PageRequestHandler,
    logger: RunLogger | null,
  ) {
    this.#server = server
    this.host = host
    this.port = port
    this.#handler = handler
    this.#logger = logger
  }

  static async bind(opts: BindOptions): Promise<ApplicationServer> {
    const server = createServer()
    await new Promise<void>((resolve, reject) => {
      const onError = (error: NodeJS.ErrnoException) => {
        server.off('listening', onListening)
        reject(
          new HarnessError(
            'E_BIND',
            `Could not bind ${opts.host}:${opts.port} (${error.code ?? error.message})`,
            { host: opts.host, port: opts.port, code: error.code },
            { cause: error },
          ),
        )
      }
      const onListening = () => {
        server.off('error', onError)
        resolve()
      }
      server.once('error', onError)
      server.once('listening', onListening)
      server.listen(opts.port, opts.host)
    })

    const address = server.address()
    const port = address && typeof address === 'object' ? address.port : opts.port
    const app = new ApplicationServer(server, opts.host, port, opts.handler, opts.logger ?? null)
    server.on('request', app.#onRequest)
    app.#log('info', 'server-bound', { host: opts.host, port })
    return app
  }

  get isRunning(): boolean {
    return this.#server.listening
  }

  async stop(): Promise<void> {
    if (!this.#server.listening) return
    await new Promise<void>((resolve, reject) => {
      this.#server.close((error) => (error ? reject(error) : resolve()))
      // Keep-alive sockets would otherwise hold `close` open.
      this.#server.closeAllConnections()
    })
    this.#log('info', 'server-stopped', { host: this.host, port: this.port })
  }

  #log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    this.#logger?.log('server', level, message, meta)
  }

  #onRequest = (request: IncomingMessage, response: ServerResponse) => {
    this.#route(request, response).catch((error: unknown) => {
      this.#log('error', 'request-failed', { url: request.url, error })
      if (!response.headersSent) response.statusCode = 500
      response.end()
    })
  }

  async #route(request: IncomingMessage, response: ServerResponse): Promise<void> {
    const { pathname } = new URL(request.url ?? '/', 'http://localhost')
    if (request.method !== 'GET' && request.method !== 'HEAD') {
      send(response, 405, 'text/plain', 'Method Not Allowed')
      return
    }
    if (pathname === HEALTH_PATH) {
      send(response, 200, 'application/json', JSON.stringify({ ok: true }))
      return
    }
    if (pathname !== '/') {
      send(response, 404, 'text/plain', 'Not Found')
      return
    }
    const page = await this.#handler(request)
    this.#log(page.status === 200 ? 'debug' : 'warn', 'page-served', { status: page.status })
    send(response, page.status, 'text/html; charset=utf-8', page.html)
  }
}

const send = (response: ServerResponse, status: number, type: string, body: string) => {
  response.writeHead(status, {
    'content-type': type,
    'cache-control': 'no-store',
    'content-length': Buffer.byteLength(body),
  })
  response.end(body)
}
