import type { IncomingMessage } from 'node:http'

import type { PageRoot } from './page.js'

export type ServeOutcome =
  | { status: 'pending' }
  | { status: 'serving' }
  | { status: 'served'; root: PageRoot; request: IncomingMessage }
  | { status: 'failed'; error: unknown }

/**
 * Single-slot holder for one serve cycle. The server's request handler claims it and records
 * the page-builder's result or throw exactly once; the session polls it while waiting for the
 * page.
 */
export class ServeCycle {
  readonly id: number
  #outcome: ServeOutcome = { status: 'pending' }

  constructor(id: number) {
    this.id = id
  }

  get outcome(): ServeOutcome {
    return this.#outcome
  }

  /** The page-builder's throw, once the handler has recorded one. */
  get error(): unknown {
    return this.#outcome.status === 'failed' ? this.#outcome.error : undefined
  }

  get failed(): boolean {
    return this.#outcome.status === 'failed'
  }

  /** Claims the cycle for a request. Returns false if a request already claimed it. */
  claim(): boolean {
    if (this.#outcome.status !== 'pending') return false
    this.#outcome = { status: 'serving' }
    return true
  }

  succeed(root: PageRoot, request: IncomingMessage): void {
    this.#settle({ status: 'served', root, request })
  }

  fail(error: unknown): void {
    this.#settle({ status: 'failed', error })
  }

  #settle(outcome: ServeOutcome) {
    if (this.#outcome.status !== 'serving') {
      throw new Error(`Serve cycle ${this.id} cannot settle from ${this.#outcome.status}`)
    }
    this.#outcome = outcome
  }
}
