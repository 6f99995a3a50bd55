import { HARNESS_GLOBAL } from './harness-client.js'

/** A piece of script source, evaluated in the page by the bridge. */
export class JsExpression {
  readonly source: string

  constructor(source: string) {
    this.source = source
  }

  toString(): string {
    return this.source
  }
}

/**
 * Opaque reference to an object living in the page. Only valid for the serve cycle it was
 * resolved in: the page rejects it once a reload has replaced the page and its handle table.
 */
export class RemoteHandle extends JsExpression {
  readonly id: number
  readonly cycle: number

  constructor(id: number, cycle: number) {
    super(`globalThis.${HARNESS_GLOBAL}.handle(${id}, ${cycle})`)
    this.id = id
    this.cycle = cycle
  }
}

const literal = (value: unknown): string => {
  if (value instanceof JsExpression) return `(${value.source})`
  if (value === undefined) return 'undefined'
  if (typeof value === 'number' && !Number.isFinite(value)) return String(value)
  if (Array.isArray(value)) return `[${value.map(literal).join(', ')}]`
  return JSON.stringify(value)
}

/**
 * Tagged template for page-side script. Interpolated expressions and handles are inserted as
 * code; every other value becomes a JSON literal, so strings can never inject script.
 *
 * ```ts
 * js`${handle}.textContent`
 * js`document.querySelector(${selector})`
 * ```
 */
export const js = (strings: TemplateStringsArray, ...values: unknown[]): JsExpression => {
  let source = strings[0] ?? ''
  values.forEach((value, index) => {
    source += literal(value) + (strings[index + 1] ?? '')
  })
  return new JsExpression(source)
}

export const toSource = (expression: JsExpression | string): string =>
  typeof expression === 'string' ? expression : expression.source
