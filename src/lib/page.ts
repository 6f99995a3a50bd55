export type AttributeValue = string | number | boolean | null | undefined

export type RawHtml = { readonly kind: 'raw'; readonly html: string }

export type ElementNode = {
  readonly kind: 'element'
  readonly tag: string
  readonly attrs: Readonly<Record<string, AttributeValue>>
  readonly children: readonly PageNode[]
}

export type PageNode = ElementNode | RawHtml | string

export type PageChild = PageNode | number | null | undefined | false | readonly PageChild[]

/** What a page-builder returns: an element tree, or a string of trusted HTML. */
export type PageRoot = PageNode

const VOID_ELEMENTS = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'source',
  'track',
  'wbr',
])

const TAG_NAME = /^[a-zA-Z][a-zA-Z0-9-]*$/
const ATTRIBUTE_NAME = /^[^\s"'<>/=]+$/

const isNested = (child: PageChild): child is readonly PageChild[] => Array.isArray(child)

const flatten = (children: readonly PageChild[]): PageNode[] =>
  children.flatMap((child): PageNode[] => {
    if (child === null || child === undefined || child === false) return []
    if (typeof child === 'number') return [String(child)]
    if (isNested(child)) return flatten(child)
    return [child]
  })

/**
 * Builds an element node. `null`, `undefined` and `false` children are dropped; nested
 * arrays are flattened.
 */
export const h = (
  tag: string,
  attrs: Record<string, AttributeValue> = {},
  ...children: PageChild[]
): ElementNode => {
  if (!TAG_NAME.test(tag)) throw new Error(`Invalid tag name: ${tag}`)
  for (const name of Object.keys(attrs)) {
    if (!ATTRIBUTE_NAME.test(name)) throw new Error(`Invalid attribute name: ${name}`)
  }
  return { kind: 'element', tag: tag.toLowerCase(), attrs, children: flatten(children) }
}

/** Marks trusted markup (inline scripts, styles) that is emitted without escaping. */
export const raw = (html: string): RawHtml => ({ kind: 'raw', html })

export const escapeHtml = (text: string): string =>
  text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')

const renderAttributes = (attrs: Readonly<Record<string, AttributeValue>>): string =>
  Object.entries(attrs)
    .map(([name, value]) => {
      if (value === null || value === undefined || value === false) return ''
      if (value === true) return ` ${name}`
      return ` ${name}="${escapeHtml(String(value))}"`
    })
    .join('')

export const renderNode = (node: PageNode): string => {
  if (typeof node === 'string') return escapeHtml(node)
  if (node.kind === 'raw') return node.html
  const open = `<${node.tag}${renderAttributes(node.attrs)}>`
  if (VOID_ELEMENTS.has(node.tag)) return open
  return `${open}${node.children.map(renderNode).join('')}</${node.tag}>`
}

/**
 * Serializes a value for inline `<script>` content: `<` is escaped so the payload can
 * never close the script element.
 */
export const inlineJson = (value: unknown): string =>
  JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029')

export type DocumentOptions = {
  title: string
  /** Scripts placed in `<head>`, ahead of any page content. */
  headScripts: string[]
}

export const renderDocument = (root: PageRoot, opts: DocumentOptions): string => {
  const body = typeof root === 'string' ? root : renderNode(root)
  const scripts = opts.headScripts.map((source) => `<script>${source}</script>`).join('\n')
  return [
    '<!doctype html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(opts.title)}</title>`,
    scripts,
    '</head>',
    '<body>',
    body,
    '</body>',
    '</html>',
  ].join('\n')
}
