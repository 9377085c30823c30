import { XMLParser, XMLValidator } from "fast-xml-parser"
import DebugModule from "debug"
import { MalformedFeedError } from "./errors"

const debug = DebugModule.debug(`syndication:xml`)

/**
 * Node produced by the XML parser: text, element, or repeated element
 */
export type XmlValue = string | XmlElement | Array<XmlValue>

export interface XmlElement {
  [name: string]: XmlValue
}

/**
 * A parsed document, reduced to what parsers need to recognise it
 */
export interface XmlDocument {
  /** Qualified name of the root element, e.g. `rss`, `feed`, `rdf:RDF` */
  root: string
  /** Default namespace declared on the root element */
  namespace?: string
  element: XmlElement
}

const ATTRIBUTE_PREFIX = `@_`
const TEXT_NODE = `#text`

// Elements that repeat in a feed; always exposed as arrays so a single
// occurrence reads the same as many.
const REPEATED = new Set([
  `rss.channel.item`,
  `rss.channel.category`,
  `rss.channel.item.category`,
  `rss.channel.item.enclosure`,
  `feed.link`,
  `feed.entry`,
  `feed.entry.link`,
  `feed.entry.category`,
  `feed.entry.author`,
  `rdf:RDF.item`,
])

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_NODE,
  removeNSPrefix: false,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  isArray: (_name: string, jPath: string) => REPEATED.has(jPath),
})

const DEFAULT_CHARSET = `utf-8`

/**
 * Charset named by a `Content-Type` header value
 */
export function charsetFromContentType(
  contentType: string | null | undefined
): string | undefined {
  const match = contentType?.match(/;\s*charset\s*=\s*"?([^";\s]+)"?/i)
  return match?.[1]
}

/**
 * Charset named by the `encoding` of an XML declaration
 */
export function charsetFromDeclaration(bytes: Uint8Array): string | undefined {
  // The declaration is ASCII in every encoding a feed can use
  const head = new TextDecoder(`latin1`).decode(bytes.subarray(0, 256))
  const match = head.match(
    /^\s*<\?xml[^>]*\sencoding\s*=\s*["']([A-Za-z][\w.:-]*)["']/
  )
  return match?.[1]
}

/**
 * Decode a raw feed body. The `Content-Type` charset wins over the XML
 * declaration; UTF-8 applies when neither names one.
 */
export function decodeFeedBody(
  bytes: Uint8Array,
  contentType?: string | null
): string {
  const charset =
    charsetFromContentType(contentType) ??
    charsetFromDeclaration(bytes) ??
    DEFAULT_CHARSET

  let decoder: TextDecoder
  try {
    decoder = new TextDecoder(charset)
  } catch (error) {
    if (!(error instanceof RangeError)) throw error
    debug(`Unsupported charset ${charset}, decoding as ${DEFAULT_CHARSET}`)
    decoder = new TextDecoder(DEFAULT_CHARSET)
  }
  return decoder.decode(bytes)
}

/**
 * Validate and parse a response body into an `XmlDocument`
 */
export function parseXmlDocument(body: string): XmlDocument {
  // Leading whitespace or a byte order mark would reject the XML declaration
  const source = body.trimStart()
  const validation = XMLValidator.validate(source)
  if (validation !== true) {
    throw new MalformedFeedError(validation.err.msg, {
      line: validation.err.line,
    })
  }

  const data: XmlElement = parser.parse(source)
  const root = Object.keys(data).find(
    (name) => !name.startsWith(`?`) && !name.startsWith(`#`)
  )
  if (root === undefined) {
    throw new MalformedFeedError(`document has no root element`)
  }

  const element = asElement(data[root]) ?? {}
  debug(`Parsed document with root <${root}>`)

  return {
    root,
    namespace: attribute(element, `xmlns`),
    element,
  }
}

/**
 * Narrow a node to an element. Text-only elements become `{ "#text": ... }`.
 */
export function asElement(value: XmlValue | undefined): XmlElement | undefined {
  if (value === undefined || Array.isArray(value)) return undefined
  if (typeof value === `string`) return { [TEXT_NODE]: value }
  return value
}

/**
 * All occurrences of a child element, in document order
 */
export function children(
  element: XmlElement,
  name: string
): Array<XmlValue> {
  const value = element[name]
  if (value === undefined) return []
  return Array.isArray(value) ? value : [value]
}

/**
 * All occurrences of a child element, as elements
 */
export function childElements(
  element: XmlElement,
  name: string
): Array<XmlElement> {
  const result: Array<XmlElement> = []
  for (const value of children(element, name)) {
    const node = asElement(value)
    if (node) result.push(node)
  }
  return result
}

/**
 * Non-empty texts of every child with that name
 */
export function childTexts(element: XmlElement, name: string): Array<string> {
  return children(element, name)
    .map((value) => text(value))
    .filter((value): value is string => value !== undefined)
}

/**
 * First occurrence of a child element
 */
export function child(
  element: XmlElement,
  name: string
): XmlValue | undefined {
  return children(element, name)[0]
}

/**
 * Text content of a node, undefined when empty
 */
export function text(value: XmlValue | undefined): string | undefined {
  if (value === undefined) return undefined
  if (Array.isArray(value)) return text(value[0])
  const content = typeof value === `string` ? value : value[TEXT_NODE]
  return typeof content === `string` && content !== `` ? content : undefined
}

/**
 * Concatenated text of a node and everything below it, undefined when empty.
 * Attributes are skipped; sibling texts are joined with a single space.
 */
export function textContent(value: XmlValue | undefined): string | undefined {
  const parts: Array<string> = []
  const collect = (node: XmlValue): void => {
    if (typeof node === `string`) {
      parts.push(node)
    } else if (Array.isArray(node)) {
      node.forEach(collect)
    } else {
      for (const [name, nested] of Object.entries(node)) {
        if (!name.startsWith(ATTRIBUTE_PREFIX)) collect(nested)
      }
    }
  }
  if (value !== undefined) collect(value)

  const content = parts.join(` `).replace(/\s+/g, ` `).trim()
  return content !== `` ? content : undefined
}

/**
 * Text content of the first child with that name
 */
export function childText(
  element: XmlElement,
  name: string
): string | undefined {
  return text(child(element, name))
}

/**
 * Attribute of an element node
 */
export function attribute(
  value: XmlValue | undefined,
  name: string
): string | undefined {
  const element = asElement(value)
  const attr = element?.[`${ATTRIBUTE_PREFIX}${name}`]
  return typeof attr === `string` ? attr : undefined
}
