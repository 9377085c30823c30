/**
 * RSS/Atom feed reader
 *
 * This package fetches a syndication feed, recognises its dialect and turns
 * it into a normalized feed model:
 * - Conditional fetches (`If-Modified-Since`) with typed errors per status
 * - Atom 1.0, RSS 2.0 and RSS 1.0 (RDF) parsers, dispatched in order
 * - Item-count and recency filters
 * - Hydration of an existing feed for incremental reads
 *
 * @example Reading a feed
 * ```typescript
 * import { FeedSelector, createFeedReader } from 'syndication-reader'
 *
 * const reader = createFeedReader({ httpOptions: { timeout: 10_000 } })
 *
 * const feed = await reader.fetch(
 *   'https://blog.example.com/atom.xml',
 *   FeedSelector.limit(10)
 * )
 * for (const item of feed.items) {
 *   console.log(item.title, item.updated)
 * }
 * ```
 *
 * @example Incremental reads
 * ```typescript
 * import { FeedNotModifiedError, createFeedReader } from 'syndication-reader'
 *
 * const reader = createFeedReader()
 * const feed = await reader.fetch(url)
 * const lastRead = new Date()
 *
 * try {
 *   await reader.fetchInto(url, feed, lastRead)
 * } catch (error) {
 *   if (!(error instanceof FeedNotModifiedError)) throw error
 * }
 * ```
 */

// Reader
export { FeedReader } from "./reader"
export { createFeedReader, type FeedReaderOptions } from "./create"

// Content model
export { DefaultFeedFactory, FeedContent, FeedItem } from "./feed"
export {
  FeedSelector,
  type Feed,
  type FeedFactory,
  type FeedFormat,
  type FeedResponse,
  type HTTPOptions,
  type HttpDriver,
  type Item,
  type Media,
} from "./types"

// Transport
export { FetchDriver } from "./drivers/fetch"
export { FileDriver } from "./drivers/file"

// Parsers
export { FeedParser, type Parser } from "./parsers/parser"
export { AtomParser } from "./parsers/atom"
export { RssParser } from "./parsers/rss"
export { RdfParser } from "./parsers/rdf"
export { parseXmlDocument, type XmlDocument, type XmlElement } from "./xml"

// Filters
export {
  LimitFilter,
  ModifiedSinceFilter,
  applyFilters,
  type FeedFilter,
} from "./filters"

// Error types
export {
  FeedReaderError,
  FeedNotFoundError,
  FeedNotModifiedError,
  FeedServerError,
  FeedForbiddenError,
  FeedCannotBeReadError,
  ParserSelectionError,
  MalformedFeedError,
  InvalidFeedStructureError,
  FeedURLRequiredError,
  InvalidLimitError,
  FactoryRequiredError,
  FeedTimeoutError,
  FeedFetchError,
  classifyStatus,
  errorForResponse,
  type FeedErrorKind,
  type StatusClass,
} from "./errors"
