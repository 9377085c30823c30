/**
 * Enclosure attached to an item (podcast audio, images, ...)
 */
export interface Media {
  url: string
  type?: string
  length?: number
}

/**
 * One entry of a feed, whatever its dialect
 */
export interface Item {
  id?: string
  title?: string
  summary?: string
  description?: string
  link?: string
  author?: string
  comment?: string
  updated?: Date
  categories: Array<string>
  medias: Array<Media>
}

/**
 * Normalized feed. Mutable so that parsers can hydrate it and callers can
 * hand the same instance back for a later read.
 */
export interface Feed {
  id?: string
  title?: string
  description?: string
  link?: string
  lastModified?: Date
  readonly items: ReadonlyArray<Item>
  addItem: (item: Item) => this
}

/**
 * Creates the empty value objects parsers populate
 */
export interface FeedFactory {
  newFeed: () => Feed
  newItem: () => Item
}

/**
 * Raw result of a transport fetch
 */
export interface FeedResponse {
  statusCode: number
  body: string
  message: string
}

/**
 * Transport able to perform a conditional fetch
 */
export interface HttpDriver {
  getResponse: (url: string, modifiedSince: Date) => Promise<FeedResponse>
}

/**
 * HTTP options for fetching feeds
 */
export interface HTTPOptions {
  /**
   * Request timeout in milliseconds
   * @default 30000
   */
  timeout?: number
  headers?: Record<string, string>
  /**
   * @default `syndication-reader/1.0`
   */
  userAgent?: string
}

/**
 * Feed dialects understood by the built-in parsers
 */
export type FeedFormat = `atom` | `rss` | `rdf`

/**
 * What to keep from a feed: everything, the first `count` items, or the
 * items updated after `date` (which also makes the fetch conditional).
 */
export type FeedSelector =
  | { type: `all` }
  | { type: `limit`; count: number }
  | { type: `since`; date: Date }

export const FeedSelector = {
  all: (): FeedSelector => ({ type: `all` }),
  limit: (count: number): FeedSelector => ({ type: `limit`, count }),
  since: (date: Date): FeedSelector => ({ type: `since`, date }),
}
