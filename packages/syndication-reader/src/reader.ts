import DebugModule from "debug"
import {
  FeedURLRequiredError,
  ParserSelectionError,
  errorForResponse,
} from "./errors"
import { LimitFilter, ModifiedSinceFilter } from "./filters"
import { parseXmlDocument } from "./xml"
import type { FeedFilter } from "./filters"
import type { Parser } from "./parsers/parser"
import type {
  Feed,
  FeedFactory,
  FeedResponse,
  FeedSelector,
  HttpDriver,
} from "./types"
import type { XmlDocument } from "./xml"

const debug = DebugModule.debug(`syndication:reader`)

const EPOCH = new Date(0)

/**
 * Reads any supported feed.
 *
 * The reader pulls documents through an `HttpDriver` and dispatches them to
 * the first registered parser that recognises them. Registration order
 * decides between parsers that accept the same document.
 */
export class FeedReader {
  private readonly parsers: Array<Parser> = []
  private readonly driver: HttpDriver
  private readonly factory: FeedFactory

  constructor(driver: HttpDriver, factory: FeedFactory) {
    this.driver = driver
    this.factory = factory
  }

  /**
   * Register a parser after those already known, sharing the reader's factory
   */
  addParser(parser: Parser): this {
    parser.setFactory(this.factory)
    this.parsers.push(parser)
    return this
  }

  getParsers(): ReadonlyArray<Parser> {
    return this.parsers
  }

  getDriver(): HttpDriver {
    return this.driver
  }

  /**
   * Read a feed, keeping everything, the first `count` items, or the items
   * updated after a date
   */
  async fetch(
    url: string,
    selector: FeedSelector = { type: `all` }
  ): Promise<Feed> {
    switch (selector.type) {
      case `all`:
        return this.fetchFiltered(url, [])
      case `limit`:
        return this.fetchFiltered(url, [new LimitFilter(selector.count)])
      case `since`:
        return this.fetchSince(url, selector.date)
    }
  }

  /**
   * Read a feed with explicit filters. `modifiedSince` only makes the fetch
   * conditional; it does not filter items.
   */
  async fetchFiltered(
    url: string,
    filters: ReadonlyArray<FeedFilter>,
    modifiedSince?: Date
  ): Promise<Feed> {
    const response = await this.fetchResponse(url, modifiedSince)
    return this.parseBody(response, this.factory.newFeed(), filters)
  }

  /**
   * Read the items updated after `since`, asking the server for a 304 when
   * nothing changed
   */
  fetchSince(url: string, since: Date): Promise<Feed> {
    return this.fetchFiltered(url, [new ModifiedSinceFilter(since)], since)
  }

  /**
   * Same as `fetchSince`, hydrating the given feed instead of a new one
   */
  async fetchInto<TFeed extends Feed>(
    url: string,
    feed: TFeed,
    since: Date
  ): Promise<TFeed> {
    const response = await this.fetchResponse(url, since)
    return this.parseBody(response, feed, [new ModifiedSinceFilter(since)])
  }

  /**
   * Raw transport call; a missing timestamp means the epoch
   */
  async fetchResponse(
    url: string,
    modifiedSince?: Date
  ): Promise<FeedResponse> {
    if (!url) {
      throw new FeedURLRequiredError()
    }
    return this.driver.getResponse(url, modifiedSince ?? EPOCH)
  }

  /**
   * Turn a response into a feed. Statuses other than success and redirection
   * fail before the body is looked at.
   */
  parseBody<TFeed extends Feed>(
    response: FeedResponse,
    feed: TFeed,
    filters: ReadonlyArray<FeedFilter> = []
  ): TFeed {
    const error = errorForResponse(response)
    if (error) {
      debug(`Response ${response.statusCode}: ${response.message}`)
      throw error
    }

    const document = parseXmlDocument(response.body)
    return this.selectParser(document).parse(document, feed, filters)
  }

  /**
   * First registered parser accepting the document
   */
  selectParser(document: XmlDocument): Parser {
    const parser = this.parsers.find((candidate) =>
      candidate.canHandle(document)
    )
    if (!parser) {
      throw new ParserSelectionError(document.root)
    }

    debug(`Selected ${parser.constructor.name} for <${document.root}>`)
    return parser
  }
}
