import DebugModule from "debug"
import {
  FactoryRequiredError,
  InvalidFeedStructureError,
  ParserSelectionError,
} from "../errors"
import { applyFilters } from "../filters"
import { newestDate } from "../utils"
import type { FeedFilter } from "../filters"
import type { Feed, FeedFactory, FeedFormat, Item } from "../types"
import type { XmlDocument, XmlElement } from "../xml"

const debug = DebugModule.debug(`syndication:parser`)

/**
 * Byte length of an enclosure, undefined when absent or not a positive number
 */
export function parseLength(value: string | undefined): number | undefined {
  const length = Number(value)
  return Number.isFinite(length) && length > 0 ? length : undefined
}

/**
 * Anything the reader can register and dispatch to
 */
export interface Parser {
  setFactory: (factory: FeedFactory) => unknown
  canHandle: (document: XmlDocument) => boolean
  parse: <TFeed extends Feed>(
    document: XmlDocument,
    feed: TFeed,
    filters: ReadonlyArray<FeedFilter>
  ) => TFeed
}

/**
 * Base class for dialect parsers.
 *
 * Subclasses recognise their dialect from the root element and map it onto
 * the feed model; this class owns filtering and the hydration contract.
 */
export abstract class FeedParser implements Parser {
  abstract readonly format: FeedFormat

  protected factory: FeedFactory | undefined

  constructor(factory?: FeedFactory) {
    this.factory = factory
  }

  setFactory(factory: FeedFactory): this {
    this.factory = factory
    return this
  }

  /**
   * Cheap structural check on the root element
   */
  abstract canHandle(document: XmlDocument): boolean

  /**
   * Hydrate `feed` from `document`, keeping the items every filter accepts.
   * Returns the feed it was given.
   */
  parse<TFeed extends Feed>(
    document: XmlDocument,
    feed: TFeed,
    filters: ReadonlyArray<FeedFilter> = []
  ): TFeed {
    if (!this.canHandle(document)) {
      throw new ParserSelectionError(document.root)
    }

    const factory = this.requireFactory()
    const container = this.getContainer(document)
    this.hydrateFeed(container, feed)

    const items = this.getItemElements(document, container).map((element) =>
      this.hydrateItem(element, factory.newItem())
    )
    if (feed.lastModified === undefined) {
      feed.lastModified = newestDate(items.map((item) => item.updated))
    }

    const accepted = applyFilters(items, filters)
    for (const item of accepted) {
      feed.addItem(item)
    }

    debug(
      `${this.format}: kept ${accepted.length} of ${items.length} items`
    )
    return feed
  }

  /**
   * Element holding the feed metadata. Throws when it is missing.
   */
  protected abstract getContainer(document: XmlDocument): XmlElement

  protected abstract getItemElements(
    document: XmlDocument,
    container: XmlElement
  ): Array<XmlElement>

  /**
   * Copy the feed metadata. Must assign `lastModified`, even to undefined, so
   * that a re-used feed does not keep a stale date.
   */
  protected abstract hydrateFeed(container: XmlElement, feed: Feed): void

  protected abstract hydrateItem(element: XmlElement, item: Item): Item

  protected missing(name: string): never {
    throw new InvalidFeedStructureError(this.format, name)
  }

  private requireFactory(): FeedFactory {
    if (!this.factory) {
      throw new FactoryRequiredError(this.constructor.name)
    }
    return this.factory
  }
}
