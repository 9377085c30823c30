import { FetchDriver } from "./drivers/fetch"
import { DefaultFeedFactory } from "./feed"
import { AtomParser } from "./parsers/atom"
import { RdfParser } from "./parsers/rdf"
import { RssParser } from "./parsers/rss"
import { FeedReader } from "./reader"
import type { Parser } from "./parsers/parser"
import type { FeedFactory, HTTPOptions, HttpDriver } from "./types"

/**
 * Options for `createFeedReader`
 */
export interface FeedReaderOptions {
  /**
   * Transport used to pull feeds
   * @default a `FetchDriver` built from `httpOptions`
   */
  driver?: HttpDriver

  /**
   * HTTP options for the default driver. Ignored when `driver` is given.
   */
  httpOptions?: HTTPOptions

  /**
   * @default DefaultFeedFactory
   */
  factory?: FeedFactory

  /**
   * Parsers in dispatch order
   * @default [AtomParser, RssParser, RdfParser]
   */
  parsers?: Array<Parser>
}

/**
 * Build a reader wired with the built-in driver, factory and parsers
 */
export function createFeedReader(options: FeedReaderOptions = {}): FeedReader {
  const {
    driver = new FetchDriver(options.httpOptions),
    factory = new DefaultFeedFactory(),
    parsers = [new AtomParser(), new RssParser(), new RdfParser()],
  } = options

  const reader = new FeedReader(driver, factory)
  for (const parser of parsers) {
    reader.addParser(parser)
  }
  return reader
}
