import type { FeedResponse } from "./types"

/**
 * Discriminator shared by every error the reader throws
 */
export type FeedErrorKind =
  | `not-found`
  | `not-modified`
  | `server-error`
  | `forbidden`
  | `cannot-be-read`
  | `parser-selection`
  | `malformed`
  | `invalid-structure`
  | `invalid-argument`
  | `timeout`
  | `fetch`

type FeedReaderErrorOptions = {
  statusCode?: number
  cause?: unknown
}

/**
 * Base error class for feed reader errors
 */
export abstract class FeedReaderError extends Error {
  abstract readonly kind: FeedErrorKind
  readonly statusCode: number | undefined

  constructor(message: string, options?: FeedReaderErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = this.constructor.name
    this.statusCode = options?.statusCode
  }
}

/**
 * Error thrown when the server answers 404
 */
export class FeedNotFoundError extends FeedReaderError {
  readonly kind = `not-found`

  constructor(message: string, statusCode = 404) {
    super(message, { statusCode })
  }
}

/**
 * Error thrown when the server answers 304 to a conditional fetch
 */
export class FeedNotModifiedError extends FeedReaderError {
  readonly kind = `not-modified`

  constructor(message: string, statusCode = 304) {
    super(message, { statusCode })
  }
}

/**
 * Error thrown when the server answers with a 5xx status
 */
export class FeedServerError extends FeedReaderError {
  readonly kind = `server-error`

  constructor(message: string, statusCode = 500) {
    super(message, { statusCode })
  }
}

/**
 * Error thrown when the server answers 403
 */
export class FeedForbiddenError extends FeedReaderError {
  readonly kind = `forbidden`

  constructor(message: string, statusCode = 403) {
    super(message, { statusCode })
  }
}

/**
 * Error thrown for any other status that does not allow parsing
 */
export class FeedCannotBeReadError extends FeedReaderError {
  readonly kind = `cannot-be-read`
  declare readonly statusCode: number

  constructor(message: string, statusCode: number) {
    super(message, { statusCode })
  }
}

/**
 * Error thrown when no registered parser accepts a document
 */
export class ParserSelectionError extends FeedReaderError {
  readonly kind = `parser-selection`
  readonly root: string

  constructor(root: string) {
    super(`No parser can handle this document (root element <${root}>)`)
    this.root = root
  }
}

/**
 * Error thrown when the response body is not well-formed XML
 */
export class MalformedFeedError extends FeedReaderError {
  readonly kind = `malformed`
  readonly line: number | undefined

  constructor(
    message: string,
    options?: FeedReaderErrorOptions & { line?: number }
  ) {
    super(`Malformed feed document: ${message}`, options)
    this.line = options?.line
  }
}

/**
 * Error thrown when a parser meets a document missing a mandatory element
 */
export class InvalidFeedStructureError extends FeedReaderError {
  readonly kind = `invalid-structure`

  constructor(format: string, missing: string) {
    super(`Invalid ${format} feed structure: missing <${missing}>`)
  }
}

/**
 * Error thrown when feed URL is required but not provided
 */
export class FeedURLRequiredError extends FeedReaderError {
  readonly kind = `invalid-argument`

  constructor() {
    super(`Feed URL is required to read a feed`)
  }
}

/**
 * Error thrown when an item-count limit is not a positive integer
 */
export class InvalidLimitError extends FeedReaderError {
  readonly kind = `invalid-argument`

  constructor(limit: number) {
    super(`Invalid item limit: ${limit}. Must be a positive integer.`)
  }
}

/**
 * Error thrown when a parser is used before a factory was injected
 */
export class FactoryRequiredError extends FeedReaderError {
  readonly kind = `invalid-argument`

  constructor(parser: string) {
    super(
      `${parser} has no feed factory. Register it with FeedReader.addParser or call setFactory first.`
    )
  }
}

/**
 * Error thrown when timeout occurs while fetching feed
 */
export class FeedTimeoutError extends FeedReaderError {
  readonly kind = `timeout`

  constructor(url: string, timeout: number) {
    super(`Timeout after ${timeout}ms while fetching feed from ${url}`)
  }
}

/**
 * Error thrown when the transport fails before any response is received
 */
export class FeedFetchError extends FeedReaderError {
  readonly kind = `fetch`

  constructor(url: string, cause?: unknown) {
    super(
      cause instanceof Error
        ? `Failed to fetch feed from ${url}: ${cause.message}`
        : `Failed to fetch feed from ${url}`,
      { cause }
    )
  }
}

/**
 * Maps a response whose status forbids parsing to the matching error.
 * Returns undefined for success and redirection statuses.
 */
export function errorForResponse(
  response: FeedResponse
): FeedReaderError | undefined {
  const { statusCode, message } = response

  switch (classifyStatus(statusCode)) {
    case `ok`:
    case `redirection`:
      return undefined
    case `not-found`:
      return new FeedNotFoundError(message, statusCode)
    case `not-modified`:
      return new FeedNotModifiedError(message, statusCode)
    case `server-error`:
      return new FeedServerError(message, statusCode)
    case `forbidden`:
      return new FeedForbiddenError(message, statusCode)
    case `other`:
      return new FeedCannotBeReadError(message, statusCode)
  }
}

/**
 * Status families the reader distinguishes
 */
export type StatusClass =
  | `ok`
  | `redirection`
  | `not-found`
  | `not-modified`
  | `server-error`
  | `forbidden`
  | `other`

/**
 * Classify a numeric HTTP status
 */
export function classifyStatus(statusCode: number): StatusClass {
  if (statusCode === 304) return `not-modified`
  if (statusCode === 403) return `forbidden`
  if (statusCode === 404) return `not-found`
  if (statusCode >= 200 && statusCode < 300) return `ok`
  if (statusCode >= 300 && statusCode < 400) return `redirection`
  if (statusCode >= 500 && statusCode < 600) return `server-error`
  return `other`
}
