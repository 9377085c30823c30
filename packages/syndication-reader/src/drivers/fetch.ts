import DebugModule from "debug"
import { FeedFetchError, FeedTimeoutError } from "../errors"
import { decodeFeedBody } from "../xml"
import type { FeedResponse, HTTPOptions, HttpDriver } from "../types"

const debug = DebugModule.debug(`syndication:driver:fetch`)

export const DEFAULT_TIMEOUT = 30000
export const DEFAULT_USER_AGENT = `syndication-reader/1.0`
export const FEED_ACCEPT = [
  `application/atom+xml`,
  `application/rss+xml`,
  `application/rdf+xml`,
  `application/xml`,
  `text/xml`,
].join(`, `)

const IF_MODIFIED_SINCE = `If-Modified-Since`

/**
 * HTTP driver built on the global `fetch`.
 *
 * Sends `If-Modified-Since` whenever the timestamp is after the epoch, so the
 * server can answer 304 instead of the whole document. That date replaces an
 * `If-Modified-Since` given in `headers`; at the epoch the caller's header is
 * sent unchanged. The body is decoded with the charset of `Content-Type`, or
 * of the XML declaration.
 */
export class FetchDriver implements HttpDriver {
  private readonly options: HTTPOptions

  constructor(options: HTTPOptions = {}) {
    this.options = options
  }

  async getResponse(url: string, modifiedSince: Date): Promise<FeedResponse> {
    const {
      timeout = DEFAULT_TIMEOUT,
      headers = {},
      userAgent = DEFAULT_USER_AGENT,
    } = this.options

    const requestHeaders: Record<string, string> = {
      "User-Agent": userAgent,
      Accept: FEED_ACCEPT,
      ...headers,
    }
    if (modifiedSince.getTime() > 0) {
      for (const name of Object.keys(requestHeaders)) {
        if (name.toLowerCase() === IF_MODIFIED_SINCE.toLowerCase()) {
          delete requestHeaders[name]
        }
      }
      requestHeaders[IF_MODIFIED_SINCE] = modifiedSince.toUTCString()
    }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeout)

    try {
      debug(`GET ${url}`)
      const response = await fetch(url, {
        signal: controller.signal,
        headers: requestHeaders,
        redirect: `follow`,
      })
      const bytes = new Uint8Array(await response.arrayBuffer())
      const body = decodeFeedBody(bytes, response.headers.get(`content-type`))
      debug(`${url} answered ${response.status} (${body.length} chars)`)

      return {
        statusCode: response.status,
        body,
        message: response.statusText,
      }
    } catch (error) {
      if (error instanceof Error && error.name === `AbortError`) {
        throw new FeedTimeoutError(url, timeout)
      }
      throw new FeedFetchError(url, error)
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
