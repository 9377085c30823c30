import { describe, expect, it, vi } from "vitest"
import {
  FeedCannotBeReadError,
  FeedForbiddenError,
  FeedNotFoundError,
  FeedNotModifiedError,
  FeedReaderError,
  FeedServerError,
  FeedTimeoutError,
  classifyStatus,
  errorForResponse,
} from "../src/errors"
import { DefaultFeedFactory, FeedContent } from "../src/feed"
import { AtomParser } from "../src/parsers/atom"
import { FeedReader } from "../src/reader"
import { sampleAtomFeed, stubDriver } from "./feeds"
import type { FeedResponse } from "../src/types"

function errorResponse(statusCode: number, message: string): FeedResponse {
  return { statusCode, body: sampleAtomFeed, message }
}

describe(`Feed Reader Errors`, () => {
  describe(`classifyStatus`, () => {
    it.each([
      { statusCode: 200, expected: `ok` },
      { statusCode: 204, expected: `ok` },
      { statusCode: 301, expected: `redirection` },
      { statusCode: 302, expected: `redirection` },
      { statusCode: 304, expected: `not-modified` },
      { statusCode: 403, expected: `forbidden` },
      { statusCode: 404, expected: `not-found` },
      { statusCode: 500, expected: `server-error` },
      { statusCode: 503, expected: `server-error` },
      { statusCode: 401, expected: `other` },
      { statusCode: 410, expected: `other` },
      { statusCode: 100, expected: `other` },
    ])(
      `should classify $statusCode as $expected`,
      ({ statusCode, expected }) => {
        expect(classifyStatus(statusCode)).toBe(expected)
      }
    )
  })

  describe(`errorForResponse`, () => {
    it(`should not produce an error for success or redirection`, () => {
      expect(errorForResponse(errorResponse(200, `OK`))).toBeUndefined()
      expect(errorForResponse(errorResponse(302, `Found`))).toBeUndefined()
    })

    it(`should keep the status code on every error`, () => {
      const error = errorForResponse(errorResponse(503, `Service Unavailable`))

      expect(error).toBeInstanceOf(FeedServerError)
      expect(error?.statusCode).toBe(503)
      expect(error?.kind).toBe(`server-error`)
      expect(error?.name).toBe(`FeedServerError`)
    })
  })

  describe(`parseBody status mapping`, () => {
    function setup() {
      const atom = new AtomParser()
      const reader = new FeedReader(
        stubDriver(errorResponse(200, `OK`)),
        new DefaultFeedFactory()
      ).addParser(atom)
      return {
        reader,
        canHandle: vi.spyOn(atom, `canHandle`),
        parse: vi.spyOn(atom, `parse`),
      }
    }

    it(`should throw FeedNotFoundError with the original message`, () => {
      const { reader } = setup()

      expect(() =>
        reader.parseBody(
          errorResponse(404, `Not Found: gone`),
          new FeedContent()
        )
      ).toThrow(new FeedNotFoundError(`Not Found: gone`))
    })

    it(`should throw FeedNotModifiedError without invoking any parser`, () => {
      const { reader, canHandle, parse } = setup()

      expect(() =>
        reader.parseBody(errorResponse(304, `Not Modified`), new FeedContent())
      ).toThrow(FeedNotModifiedError)
      expect(canHandle).not.toHaveBeenCalled()
      expect(parse).not.toHaveBeenCalled()
    })

    it(`should throw FeedServerError for server errors`, () => {
      const { reader } = setup()

      expect(() =>
        reader.parseBody(
          errorResponse(500, `Internal Server Error`),
          new FeedContent()
        )
      ).toThrow(FeedServerError)
    })

    it(`should throw FeedForbiddenError carrying the message`, async () => {
      const reader = new FeedReader(
        stubDriver(errorResponse(403, `Access denied`)),
        new DefaultFeedFactory()
      ).addParser(new AtomParser())

      const error = await reader
        .fetch(`https://example.com/private.xml`)
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(FeedForbiddenError)
      expect(error).toBeInstanceOf(FeedReaderError)
      expect(error).toMatchObject({
        message: `Access denied`,
        statusCode: 403,
        kind: `forbidden`,
      })
    })

    it(`should throw FeedCannotBeReadError with the code for other statuses`, () => {
      const { reader } = setup()

      let caught: unknown
      try {
        reader.parseBody(errorResponse(410, `Gone`), new FeedContent())
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(FeedCannotBeReadError)
      expect(caught).toMatchObject({ message: `Gone`, statusCode: 410 })
    })

    it(`should leave the feed untouched on error`, () => {
      const { reader } = setup()
      const feed = new FeedContent()

      expect(() =>
        reader.parseBody(errorResponse(500, `Internal Server Error`), feed)
      ).toThrow()
      expect(feed.title).toBeUndefined()
      expect(feed.items).toHaveLength(0)
    })
  })

  describe(`messages`, () => {
    it(`should describe timeouts`, () => {
      const error = new FeedTimeoutError(`https://example.com/slow.xml`, 50)

      expect(error.message).toBe(
        `Timeout after 50ms while fetching feed from https://example.com/slow.xml`
      )
      expect(error.kind).toBe(`timeout`)
    })
  })
})
