import { readFile, stat } from "node:fs/promises"
import { fileURLToPath } from "node:url"
import DebugModule from "debug"
import { FeedFetchError } from "../errors"
import { decodeFeedBody } from "../xml"
import type { FeedResponse, HttpDriver } from "../types"

const debug = DebugModule.debug(`syndication:driver:file`)

function hasCode(error: unknown, ...codes: Array<string>): boolean {
  return (
    error instanceof Error &&
    `code` in error &&
    typeof error.code === `string` &&
    codes.includes(error.code)
  )
}

/**
 * Driver reading feeds from the local filesystem, answering with the same
 * status codes an HTTP server would. Accepts paths and `file:` URLs; the
 * body is decoded with the charset of its XML declaration.
 */
export class FileDriver implements HttpDriver {
  async getResponse(url: string, modifiedSince: Date): Promise<FeedResponse> {
    try {
      const path = url.startsWith(`file:`) ? fileURLToPath(url) : url
      const stats = await stat(path)
      if (
        modifiedSince.getTime() > 0 &&
        stats.mtime.getTime() <= modifiedSince.getTime()
      ) {
        debug(`${path} not modified since ${modifiedSince.toISOString()}`)
        return { statusCode: 304, body: ``, message: `Not Modified` }
      }

      const body = decodeFeedBody(await readFile(path))
      return { statusCode: 200, body, message: `OK` }
    } catch (error) {
      if (hasCode(error, `ENOENT`, `ENOTDIR`)) {
        return { statusCode: 404, body: ``, message: `Not Found` }
      }
      if (hasCode(error, `EACCES`, `EPERM`)) {
        return { statusCode: 403, body: ``, message: `Forbidden` }
      }
      throw new FeedFetchError(url, error)
    }
  }
}
