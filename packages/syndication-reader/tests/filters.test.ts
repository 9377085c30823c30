import { describe, expect, it } from "vitest"
import { InvalidLimitError } from "../src/errors"
import { FeedItem } from "../src/feed"
import { LimitFilter, ModifiedSinceFilter, applyFilters } from "../src/filters"

function item(id: string, updated?: string): FeedItem {
  const result = new FeedItem()
  result.id = id
  result.updated = updated ? new Date(updated) : undefined
  return result
}

const items = [
  item(`a`, `2025-01-01T00:00:00Z`),
  item(`b`, `2025-01-02T00:00:00Z`),
  item(`c`),
  item(`d`, `2025-01-04T00:00:00Z`),
]

const ids = (list: Array<FeedItem>) => list.map((entry) => entry.id)

describe(`Filters`, () => {
  describe(`LimitFilter`, () => {
    it(`should keep the first items in document order`, () => {
      expect(ids(applyFilters(items, [new LimitFilter(2)]))).toEqual([`a`, `b`])
    })

    it(`should keep everything when the limit exceeds the item count`, () => {
      expect(applyFilters(items, [new LimitFilter(10)])).toHaveLength(4)
    })

    it.each([0, -3, 1.5, Number.NaN])(`should reject %s`, (limit) => {
      expect(() => new LimitFilter(limit)).toThrow(InvalidLimitError)
    })

    it(`should be reusable`, () => {
      const filter = new LimitFilter(1)

      expect(ids(applyFilters(items, [filter]))).toEqual([`a`])
      expect(ids(applyFilters(items, [filter]))).toEqual([`a`])
    })
  })

  describe(`ModifiedSinceFilter`, () => {
    it(`should keep items strictly newer than the cutoff`, () => {
      const filter = new ModifiedSinceFilter(new Date(`2025-01-02T00:00:00Z`))

      expect(ids(applyFilters(items, [filter]))).toEqual([`d`])
    })

    it(`should drop undated items`, () => {
      const filter = new ModifiedSinceFilter(new Date(0))

      expect(ids(applyFilters(items, [filter]))).toEqual([`a`, `b`, `d`])
    })
  })

  describe(`applyFilters`, () => {
    it(`should keep everything without filters`, () => {
      expect(ids(applyFilters(items, []))).toEqual([`a`, `b`, `c`, `d`])
    })

    it(`should give the same result whatever the filter order`, () => {
      const limit = new LimitFilter(3)
      const since = new ModifiedSinceFilter(new Date(`2025-01-01T00:00:00Z`))

      expect(ids(applyFilters(items, [limit, since]))).toEqual([`b`])
      expect(ids(applyFilters(items, [since, limit]))).toEqual([`b`])
    })
  })
})
