import { InvalidLimitError } from "./errors"
import type { Item } from "./types"

/**
 * Restriction applied to parsed items.
 *
 * `position` is the item's index in document order. Filters are pure, so a
 * list of them can be reused across reads and evaluated in any order.
 */
export interface FeedFilter {
  accepts: (item: Item, position: number) => boolean
}

/**
 * Keeps the first `limit` items of the document
 */
export class LimitFilter implements FeedFilter {
  readonly limit: number

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new InvalidLimitError(limit)
    }
    this.limit = limit
  }

  accepts(_item: Item, position: number): boolean {
    return position < this.limit
  }
}

/**
 * Keeps items updated strictly after `date`. Undated items are dropped.
 */
export class ModifiedSinceFilter implements FeedFilter {
  readonly date: Date

  constructor(date: Date) {
    this.date = date
  }

  accepts(item: Item): boolean {
    return (
      item.updated !== undefined &&
      item.updated.getTime() > this.date.getTime()
    )
  }
}

/**
 * Items accepted by every filter, in their original order
 */
export function applyFilters<TItem extends Item>(
  items: ReadonlyArray<TItem>,
  filters: ReadonlyArray<FeedFilter>
): Array<TItem> {
  return items.filter((item, position) =>
    filters.every((filter) => filter.accepts(item, position))
  )
}
