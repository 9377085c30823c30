import type { Feed, FeedFactory, Item, Media } from "./types"

/**
 * Default item value object
 */
export class FeedItem implements Item {
  id?: string
  title?: string
  summary?: string
  description?: string
  link?: string
  author?: string
  comment?: string
  updated?: Date
  categories: Array<string> = []
  medias: Array<Media> = []
}

/**
 * Merge key of an item: its id, else its title and update date. Items with
 * none of these have no key and are never merged.
 */
function itemKey(item: Item): string | undefined {
  if (item.id !== undefined) return `id:${item.id}`
  if (item.title === undefined && item.updated === undefined) return undefined
  return `entry:${item.title ?? ``}@${item.updated?.toISOString() ?? ``}`
}

/**
 * Default feed value object.
 *
 * Items sharing an id are merged: hydrating the same instance twice replaces
 * known items in place and appends the new ones. Items without id are matched
 * on title and update date instead.
 */
export class FeedContent implements Feed {
  id?: string
  title?: string
  description?: string
  link?: string
  lastModified?: Date

  private readonly entries: Array<Item> = []
  private readonly positions = new Map<string, number>()

  get items(): ReadonlyArray<Item> {
    return this.entries
  }

  addItem(item: Item): this {
    const key = itemKey(item)
    if (key === undefined) {
      this.entries.push(item)
      return this
    }

    const position = this.positions.get(key)
    if (position === undefined) {
      this.positions.set(key, this.entries.length)
      this.entries.push(item)
    } else {
      this.entries[position] = item
    }
    return this
  }
}

/**
 * Factory producing `FeedContent` and `FeedItem` instances
 */
export class DefaultFeedFactory implements FeedFactory {
  newFeed(): FeedContent {
    return new FeedContent()
  }

  newItem(): FeedItem {
    return new FeedItem()
  }
}
