import { parseFeedDate } from "../utils"
import {
  asElement,
  attribute,
  childElements,
  childText,
  childTexts,
} from "../xml"
import { FeedParser, parseLength } from "./parser"
import type { Feed, Item, Media } from "../types"
import type { XmlDocument, XmlElement } from "../xml"

/**
 * Convert an `<enclosure url="" type="" length="">` element
 */
function toMedia(element: XmlElement): Media | undefined {
  const url = attribute(element, `url`)
  if (!url) return undefined
  return {
    url,
    type: attribute(element, `type`),
    length: parseLength(attribute(element, `length`)),
  }
}

/**
 * RSS 0.9x / 2.0 parser
 */
export class RssParser extends FeedParser {
  readonly format = `rss`

  canHandle(document: XmlDocument): boolean {
    return document.root.toLowerCase() === `rss`
  }

  protected getContainer(document: XmlDocument): XmlElement {
    return asElement(document.element.channel) ?? this.missing(`channel`)
  }

  protected getItemElements(
    _document: XmlDocument,
    channel: XmlElement
  ): Array<XmlElement> {
    return childElements(channel, `item`)
  }

  protected hydrateFeed(channel: XmlElement, feed: Feed): void {
    feed.title = childText(channel, `title`)
    feed.description = childText(channel, `description`)
    feed.link = childText(channel, `link`)
    feed.id = feed.link
    feed.lastModified = parseFeedDate(
      childText(channel, `lastBuildDate`) ?? childText(channel, `pubDate`)
    )
  }

  protected hydrateItem(element: XmlElement, item: Item): Item {
    const description = childText(element, `description`)

    item.title = childText(element, `title`)
    item.link = childText(element, `link`)
    item.id = childText(element, `guid`) ?? item.link
    item.summary = description
    item.description = childText(element, `content:encoded`) ?? description
    item.author =
      childText(element, `author`) ?? childText(element, `dc:creator`)
    item.comment = childText(element, `comments`)
    item.updated = parseFeedDate(
      childText(element, `pubDate`) ?? childText(element, `dc:date`)
    )
    item.categories = childTexts(element, `category`)
    item.medias = []
    for (const enclosure of childElements(element, `enclosure`)) {
      const media = toMedia(enclosure)
      if (media) item.medias.push(media)
    }

    return item
  }
}
