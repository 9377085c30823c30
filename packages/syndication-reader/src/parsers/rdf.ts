import { parseFeedDate } from "../utils"
import { asElement, childElements, childText, childTexts } from "../xml"
import { FeedParser } from "./parser"
import type { Feed, Item } from "../types"
import type { XmlDocument, XmlElement } from "../xml"

/**
 * RSS 1.0 (RDF) parser. Items are siblings of the channel, not children.
 */
export class RdfParser extends FeedParser {
  readonly format = `rdf`

  canHandle(document: XmlDocument): boolean {
    return document.root === `rdf:RDF`
  }

  protected getContainer(document: XmlDocument): XmlElement {
    return asElement(document.element.channel) ?? this.missing(`channel`)
  }

  protected getItemElements(document: XmlDocument): Array<XmlElement> {
    return childElements(document.element, `item`)
  }

  protected hydrateFeed(channel: XmlElement, feed: Feed): void {
    feed.title = childText(channel, `title`)
    feed.description = childText(channel, `description`)
    feed.link = childText(channel, `link`)
    feed.id = feed.link
    feed.lastModified = parseFeedDate(childText(channel, `dc:date`))
  }

  protected hydrateItem(element: XmlElement, item: Item): Item {
    const description = childText(element, `description`)

    item.title = childText(element, `title`)
    item.link = childText(element, `link`)
    item.id = item.link
    item.summary = description
    item.description = childText(element, `content:encoded`) ?? description
    item.author = childText(element, `dc:creator`)
    item.updated = parseFeedDate(childText(element, `dc:date`))
    item.categories = childTexts(element, `dc:subject`)

    return item
  }
}
