import { parseFeedDate } from "../utils"
import {
  asElement,
  attribute,
  child,
  childElements,
  childText,
  text,
  textContent,
} from "../xml"
import { FeedParser, parseLength } from "./parser"
import type { Feed, Item, Media } from "../types"
import type { XmlDocument, XmlElement } from "../xml"

export const ATOM_NAMESPACE = `http://www.w3.org/2005/Atom`

/**
 * href of the alternate link, falling back to the first link
 */
function alternateLink(element: XmlElement): string | undefined {
  const links = childElements(element, `link`)
  const alternate = links.find((link) => {
    const rel = attribute(link, `rel`)
    return rel === undefined || rel === `alternate`
  })
  return attribute(alternate ?? links[0], `href`)
}

/**
 * Value of an Atom text construct. `xhtml` content is wrapped in a `div`
 * whose text is flattened; `text` and `html` are returned as they are.
 */
function atomText(element: XmlElement, name: string): string | undefined {
  const node = child(element, name)
  if (attribute(node, `type`) === `xhtml`) {
    const wrapper = asElement(node)
    return textContent(wrapper && child(wrapper, `div`))
  }
  return text(node)
}

function enclosures(element: XmlElement): Array<Media> {
  const medias: Array<Media> = []
  for (const link of childElements(element, `link`)) {
    const href = attribute(link, `href`)
    if (attribute(link, `rel`) === `enclosure` && href) {
      medias.push({
        url: href,
        type: attribute(link, `type`),
        length: parseLength(attribute(link, `length`)),
      })
    }
  }
  return medias
}

/**
 * Atom 1.0 parser
 */
export class AtomParser extends FeedParser {
  readonly format = `atom`

  canHandle(document: XmlDocument): boolean {
    return document.root === `feed` && document.namespace === ATOM_NAMESPACE
  }

  protected getContainer(document: XmlDocument): XmlElement {
    return document.element
  }

  protected getItemElements(
    _document: XmlDocument,
    feed: XmlElement
  ): Array<XmlElement> {
    return childElements(feed, `entry`)
  }

  protected hydrateFeed(element: XmlElement, feed: Feed): void {
    if (child(element, `title`) === undefined) {
      this.missing(`title`)
    }

    feed.id = childText(element, `id`)
    feed.title = atomText(element, `title`)
    feed.description = atomText(element, `subtitle`)
    feed.link = alternateLink(element)
    feed.lastModified = parseFeedDate(childText(element, `updated`))
  }

  protected hydrateItem(element: XmlElement, item: Item): Item {
    const summary = atomText(element, `summary`)

    item.id = childText(element, `id`)
    item.title = atomText(element, `title`)
    item.link = alternateLink(element)
    item.summary = summary
    item.description = atomText(element, `content`) ?? summary
    item.author = childElements(element, `author`)
      .map((author) => childText(author, `name`))
      .find((name) => name !== undefined)
    item.updated = parseFeedDate(
      childText(element, `updated`) ?? childText(element, `published`)
    )
    item.categories = childElements(element, `category`)
      .map((category) => attribute(category, `term`))
      .filter((term): term is string => term !== undefined)
    item.medias = enclosures(element)

    return item
  }
}
