import { vi } from "vitest"
import type { FeedResponse, HttpDriver } from "../src/types"

export const sampleAtomFeed = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Test Blog</title>
  <subtitle>A test blog</subtitle>
  <link href="https://example.com"/>
  <link rel="self" href="https://example.com/atom.xml"/>
  <id>urn:test:blog</id>
  <updated>2025-01-02T12:00:00Z</updated>
  <entry>
    <title>First Atom Post</title>
    <id>atom-post-1</id>
    <link href="https://example.com/atom-post1"/>
    <updated>2025-01-01T12:00:00Z</updated>
    <published>2025-01-01T10:00:00Z</published>
    <summary>This is the first atom post</summary>
    <author>
      <name>John Doe</name>
    </author>
    <category term="news"/>
  </entry>
  <entry>
    <title>Second Atom Post</title>
    <id>atom-post-2</id>
    <link rel="alternate" href="https://example.com/atom-post2"/>
    <link rel="enclosure" type="audio/mpeg" length="1234" href="https://example.com/episode2.mp3"/>
    <updated>2025-01-02T12:00:00Z</updated>
    <summary>This is the second atom post</summary>
    <content type="html">&lt;p&gt;Full text&lt;/p&gt;</content>
    <author>
      <name>Jane Smith</name>
    </author>
  </entry>
</feed>`

export const sampleRSSFeed = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:content="http://purl.org/rss/1.0/modules/content/">
  <channel>
    <title>Test Blog</title>
    <description>A test blog</description>
    <link>https://example.com</link>
    <lastBuildDate>Thu, 02 Jan 2025 12:00:00 GMT</lastBuildDate>
    <item>
      <title>First Post</title>
      <description>This is the first post</description>
      <link>https://example.com/post1</link>
      <guid>post-1</guid>
      <pubDate>Wed, 01 Jan 2025 12:00:00 GMT</pubDate>
      <author>john@example.com (John Doe)</author>
      <category>news</category>
      <category>releases</category>
    </item>
    <item>
      <title>Second Post</title>
      <description>This is the second post</description>
      <content:encoded><![CDATA[<p>Second post body</p>]]></content:encoded>
      <link>https://example.com/post2</link>
      <pubDate>Thu, 02 Jan 2025 12:00:00 +0100</pubDate>
      <dc:creator>Jane Smith</dc:creator>
      <comments>https://example.com/post2#comments</comments>
      <enclosure url="https://example.com/post2.mp3" type="audio/mpeg" length="2048"/>
    </item>
  </channel>
</rss>`

export const sampleRDFFeed = `<?xml version="1.0" encoding="UTF-8"?>
<rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#" xmlns="http://purl.org/rss/1.0/" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel rdf:about="https://example.com">
    <title>Test RDF</title>
    <link>https://example.com</link>
    <description>An RDF feed</description>
  </channel>
  <item rdf:about="https://example.com/rdf1">
    <title>RDF One</title>
    <link>https://example.com/rdf1</link>
    <dc:date>2025-01-03T08:00:00Z</dc:date>
    <dc:subject>science</dc:subject>
  </item>
</rdf:RDF>`

export const unknownDocument = `<?xml version="1.0" encoding="UTF-8"?>
<opml version="2.0">
  <head><title>Subscriptions</title></head>
  <body></body>
</opml>`

export function okResponse(body: string): FeedResponse {
  return { statusCode: 200, body, message: `OK` }
}

/**
 * Driver answering every request with the same response
 */
export function stubDriver(response: FeedResponse) {
  const getResponse = vi.fn((_url: string, _modifiedSince: Date) =>
    Promise.resolve(response)
  )
  return { getResponse } satisfies HttpDriver
}
