import assert from 'node:assert/strict';
import test from 'node:test';
import { parseFeed } from './rssFeedConnector';

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:media="http://search.yahoo.com/mrss/">
  <channel>
    <title>Example Seminars</title>
    <item>
      <title>Compilers for Everyone</title>
      <link>https://seminars.example.com/compilers</link>
      <description><![CDATA[<p>A talk about <b>parsing</b>.</p>]]></description>
      <pubDate>Tue, 10 Jun 2025 14:00:00 +0000</pubDate>
      <category>Lecture</category>
      <category>Systems</category>
      <media:content url="https://img.example.com/compilers.jpg" medium="image"/>
    </item>
    <item>
      <title>Second Talk</title>
      <guid isPermaLink="true">https://seminars.example.com/second</guid>
      <enclosure url="https://img.example.com/second.png" type="image/png"/>
    </item>
  </channel>
</rss>`;

const ATOM = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Example News</title>
  <entry>
    <title>Atom Entry</title>
    <link rel="alternate" href="https://news.example.com/atom-entry"/>
    <link rel="enclosure" href="https://img.example.com/atom.jpg"/>
    <summary>Short summary</summary>
    <updated>2025-06-11T09:00:00Z</updated>
    <category term="Research"/>
  </entry>
</feed>`;

test('parseFeed', async t => {
  await t.test('reads RSS items', () => {
    const [first, second] = parseFeed(RSS);
    assert.deepEqual(first, {
      title: 'Compilers for Everyone',
      link: 'https://seminars.example.com/compilers',
      description: '<p>A talk about <b>parsing</b>.</p>',
      publishedAt: 'Tue, 10 Jun 2025 14:00:00 +0000',
      imageUrl: 'https://img.example.com/compilers.jpg',
      categories: ['Lecture', 'Systems'],
    });
    assert.equal(second?.link, 'https://seminars.example.com/second');
    assert.equal(second?.imageUrl, 'https://img.example.com/second.png');
    assert.equal(second?.publishedAt, null);
    assert.deepEqual(second?.categories, []);
  });

  await t.test('reads Atom entries', () => {
    assert.deepEqual(parseFeed(ATOM), [{
      title: 'Atom Entry',
      link: 'https://news.example.com/atom-entry',
      description: 'Short summary',
      publishedAt: '2025-06-11T09:00:00Z',
      imageUrl: 'https://img.example.com/atom.jpg',
      categories: ['Research'],
    }]);
  });

  await t.test('returns nothing for other documents', () => {
    assert.deepEqual(parseFeed('<html><body>Not a feed</body></html>'), []);
    assert.deepEqual(parseFeed('<rss><channel><title>Empty</title></channel></rss>'), []);
  });
});
