import { vi } from 'vitest';
import type { FetchFn } from '../feeds/feed.js';

export type FixtureItem = {
  title: string;
  link?: string;
  torrentUrl?: string;
};

function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * RSS 2.0 document listing `items` in the given order (newest first, as feeds do)
 */
export function rssDocument(items: FixtureItem[]): string {
  const body = items
    .map((item) => {
      const link = item.link ? `<link>${escapeXml(item.link)}</link>` : '';
      const enclosure = item.torrentUrl
        ? `<enclosure url="${escapeXml(item.torrentUrl)}" type="application/x-bittorrent" length="1"/>`
        : '';
      return `<item><title>${escapeXml(item.title)}</title>${link}${enclosure}</item>`;
    })
    .join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>\n<rss version="2.0"><channel><title>Fixture</title>\n${body}\n</channel></rss>`;
}

export type FakeRoute = {
  status?: number;
  body: string | Uint8Array;
};

/**
 * `fetch` stand-in answering from a URL → response table; unknown URLs get a 404
 */
export function fakeFetch(routes: Record<string, FakeRoute>) {
  return vi.fn<FetchFn>(async (url) => {
    const route = routes[url];
    if (!route) {
      return new Response('not found', { status: 404, statusText: 'Not Found' });
    }
    return new Response(route.body, { status: route.status ?? 200 });
  });
}
