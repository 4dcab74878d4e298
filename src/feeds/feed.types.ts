/**
 * One link of a feed entry
 */
export type FeedLink = {
  href: string;
  /** Declared MIME type, e.g. application/x-bittorrent */
  type?: string;
  /** Atom rel, or "enclosure" for RSS enclosures */
  rel?: string;
};

/**
 * One item of a fetched feed
 */
export type FeedEntry = {
  title: string;
  /** Primary link: first alternate (or rel-less) link, else the first link */
  link?: string;
  /** Every link in document order */
  links: FeedLink[];
};

/**
 * A parsed RSS/Atom document; entries keep the order the feed lists them in
 */
export type FeedDocument = {
  title?: string;
  entries: FeedEntry[];
};
