import { createHash } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { CommandSpec, ResolvedFeedConfig } from '../config/resolved-config.types.js';
import type { Command } from '../dispatch/command.js';
import { EpisodeNumber } from '../episodes/episode-number.js';
import { describeError, FeedError } from '../errors/custom-errors.js';
import { sanitizeFilename } from '../utils/filename-sanitizer.js';
import type { Logger } from '../utils/logger.js';
import { parseFeedDocument } from './feed-parser.js';
import type { FeedDocument, FeedEntry } from './feed.types.js';
import { Subscription, type SubscriptionDefaults } from './subscription.js';

export const TORRENT_MIME_TYPE = 'application/x-bittorrent';

/**
 * The part of `fetch` feeds rely on
 */
export type FetchFn = (url: string, init: { headers: Record<string, string> }) => Promise<Response>;

/**
 * What a feed needs from the engine that owns it
 */
export type FeedContext = {
  defaultUserAgent?: string;
  replaceWindowsForbiddenCharacters: boolean;
  subscriptionDefaults: SubscriptionDefaults;
  createCommand: (spec: CommandSpec) => Command;
  fetch: FetchFn;
  logger: Logger;
};

/**
 * A genuine match: the entry carries a number beyond the subscription's baseline
 */
export type SubscriptionMatch = {
  subscription: Subscription;
  entry: FeedEntry;
  number: EpisodeNumber;
  /** Position of the entry in the feed as published */
  index: number;
};

/**
 * A remote RSS/Atom source and the subscriptions watched on it
 */
export class Feed {
  readonly name: string;
  readonly url: string;
  readonly preferTorrentUrl: boolean;
  readonly hideTorrentFilename: boolean;
  readonly subscriptions: Map<string, Subscription>;
  private readonly userAgentOverride?: string;
  private readonly context: FeedContext;

  /**
   * @throws ConfigError if a subscription pattern is invalid
   */
  constructor(config: ResolvedFeedConfig, context: FeedContext) {
    this.name = config.name;
    this.url = config.url;
    this.userAgentOverride = config.userAgent;
    this.preferTorrentUrl = config.preferTorrentUrl;
    this.hideTorrentFilename = config.hideTorrentFilename;
    this.context = context;
    this.subscriptions = new Map(
      config.subscriptions.map((sub) => [
        sub.name,
        new Subscription(
          {
            feedName: config.name,
            name: sub.name,
            pattern: sub.pattern,
            ignoreCase: sub.ignoreCase,
            seriesNumber: sub.seriesNumber,
            episodeNumber: sub.episodeNumber,
            directory: sub.directory,
            command: sub.command ? context.createCommand(sub.command) : undefined,
          },
          context.subscriptionDefaults,
        ),
      ]),
    );
  }

  get userAgent(): string | undefined {
    return this.userAgentOverride ?? this.context.defaultUserAgent;
  }

  get headers(): Record<string, string> {
    const userAgent = this.userAgent;
    return userAgent === undefined ? {} : { 'User-Agent': userAgent };
  }

  private get logger(): Logger {
    return this.context.logger;
  }

  /**
   * Download and parse the feed document
   *
   * @throws FeedError if the request fails or the document does not parse
   */
  async fetch(): Promise<FeedDocument> {
    let body: string;
    try {
      const response = await this.context.fetch(this.url, { headers: this.headers });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }
      body = await response.text();
    } catch (error) {
      throw new FeedError(`Feed ${quote(this.name)}: error fetching url ${quote(this.url)}`, this.name, this.url, {
        cause: error,
      });
    }

    let document: FeedDocument;
    try {
      document = parseFeedDocument(body);
    } catch (error) {
      throw new FeedError(`Feed ${quote(this.name)}: error parsing url ${quote(this.url)}`, this.name, this.url, {
        cause: error,
      });
    }

    this.logger.info(`Feed ${quote(this.name)}: downloaded url ${quote(this.url)}`);
    return document;
  }

  /**
   * Yield every entry carrying a number beyond its subscription's number at
   * the start of the scan.
   *
   * The feed is fetched once, and only when there are subscriptions. Entries
   * are visited oldest first (feeds list the newest first). Every comparison
   * uses the numbers as they were before the scan, so matches are found
   * whatever order the feed lists them in; the live number keeps the highest.
   *
   * @throws FeedError if the feed cannot be fetched
   */
  async *matchingSubscriptions(): AsyncGenerator<SubscriptionMatch, void, undefined> {
    if (this.subscriptions.size === 0) {
      return;
    }

    const { entries } = await this.fetch();
    const baseline = new Map([...this.subscriptions.values()].map((sub) => [sub, sub.number]));

    for (let index = entries.length - 1; index >= 0; index--) {
      const entry = entries[index];
      if (!entry) continue;

      for (const [sub, original] of baseline) {
        const groups = sub.match(entry.title);
        if (!groups) {
          this.logger.debug(`NO MATCH: entry ${index} ${quote(entry.title)} against sub ${quote(sub.name)}`);
          continue;
        }

        let number: EpisodeNumber;
        try {
          number = EpisodeNumber.fromMatch(groups);
        } catch (error) {
          this.logger.warning(
            `SKIPPED: entry ${index} ${quote(entry.title)} matches sub ${quote(sub.name)} but has no usable number: ${describeError(error)}`,
          );
          continue;
        }

        if (!number.isGreaterThan(original)) {
          this.logger.debug(
            `NO MATCH: entry ${index} ${quote(entry.title)} matches but number less than or equal to sub ${quote(sub.name)}: ${number} <= ${original}`,
          );
          continue;
        }

        this.logger.highlight(
          `MATCH: entry ${index} ${quote(entry.title)} has greater number than sub ${quote(sub.name)}: ${number} > ${original}`,
        );
        if (number.isGreaterThan(sub.number)) {
          sub.number = number;
        }
        yield { subscription: sub, entry, number, index };
      }
    }
  }

  /**
   * URL of the torrent for an entry: the first link typed as a torrent,
   * else the entry's primary link
   *
   * @throws FeedError if the entry has no link at all
   */
  resolveEntryUrl(entry: FeedEntry): string {
    const torrentLink = entry.links.find((link) => link.type === TORRENT_MIME_TYPE);
    if (torrentLink) {
      this.logger.debug(
        `Entry ${quote(entry.title)}: first link with mimetype ${quote(TORRENT_MIME_TYPE)} is ${quote(torrentLink.href)}`,
      );
      return torrentLink.href;
    }

    if (entry.link === undefined) {
      throw new FeedError(
        `Feed ${quote(this.name)}: failed to get url for entry ${quote(entry.title)}`,
        this.name,
        this.url,
      );
    }
    this.logger.info(
      `Entry ${quote(entry.title)}: no link with mimetype ${quote(TORRENT_MIME_TYPE)}, returning first link ${quote(entry.link)}`,
    );
    return entry.link;
  }

  /**
   * Resolve the payload handed to the command: the torrent URL itself, or
   * the path of the torrent file downloaded into `directory`
   *
   * @throws FeedError if the URL cannot be resolved or the download fails
   */
  async downloadEntry(entry: FeedEntry, directory: string): Promise<string> {
    const url = this.resolveEntryUrl(entry);

    if (this.preferTorrentUrl) {
      this.logger.debug(`Feed ${quote(this.name)}: returning torrent url ${quote(url)}`);
      return url;
    }

    try {
      return await this.downloadTorrentFile(url, entry.title, directory);
    } catch (error) {
      throw new FeedError(`Feed ${quote(this.name)}: failed to download ${url}`, this.name, url, { cause: error });
    }
  }

  private async downloadTorrentFile(url: string, title: string, directory: string): Promise<string> {
    this.logger.debug(`Feed ${quote(this.name)}: sending GET request to ${quote(url)}`);
    const response = await this.context.fetch(url, { headers: this.headers });
    this.logger.debug(`Feed ${quote(this.name)}: response status code is ${response.status}`);
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    const content = Buffer.from(await response.arrayBuffer());
    const filename = this.hideTorrentFilename
      ? createHash('sha256').update(content).digest('hex')
      : this.context.replaceWindowsForbiddenCharacters
        ? sanitizeFilename(title)
        : title;
    const path = join(directory, `${filename}.torrent`);

    await mkdir(directory, { recursive: true });
    this.logger.debug(`Feed ${quote(this.name)}: writing response bytes to file ${path}`);
    await writeFile(path, content);
    return path;
  }

  toString(): string {
    return `Feed(name=${quote(this.name)}, url=${quote(this.url)})`;
  }
}

function quote(value: string): string {
  return JSON.stringify(value);
}
