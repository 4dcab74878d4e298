import type { LoadedConfig } from '../config/config-loader.js';
import type { Config } from '../config/config-schema.js';
import type { ResolvedConfig } from '../config/resolved-config.types.js';
import { Command } from '../dispatch/command.js';
import type { Launcher } from '../dispatch/launcher.js';
import { DispatchError, describeError, FeedError } from '../errors/custom-errors.js';
import { Feed, type FetchFn } from '../feeds/feed.js';
import type { PersistenceSink } from '../state/config-persister.js';
import type { Logger } from '../utils/logger.js';

export type EngineDependencies = {
  fetch: FetchFn;
  launcher: Launcher;
  logger: Logger;
  persistence: PersistenceSink;
};

export type CheckFailureStage = 'feed' | 'download' | 'dispatch';

export type CheckFailure = {
  feedName: string;
  stage: CheckFailureStage;
  entryTitle?: string;
  error: Error;
};

/**
 * Outcome of one check cycle
 */
export type CheckReport = {
  matches: number;
  dispatched: number;
  failures: CheckFailure[];
};

/**
 * Owns every feed of a configuration and runs the check-and-dispatch cycle
 */
export class Engine {
  readonly feeds: Map<string, Feed>;
  readonly defaultDirectory: string;
  readonly defaultCommand: Command;
  private readonly logger: Logger;

  /**
   * Builds every feed and subscription, so configuration errors surface
   * here, before any request is made.
   *
   * @param document - Validated configuration the episode numbers are written back into
   * @throws ConfigError if a subscription pattern is invalid
   */
  constructor(
    config: ResolvedConfig,
    private readonly document: Config,
    private readonly dependencies: EngineDependencies,
  ) {
    this.logger = dependencies.logger;
    this.defaultDirectory = config.defaultDirectory;
    const createCommand = (spec: ResolvedConfig['defaultCommand']) =>
      new Command(spec, dependencies.launcher, dependencies.logger);
    this.defaultCommand = createCommand(config.defaultCommand);

    this.feeds = new Map(
      config.feeds.map((feedConfig) => [
        feedConfig.name,
        new Feed(feedConfig, {
          defaultUserAgent: config.defaultUserAgent,
          replaceWindowsForbiddenCharacters: config.replaceWindowsForbiddenCharacters,
          subscriptionDefaults: { directory: this.defaultDirectory, command: this.defaultCommand },
          createCommand,
          fetch: dependencies.fetch,
          logger: dependencies.logger,
        }),
      ]),
    );
  }

  static fromConfig(loaded: LoadedConfig, dependencies: EngineDependencies): Engine {
    return new Engine(loaded.config, loaded.document, dependencies);
  }

  /**
   * Fetch every feed and hand each new entry to its subscription's command.
   *
   * A feed that cannot be fetched is skipped; an entry that cannot be
   * downloaded or dispatched is skipped. The subscription keeps the entry's
   * number either way, so a failed hand-off is not retried on the next run.
   */
  async checkAllFeeds(): Promise<CheckReport> {
    const report: CheckReport = { matches: 0, dispatched: 0, failures: [] };

    for (const feed of this.feeds.values()) {
      try {
        for await (const { subscription, entry } of feed.matchingSubscriptions()) {
          report.matches++;

          let payload: string;
          try {
            payload = await feed.downloadEntry(entry, subscription.directory);
          } catch (error) {
            if (!(error instanceof FeedError)) throw error;
            this.recordFailure(report, { feedName: feed.name, stage: 'download', entryTitle: entry.title, error });
            continue;
          }

          try {
            await subscription.command.run(payload);
            report.dispatched++;
          } catch (error) {
            if (!(error instanceof DispatchError)) throw error;
            this.recordFailure(report, { feedName: feed.name, stage: 'dispatch', entryTitle: entry.title, error });
          }
        }
      } catch (error) {
        this.recordFailure(report, {
          feedName: feed.name,
          stage: 'feed',
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }

    this.logger.info(
      `Checked ${this.feeds.size} feed(s): ${report.matches} match(es), ${report.dispatched} dispatched, ${report.failures.length} failure(s)`,
    );
    return report;
  }

  /**
   * Write the numbers of every subscription that moved back into the
   * configuration. Only defined numbers are written.
   *
   * @returns The updated document, or undefined when nothing changed
   */
  async persistEpisodeNumbers(): Promise<Config | undefined> {
    const changed = [...this.feeds.values()].flatMap((feed) =>
      [...feed.subscriptions.values()].filter((sub) => sub.hasChanged()),
    );

    if (changed.length === 0) {
      this.logger.debug('No episode numbers changed');
      return undefined;
    }

    this.logger.info('Writing episode numbers');
    const updated = structuredClone(this.document);

    for (const sub of changed) {
      const target = updated.feeds[sub.feedName]?.subscriptions[sub.name];
      if (!target) {
        throw new Error(
          `Subscription ${JSON.stringify(sub.name)} of feed ${JSON.stringify(sub.feedName)} not in configuration`,
        );
      }
      if (sub.number.series !== undefined) {
        target.series_number = sub.number.series;
      }
      if (sub.number.episode !== undefined) {
        target.episode_number = sub.number.episode;
      }
      this.logger.debug(
        `Feed ${JSON.stringify(sub.feedName)} sub ${JSON.stringify(sub.name)}: ${sub.initialNumber} -> ${sub.number}`,
      );
    }

    await this.dependencies.persistence.save(updated);
    return updated;
  }

  private recordFailure(report: CheckReport, failure: CheckFailure): void {
    report.failures.push(failure);
    const entry = failure.entryTitle === undefined ? '' : ` (entry ${JSON.stringify(failure.entryTitle)})`;
    this.logger.error(`[${failure.feedName}] ${failure.stage} failed${entry}: ${describeError(failure.error)}`);
  }
}
