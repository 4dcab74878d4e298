import { describe, expect, it, vi } from 'vitest';
import { resolveConfig } from '../config/config-resolver.js';
import { type Config, validateConfig } from '../config/config-schema.js';
import type { Launcher } from '../dispatch/launcher.js';
import { ConfigError, DispatchError } from '../errors/custom-errors.js';
import type { FetchFn } from '../feeds/feed.js';
import type { PersistenceSink } from '../state/config-persister.js';
import { fakeFetch, rssDocument } from '../test-helpers/feed-fixtures.js';
import { createSilentLogger } from '../utils/logger.js';
import { Engine } from './engine.js';

const ALPHA_URL = 'https://alpha.example.com/rss';
const BETA_URL = 'https://beta.example.com/rss';

function createConfig(overrides: Record<string, unknown> = {}): Config {
  return validateConfig({
    default_directory: '/tmp/torrents',
    default_command: ['client', '--add', '$PATH_OR_URL'],
    feeds: {
      alpha: {
        url: ALPHA_URL,
        subscriptions: {
          show: { pattern: 'Show S(?<series>\\d+)E(?<episode>\\d+)', series_number: 1, episode_number: 5 },
          other: { pattern: 'Other - (?<episode>\\d+)', episode_number: 3 },
        },
      },
      beta: {
        url: BETA_URL,
        subscriptions: {
          movie: { pattern: 'Movie Part (?<episode>\\d+)', command: ['player', '$PATH_OR_URL'] },
        },
      },
    },
    ...overrides,
  });
}

function createEngine(document: Config, fetch: FetchFn, launcher: Launcher = vi.fn<Launcher>().mockResolvedValue(undefined)) {
  const persistence = { save: vi.fn<PersistenceSink['save']>().mockResolvedValue(undefined) };
  const engine = new Engine(resolveConfig(document), document, {
    fetch,
    launcher,
    logger: createSilentLogger(),
    persistence,
  });
  return { engine, persistence, launcher };
}

const alphaFeed = rssDocument([
  { title: 'Show S01E06', link: 'https://alpha.example.com/view/6', torrentUrl: 'https://alpha.example.com/6.torrent' },
  { title: 'Other - 03', link: 'https://alpha.example.com/view/o3' },
]);
const betaFeed = rssDocument([{ title: 'Movie Part 1', link: 'https://beta.example.com/1.torrent' }]);

describe('Engine', () => {
  it('should build every feed and subscription in configuration order', () => {
    const { engine } = createEngine(createConfig(), fakeFetch({}));

    expect([...engine.feeds.keys()]).toEqual(['alpha', 'beta']);
    expect([...(engine.feeds.get('alpha')?.subscriptions.keys() ?? [])]).toEqual(['show', 'other']);
    expect(engine.defaultDirectory).toBe('/tmp/torrents');
  });

  it('should reject an invalid pattern before making any request', () => {
    const fetch = fakeFetch({});
    const document = createConfig({
      feeds: { alpha: { url: ALPHA_URL, subscriptions: { broken: { pattern: '(?<episode>\\d+' } } } },
    });

    expect(() => createEngine(document, fetch)).toThrow(ConfigError);
    expect(fetch).not.toHaveBeenCalled();
  });

  describe('checkAllFeeds', () => {
    it('should hand each new entry to its command', async () => {
      const { engine, launcher } = createEngine(
        createConfig(),
        fakeFetch({ [ALPHA_URL]: { body: alphaFeed }, [BETA_URL]: { body: betaFeed } }),
      );

      const report = await engine.checkAllFeeds();

      expect(report).toEqual({ matches: 2, dispatched: 2, failures: [] });
      expect(vi.mocked(launcher).mock.calls).toEqual([
        ['client', ['--add', 'https://alpha.example.com/6.torrent'], { shell: false }],
        ['player', ['https://beta.example.com/1.torrent'], { shell: false }],
      ]);
    });

    it('should keep checking other feeds when one cannot be fetched', async () => {
      const { engine, launcher } = createEngine(createConfig(), fakeFetch({ [BETA_URL]: { body: betaFeed } }));

      const report = await engine.checkAllFeeds();

      expect(report.dispatched).toBe(1);
      expect(report.failures).toHaveLength(1);
      expect(report.failures[0]).toMatchObject({ feedName: 'alpha', stage: 'feed' });
      expect(report.failures[0]?.error.message).toBe(`Feed "alpha": error fetching url "${ALPHA_URL}"`);
      expect(launcher).toHaveBeenCalledTimes(1);
    });

    it('should skip an entry without a link and dispatch the rest', async () => {
      const { engine, launcher } = createEngine(
        createConfig(),
        fakeFetch({
          [ALPHA_URL]: {
            body: rssDocument([{ title: 'Show S01E07' }, { title: 'Show S01E06', link: 'https://alpha.example.com/6' }]),
          },
          [BETA_URL]: { body: rssDocument([]) },
        }),
      );

      const report = await engine.checkAllFeeds();

      expect(report.matches).toBe(2);
      expect(report.dispatched).toBe(1);
      expect(report.failures).toEqual([
        expect.objectContaining({ feedName: 'alpha', stage: 'download', entryTitle: 'Show S01E07' }),
      ]);
      expect(launcher).toHaveBeenCalledWith('client', ['--add', 'https://alpha.example.com/6'], { shell: false });
      expect(engine.feeds.get('alpha')?.subscriptions.get('show')?.number.toJSON()).toEqual({ series: 1, episode: 7 });
    });

    it('should record a dispatch failure and keep the new number', async () => {
      const launcher = vi.fn<Launcher>().mockRejectedValue(new Error('spawn client ENOENT'));
      const { engine } = createEngine(
        createConfig(),
        fakeFetch({ [ALPHA_URL]: { body: alphaFeed }, [BETA_URL]: { body: rssDocument([]) } }),
        launcher,
      );

      const report = await engine.checkAllFeeds();

      expect(report.dispatched).toBe(0);
      expect(report.failures).toHaveLength(1);
      expect(report.failures[0]).toMatchObject({ feedName: 'alpha', stage: 'dispatch', entryTitle: 'Show S01E06' });
      expect(report.failures[0]?.error).toBeInstanceOf(DispatchError);
      expect(engine.feeds.get('alpha')?.subscriptions.get('show')?.hasChanged()).toBe(true);
    });

    it('should find nothing new on a second cycle', async () => {
      const { engine, launcher } = createEngine(
        createConfig(),
        fakeFetch({ [ALPHA_URL]: { body: alphaFeed }, [BETA_URL]: { body: betaFeed } }),
      );

      await engine.checkAllFeeds();
      const second = await engine.checkAllFeeds();

      expect(second).toEqual({ matches: 0, dispatched: 0, failures: [] });
      expect(launcher).toHaveBeenCalledTimes(2);
    });
  });

  describe('persistEpisodeNumbers', () => {
    it('should write back only the subscriptions that moved', async () => {
      const document = createConfig();
      const { engine, persistence } = createEngine(
        document,
        fakeFetch({ [ALPHA_URL]: { body: alphaFeed }, [BETA_URL]: { body: betaFeed } }),
      );
      await engine.checkAllFeeds();

      const updated = await engine.persistEpisodeNumbers();

      expect(updated?.feeds.alpha?.subscriptions.show).toEqual({
        pattern: 'Show S(?<series>\\d+)E(?<episode>\\d+)',
        series_number: 1,
        episode_number: 6,
      });
      expect(updated?.feeds.alpha?.subscriptions.other).toEqual(document.feeds.alpha?.subscriptions.other);
      expect(updated?.feeds.beta?.subscriptions.movie).toEqual({
        pattern: 'Movie Part (?<episode>\\d+)',
        command: ['player', '$PATH_OR_URL'],
        episode_number: 1,
      });
      expect(updated?.feeds.beta?.subscriptions.movie).not.toHaveProperty('series_number');
      expect(persistence.save).toHaveBeenCalledWith(updated);
    });

    it('should leave the loaded document untouched', async () => {
      const document = createConfig();
      const { engine } = createEngine(
        document,
        fakeFetch({ [ALPHA_URL]: { body: alphaFeed }, [BETA_URL]: { body: betaFeed } }),
      );
      await engine.checkAllFeeds();

      await engine.persistEpisodeNumbers();

      expect(document.feeds.alpha?.subscriptions.show?.episode_number).toBe(5);
      expect(document.feeds.beta?.subscriptions.movie).not.toHaveProperty('episode_number');
    });

    it('should not write when nothing changed', async () => {
      const { engine, persistence } = createEngine(
        createConfig(),
        fakeFetch({ [ALPHA_URL]: { body: rssDocument([]) }, [BETA_URL]: { body: rssDocument([]) } }),
      );
      await engine.checkAllFeeds();

      expect(await engine.persistEpisodeNumbers()).toBeUndefined();
      expect(persistence.save).not.toHaveBeenCalled();
    });
  });
});
