import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { type AppDependencies, runApp, summarizeFailures } from './app.js';
import { loadConfig } from './config/config-loader.js';
import type { Launcher } from './dispatch/launcher.js';
import { NotificationLevel } from './notifications/notification-level.js';
import type { Notifier } from './notifications/notifier.js';
import { ConfigPersister } from './state/config-persister.js';
import { fakeFetch, rssDocument } from './test-helpers/feed-fixtures.js';
import { createSilentLogger } from './utils/logger.js';

const FEED_URL = 'https://tracker.example.com/rss';
const BROKEN_URL = 'https://broken.example.com/rss';

describe('runApp', () => {
  let directory: string;
  let notifier: { notify: Mock<Notifier['notify']> };
  let launcher: Mock<Launcher>;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'torrentwatch-app-'));
    notifier = { notify: vi.fn<Notifier['notify']>() };
    launcher = vi.fn<Launcher>().mockResolvedValue(undefined);
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  function createDeps(fetchRoutes: Parameters<typeof fakeFetch>[0]): AppDependencies {
    return {
      loadConfig,
      fetch: fakeFetch(fetchRoutes),
      launcher,
      createPersistence: (loaded) => new ConfigPersister(loaded.path, loaded.format),
    };
  }

  async function writeConfig(name: string, content: string): Promise<string> {
    const path = join(directory, name);
    await writeFile(path, content, 'utf-8');
    return path;
  }

  it('should dispatch new entries and save the numbers back to a YAML file', async () => {
    const configPath = await writeConfig(
      'config.yaml',
      [
        'default_command: [client, --add, $PATH_OR_URL]',
        'feeds:',
        '  tracker:',
        `    url: ${FEED_URL}`,
        '    subscriptions:',
        '      show:',
        '        pattern: Show S(?<series>\\d+)E(?<episode>\\d+)',
        '        series_number: 1',
        '        episode_number: 5',
        '',
      ].join('\n'),
    );
    const deps = createDeps({
      [FEED_URL]: {
        body: rssDocument([
          { title: 'Show S01E07', link: 'https://tracker.example.com/7.torrent' },
          { title: 'Show S01E06', link: 'https://tracker.example.com/6.torrent' },
        ]),
      },
    });

    const exitCode = await runApp(configPath, createSilentLogger(), notifier, deps);

    expect(exitCode).toBe(0);
    expect(launcher.mock.calls.map(([, args]) => args)).toEqual([
      ['--add', 'https://tracker.example.com/6.torrent'],
      ['--add', 'https://tracker.example.com/7.torrent'],
    ]);
    expect(notifier.notify).toHaveBeenCalledWith(NotificationLevel.SUCCESS, 'Dispatched 2 new torrent(s)');
    expect(yaml.load(await readFile(configPath, 'utf-8'))).toEqual({
      default_command: ['client', '--add', '$PATH_OR_URL'],
      feeds: {
        tracker: {
          url: FEED_URL,
          subscriptions: {
            show: { pattern: 'Show S(?<series>\\d+)E(?<episode>\\d+)', series_number: 1, episode_number: 7 },
          },
        },
      },
    });
  });

  it('should save what it can and exit non-zero when a feed fails', async () => {
    const configPath = await writeConfig(
      'config.json',
      JSON.stringify({
        feeds: {
          broken: { url: BROKEN_URL, subscriptions: { any: { pattern: '(?<episode>\\d+)' } } },
          tracker: { url: FEED_URL, subscriptions: { show: { pattern: 'Show - (?<episode>\\d+)', episode_number: 1 } } },
        },
      }),
    );
    const deps = createDeps({ [FEED_URL]: { body: rssDocument([{ title: 'Show - 02', link: 'https://tracker.example.com/2' }]) } });

    const exitCode = await runApp(configPath, createSilentLogger(), notifier, deps);

    expect(exitCode).toBe(1);
    expect(notifier.notify).toHaveBeenCalledWith(NotificationLevel.ERROR, '1 failure(s) while checking feeds: broken (feed)');
    const saved = JSON.parse(await readFile(configPath, 'utf-8'));
    expect(saved.feeds.tracker.subscriptions.show.episode_number).toBe(2);
    expect(saved.feeds.broken.subscriptions.any).toEqual({ pattern: '(?<episode>\\d+)' });
  });

  it('should leave the file alone when nothing is new', async () => {
    const content = `${JSON.stringify({ feeds: { tracker: { url: FEED_URL, subscriptions: { show: { pattern: 'Show - (?<episode>\\d+)', episode_number: 9 } } } } })}\n`;
    const configPath = await writeConfig('config.json', content);
    const deps = createDeps({ [FEED_URL]: { body: rssDocument([{ title: 'Show - 09', link: 'https://tracker.example.com/9' }]) } });

    expect(await runApp(configPath, createSilentLogger(), notifier, deps)).toBe(0);
    expect(await readFile(configPath, 'utf-8')).toBe(content);
    expect(notifier.notify).not.toHaveBeenCalled();
    expect(launcher).not.toHaveBeenCalled();
  });

  it('should report a configuration error before any request', async () => {
    const configPath = await writeConfig(
      'config.json',
      JSON.stringify({ feeds: { tracker: { url: FEED_URL, subscriptions: { show: { pattern: 'Show - (\\d+)' } } } } }),
    );
    const deps = createDeps({});

    expect(await runApp(configPath, createSilentLogger(), notifier, deps)).toBe(1);
    expect(deps.fetch).not.toHaveBeenCalled();
    expect(notifier.notify).toHaveBeenCalledWith(
      NotificationLevel.ERROR,
      'Configuration error: Feed "tracker" sub "show" pattern "Show - (\\\\d+)" has no group for the episode number',
    );
  });

  it('should report a missing configuration file', async () => {
    const configPath = join(directory, 'missing.json');

    expect(await runApp(configPath, createSilentLogger(), notifier, createDeps({}))).toBe(1);
    expect(notifier.notify).toHaveBeenCalledWith(
      NotificationLevel.ERROR,
      `Configuration error: Configuration file not found: "${configPath}". Create one or see --print-config-schema for reference.`,
    );
  });

  it('should report other failures as fatal', async () => {
    const deps: AppDependencies = {
      ...createDeps({}),
      loadConfig: vi.fn<AppDependencies['loadConfig']>().mockRejectedValue(new Error('EACCES: permission denied')),
    };

    expect(await runApp('config.json', createSilentLogger(), notifier, deps)).toBe(1);
    expect(notifier.notify).toHaveBeenCalledWith(NotificationLevel.ERROR, 'Fatal error: EACCES: permission denied');
  });
});

describe('summarizeFailures', () => {
  it('should name each failing feed, stage and entry', () => {
    expect(
      summarizeFailures({
        matches: 2,
        dispatched: 0,
        failures: [
          { feedName: 'alpha', stage: 'feed', error: new Error('offline') },
          { feedName: 'beta', stage: 'dispatch', entryTitle: 'Show - 02', error: new Error('ENOENT') },
        ],
      }),
    ).toBe('2 failure(s) while checking feeds: alpha (feed), beta (dispatch: "Show - 02")');
  });
});
