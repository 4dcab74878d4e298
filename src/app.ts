import { boolean, command, extendType, flag, oneOf, option, string } from 'cmd-ts';
import { DEFAULT_CONFIG_PATH } from './config/config-defaults.js';
import { type LoadedConfig, loadConfig } from './config/config-loader.js';
import { getConfigJsonSchema } from './config/config-schema.js';
import { execaLauncher, type Launcher } from './dispatch/launcher.js';
import { type CheckReport, Engine } from './engine/engine.js';
import { ConfigError, describeError } from './errors/custom-errors.js';
import type { FetchFn } from './feeds/feed.js';
import { CompositeNotifier } from './notifications/composite-notifier.js';
import { ConsoleNotifier } from './notifications/console-notifier.js';
import { DesktopNotifier } from './notifications/desktop-notifier.js';
import { NotificationLevel, NotificationLevelSchema } from './notifications/notification-level.js';
import type { Notifier } from './notifications/notifier.js';
import { ConfigPersister, type PersistenceSink } from './state/config-persister.js';
import { Logger, LogLevel } from './utils/logger.js';

export type AppDependencies = {
  loadConfig: typeof loadConfig;
  fetch: FetchFn;
  launcher: Launcher;
  createPersistence: (loaded: LoadedConfig) => PersistenceSink;
};

const defaultDependencies: AppDependencies = {
  loadConfig,
  fetch: (url, init) => fetch(url, init),
  launcher: execaLauncher,
  createPersistence: (loaded) => new ConfigPersister(loaded.path, loaded.format),
};

/**
 * One-line account of what went wrong in a check cycle
 */
export function summarizeFailures(report: CheckReport): string {
  const details = report.failures.map(({ feedName, stage, entryTitle }) =>
    entryTitle === undefined ? `${feedName} (${stage})` : `${feedName} (${stage}: ${JSON.stringify(entryTitle)})`,
  );
  return `${report.failures.length} failure(s) while checking feeds: ${details.join(', ')}`;
}

/**
 * Load the configuration, check every feed once, dispatch what is new and
 * write the episode numbers back.
 *
 * @returns Process exit code
 */
export async function runApp(
  configPath: string,
  logger: Logger,
  notifier: Notifier,
  deps: AppDependencies = defaultDependencies,
): Promise<number> {
  try {
    logger.info(`Loading configuration from ${configPath}...`);
    const loaded = await deps.loadConfig(configPath);
    logger.success('Configuration loaded');

    const engine = Engine.fromConfig(loaded, {
      fetch: deps.fetch,
      launcher: deps.launcher,
      logger,
      persistence: deps.createPersistence(loaded),
    });

    const report = await engine.checkAllFeeds();
    const updated = await engine.persistEpisodeNumbers();
    if (updated) {
      logger.success(`Episode numbers saved to ${loaded.path}`);
    }

    if (report.failures.length > 0) {
      await notifier.notify(NotificationLevel.ERROR, summarizeFailures(report));
      return 1;
    }
    if (report.dispatched > 0) {
      await notifier.notify(NotificationLevel.SUCCESS, `Dispatched ${report.dispatched} new torrent(s)`);
    }
    return 0;
  } catch (error) {
    const message =
      error instanceof ConfigError ? `Configuration error: ${error.message}` : `Fatal error: ${describeError(error)}`;
    await notifier.notify(NotificationLevel.ERROR, message);
    return 1;
  }
}

const LOG_LEVEL_NAMES = ['debug', 'info', 'warning', 'error', 'silent'] as const;

const LOG_LEVELS = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warning: LogLevel.WARNING,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
} as const satisfies Record<(typeof LOG_LEVEL_NAMES)[number], LogLevel>;

const notificationLevel = extendType(string, {
  displayName: 'level',
  description: 'Notification level',
  async from(value) {
    const result = NotificationLevelSchema.safeParse(value);
    if (!result.success) {
      throw new Error(`Expected one of: ${NotificationLevelSchema.options.join(', ')}`);
    }
    return result.data;
  },
});

/**
 * Console (through the logger) and desktop notifications
 */
export function createNotifier(logger: Logger, desktopLevel: NotificationLevel): CompositeNotifier {
  return new CompositeNotifier(logger)
    .add(new ConsoleNotifier(logger, NotificationLevel.DEBUG), 10)
    .add(new DesktopNotifier(logger, desktopLevel));
}

// Define CLI using cmd-ts
export const cli = command({
  name: 'torrentwatch',
  description: 'Check torrent RSS feeds for new episodes and hand them to a torrent client',
  version: '0.1.0',
  args: {
    config: option({
      type: string,
      long: 'config',
      short: 'c',
      defaultValue: () => DEFAULT_CONFIG_PATH,
      description: `Path to configuration file, JSON or YAML (default: ${DEFAULT_CONFIG_PATH})`,
    }),
    logLevel: option({
      type: oneOf(LOG_LEVEL_NAMES),
      long: 'log-level',
      short: 'l',
      defaultValue: () => 'info' as const,
      description: `Log level: ${LOG_LEVEL_NAMES.join(', ')} (default: info)`,
    }),
    notifyLevel: option({
      type: notificationLevel,
      long: 'notify-level',
      short: 'n',
      defaultValue: () => NotificationLevel.ERROR,
      description: 'Minimum level sent as a desktop notification (default: error)',
    }),
    printConfigSchema: flag({
      type: boolean,
      long: 'print-config-schema',
      short: 'p',
      description: 'Print the JSON Schema of the configuration file and exit',
    }),
  },
  handler: async ({ config, logLevel, notifyLevel, printConfigSchema }) => {
    if (printConfigSchema) {
      console.log(JSON.stringify(getConfigJsonSchema(), null, 2));
      return;
    }

    const logger = new Logger({ level: LOG_LEVELS[logLevel], useColors: process.stdout.isTTY === true });
    process.exitCode = await runApp(config, logger, createNotifier(logger, notifyLevel));
  },
});
