import { type DefaultConfig, defaults } from './config-defaults.js';
import type { Config, FeedConfig, SubscriptionConfig } from './config-schema.js';
import type { ResolvedConfig, ResolvedFeedConfig, ResolvedSubscriptionConfig } from './resolved-config.types.js';

/**
 * Turn a validated configuration into the typed tree the engine consumes.
 *
 * Engine-wide and feed-wide values are filled in from the defaults here.
 * Subscription overrides stay optional: a subscription falls back to the
 * engine defaults itself.
 */
export function resolveConfig(config: Config, fallback: DefaultConfig = defaults): ResolvedConfig {
  return {
    defaultDirectory: config.default_directory ?? fallback.directory,
    defaultCommand: {
      arguments: config.default_command,
      shell: config.default_command_shell_enabled ?? fallback.commandShellEnabled,
    },
    defaultUserAgent: config.default_user_agent,
    replaceWindowsForbiddenCharacters:
      config.replace_windows_forbidden_characters ?? fallback.replaceWindowsForbiddenCharacters,
    feeds: Object.entries(config.feeds).map(([name, feed]) => resolveFeed(name, feed, fallback)),
  };
}

function resolveFeed(name: string, feed: FeedConfig, fallback: DefaultConfig): ResolvedFeedConfig {
  return {
    name,
    url: feed.url,
    userAgent: feed.user_agent,
    preferTorrentUrl: feed.prefer_torrent_url ?? fallback.preferTorrentUrl,
    hideTorrentFilename: feed.hide_torrent_filename ?? fallback.hideTorrentFilename,
    subscriptions: Object.entries(feed.subscriptions).map(([subName, sub]) => resolveSubscription(subName, sub)),
  };
}

function resolveSubscription(name: string, sub: SubscriptionConfig): ResolvedSubscriptionConfig {
  return {
    name,
    pattern: sub.pattern,
    ignoreCase: sub.ignore_case ?? false,
    seriesNumber: sub.series_number,
    episodeNumber: sub.episode_number,
    directory: sub.directory,
    command: sub.command ? { arguments: sub.command, shell: sub.use_shell_for_command ?? false } : undefined,
  };
}
