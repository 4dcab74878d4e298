import type { Command } from '../dispatch/command.js';
import { EPISODE_GROUP, EpisodeNumber, type MatchGroups } from '../episodes/episode-number.js';
import { ConfigError } from '../errors/custom-errors.js';

export type SubscriptionOptions = {
  feedName: string;
  name: string;
  pattern: string;
  ignoreCase?: boolean;
  seriesNumber?: number;
  episodeNumber?: number;
  /** Overrides the engine default directory */
  directory?: string;
  /** Overrides the engine default command */
  command?: Command;
};

/**
 * Engine-wide fallbacks for a subscription
 */
export type SubscriptionDefaults = {
  directory: string;
  command: Command;
};

/**
 * One pattern watched on a feed, with the progress made on it so far
 */
export class Subscription {
  readonly feedName: string;
  readonly name: string;
  readonly regex: RegExp;
  readonly directory: string;
  readonly command: Command;
  /** Number the run started from */
  readonly initialNumber: EpisodeNumber;
  number: EpisodeNumber;

  /**
   * @throws ConfigError if the pattern does not compile or has no episode group
   */
  constructor(options: SubscriptionOptions, defaults: SubscriptionDefaults) {
    this.feedName = options.feedName;
    this.name = options.name;
    this.regex = compilePattern(options);
    this.initialNumber = new EpisodeNumber(options.seriesNumber, options.episodeNumber);
    this.number = this.initialNumber;
    this.directory = options.directory ?? defaults.directory;
    this.command = options.command ?? defaults.command;
  }

  /**
   * Named groups of the first match in `title`, or undefined if it does not match
   */
  match(title: string): MatchGroups | undefined {
    const match = this.regex.exec(title);
    if (!match) {
      return undefined;
    }
    return match.groups ?? {};
  }

  hasChanged(): boolean {
    return !this.number.equals(this.initialNumber);
  }

  toString(): string {
    return `Subscription(name=${JSON.stringify(this.name)}, feed=${JSON.stringify(this.feedName)})`;
  }
}

function compilePattern({ feedName, name, pattern, ignoreCase }: SubscriptionOptions): RegExp {
  const where = `Feed ${JSON.stringify(feedName)} sub ${JSON.stringify(name)} pattern ${JSON.stringify(pattern)}`;
  const flags = ignoreCase ? 'i' : '';

  let regex: RegExp;
  try {
    regex = new RegExp(pattern, flags);
  } catch (error) {
    throw new ConfigError(`${where} not valid regex: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  if (!declaredGroups(pattern, flags).has(EPISODE_GROUP)) {
    throw new ConfigError(`${where} has no group for the episode number`);
  }
  return regex;
}

/**
 * Named groups a pattern declares. An alternation with the empty pattern
 * always matches the empty string, and every named group shows up on
 * `groups` whether or not it took part.
 */
function declaredGroups(pattern: string, flags: string): Set<string> {
  const groups = new RegExp(`${pattern}|`, flags).exec('')?.groups;
  return new Set(groups ? Object.keys(groups) : []);
}
