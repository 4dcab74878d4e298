/**
 * Program plus arguments, or nothing to open the payload with the default program
 */
export type CommandSpec = {
  arguments?: string[];
  shell: boolean;
};

export type ResolvedSubscriptionConfig = {
  name: string;
  pattern: string;
  ignoreCase: boolean;
  seriesNumber?: number;
  episodeNumber?: number;
  /** Override of the engine's default directory */
  directory?: string;
  /** Override of the engine's default command */
  command?: CommandSpec;
};

export type ResolvedFeedConfig = {
  name: string;
  url: string;
  userAgent?: string;
  preferTorrentUrl: boolean;
  hideTorrentFilename: boolean;
  subscriptions: ResolvedSubscriptionConfig[];
};

/**
 * Fully resolved configuration the engine is built from
 */
export type ResolvedConfig = {
  defaultDirectory: string;
  defaultCommand: CommandSpec;
  defaultUserAgent?: string;
  replaceWindowsForbiddenCharacters: boolean;
  feeds: ResolvedFeedConfig[];
};
