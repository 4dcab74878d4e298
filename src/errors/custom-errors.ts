/**
 * Base error class for torrentwatch
 */
export class TorrentwatchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TorrentwatchError';
  }
}

/**
 * Configuration error (schema violation, bad pattern, missing file)
 */
export class ConfigError extends TorrentwatchError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * A regex match that cannot be turned into an episode number
 */
export class EpisodeNumberError extends TorrentwatchError {
  constructor(message: string) {
    super(message);
    this.name = 'EpisodeNumberError';
  }
}

/**
 * Feed error (fetch, parse, link resolution or torrent download)
 */
export class FeedError extends TorrentwatchError {
  constructor(
    message: string,
    public readonly feedName: string,
    public readonly url: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'FeedError';
  }
}

/**
 * Failure handing a payload to the dispatch command
 */
export class DispatchError extends TorrentwatchError {
  constructor(
    message: string,
    public readonly payload: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'DispatchError';
  }
}

/**
 * Notification error
 */
export class NotificationError extends TorrentwatchError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NotificationError';
  }
}

/**
 * Render an error and its cause chain on one line
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error.cause === undefined) {
    return error.message;
  }
  return `${error.message}: ${describeError(error.cause)}`;
}
