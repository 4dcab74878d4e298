import { EpisodeNumberError } from '../errors/custom-errors.js';

/**
 * Named capture groups a subscription pattern may declare
 */
export const EPISODE_GROUP = 'episode';
export const SERIES_GROUP = 'series';

/**
 * Named groups of a regex match, as found on `RegExpExecArray.groups`
 */
export type MatchGroups = Record<string, string | undefined>;

/**
 * Series/episode progression of a subscription.
 *
 * Instances are immutable: a subscription moves forward by replacing its
 * number, so a snapshot taken at the start of a cycle never changes under it.
 */
export class EpisodeNumber {
  constructor(
    readonly series?: number,
    readonly episode?: number,
  ) {}

  /**
   * Build a number from the named groups of a pattern match.
   *
   * `episode` must have captured a base-10 integer. `series` is read only
   * when the pattern declares it; a series group that took no part in the
   * match leaves the series absent.
   *
   * @throws EpisodeNumberError if the episode group is missing or not numeric
   */
  static fromMatch(groups: MatchGroups | undefined): EpisodeNumber {
    const episode = parseGroup(groups, EPISODE_GROUP);
    if (episode === undefined) {
      throw new EpisodeNumberError(`Group "${EPISODE_GROUP}" did not capture anything`);
    }
    return new EpisodeNumber(parseGroup(groups, SERIES_GROUP), episode);
  }

  /**
   * Whether this number is progress beyond `other`.
   *
   * A series difference wins over the episode, so S2E01 follows S1E24;
   * without series numbers on both sides only episodes are compared.
   */
  isGreaterThan(other: EpisodeNumber): boolean {
    if (this.episode === undefined) {
      return false;
    }
    if (other.episode === undefined) {
      return true;
    }
    if (this.series !== undefined && other.series !== undefined && this.series !== other.series) {
      return this.series > other.series;
    }
    return this.episode > other.episode;
  }

  equals(other: EpisodeNumber): boolean {
    return this.series === other.series && this.episode === other.episode;
  }

  toString(): string {
    return `S${this.series ?? '?'}E${this.episode ?? '?'}`;
  }

  /**
   * Defined fields only; absent numbers are never serialized
   */
  toJSON(): { series?: number; episode?: number } {
    return {
      ...(this.series !== undefined && { series: this.series }),
      ...(this.episode !== undefined && { episode: this.episode }),
    };
  }
}

function parseGroup(groups: MatchGroups | undefined, name: string): number | undefined {
  const raw = groups?.[name];
  if (raw === undefined) {
    return undefined;
  }
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new EpisodeNumberError(`Group "${name}" captured "${raw}", which is not an integer`);
  }
  const value = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value)) {
    throw new EpisodeNumberError(`Group "${name}" captured "${raw}", which is too large`);
  }
  return value;
}
