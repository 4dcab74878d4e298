import { tmpdir } from 'node:os';

/**
 * Defaults applied where the configuration file is silent
 */
export type DefaultConfig = {
  directory: string;
  commandShellEnabled: boolean;
  replaceWindowsForbiddenCharacters: boolean;
  preferTorrentUrl: boolean;
  hideTorrentFilename: boolean;
};

export const DEFAULT_CONFIG_PATH = './config.json';

export const defaults: DefaultConfig = {
  directory: tmpdir(),
  commandShellEnabled: false,
  replaceWindowsForbiddenCharacters: process.platform === 'win32' || process.platform === 'cygwin',
  preferTorrentUrl: true,
  hideTorrentFilename: true,
};
