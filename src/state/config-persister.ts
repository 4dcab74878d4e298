import { writeFile } from 'node:fs/promises';
import * as yaml from 'js-yaml';
import type { ConfigFormat } from '../config/config-loader.js';
import type { Config } from '../config/config-schema.js';

/**
 * Durable storage the updated configuration is written back to
 */
export type PersistenceSink = {
  save(document: Config): Promise<void>;
};

/**
 * Serialize a configuration document in the format it was read in
 */
export function serializeConfig(document: Config, format: ConfigFormat): string {
  if (format === 'yaml') {
    return yaml.dump(document, { lineWidth: -1, noRefs: true });
  }
  return `${JSON.stringify(document, null, 4)}\n`;
}

/**
 * Writes the configuration back to the file it was loaded from
 */
export class ConfigPersister implements PersistenceSink {
  constructor(
    private readonly path: string,
    private readonly format: ConfigFormat,
  ) {}

  async save(document: Config): Promise<void> {
    try {
      await writeFile(this.path, serializeConfig(document, this.format), 'utf-8');
    } catch (error) {
      throw new Error(
        `Failed to save configuration to ${this.path}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }
}
