/**
 * Zod schemas for configuration validation
 *
 * This file defines both the validation schemas AND the TypeScript types.
 * Keys are snake_case because they are written back into the user's file.
 */

import { z } from 'zod';
import { ConfigError } from '../errors/custom-errors.js';

/**
 * Command template: first item is the program, `$PATH_OR_URL` marks the payload
 */
const CommandSchema = z.array(z.string()).min(1, 'Must name a program to run');

/**
 * Subscription configuration
 */
export const SubscriptionConfigSchema = z.strictObject({
  pattern: z
    .string()
    .min(1)
    .describe('Regular expression matched against entry titles. Must capture (?<episode>...); (?<series>...) is optional'),
  ignore_case: z.boolean().optional().describe('Match the pattern case-insensitively'),
  series_number: z.number().int().nonnegative().optional().describe('Current series number, updated automatically'),
  episode_number: z.number().int().nonnegative().optional().describe('Current episode number, updated automatically'),
  directory: z.string().min(1).optional().describe('Directory torrent files are saved to'),
  command: CommandSchema.optional().describe('Command the torrent path or URL is passed to'),
  use_shell_for_command: z.boolean().optional().describe('Run the command through the shell'),
});

export type SubscriptionConfig = z.infer<typeof SubscriptionConfigSchema>;

/**
 * Feed configuration
 */
export const FeedConfigSchema = z.strictObject({
  url: z.url().describe('URL of the RSS or Atom feed'),
  user_agent: z.string().min(1).optional().describe('User agent for requests to this feed'),
  prefer_torrent_url: z
    .boolean()
    .optional()
    .describe('Hand the torrent URL to the command instead of downloading the file'),
  hide_torrent_filename: z
    .boolean()
    .optional()
    .describe('Name downloaded files after the SHA-256 of their content instead of the entry title'),
  subscriptions: z.record(z.string().min(1), SubscriptionConfigSchema).describe('Subscriptions keyed by name'),
});

export type FeedConfig = z.infer<typeof FeedConfigSchema>;

/**
 * Main configuration schema
 */
export const ConfigSchema = z.strictObject({
  default_directory: z.string().min(1).optional().describe('Directory torrent files are saved to'),
  default_command: CommandSchema.optional().describe(
    'Command the torrent path or URL is passed to. Without one it is opened with the default program',
  ),
  default_command_shell_enabled: z.boolean().optional().describe('Run the default command through the shell'),
  default_user_agent: z.string().min(1).optional().describe('User agent for feed and torrent requests'),
  replace_windows_forbidden_characters: z
    .boolean()
    .optional()
    .describe('Replace characters Windows forbids in filenames with underscores'),
  feeds: z.record(z.string().min(1), FeedConfigSchema).describe('Feeds keyed by name'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Raw configuration document, as parsed from the file
 */
export type RawConfig = Record<string, unknown>;

/**
 * Validate configuration
 *
 * @param rawConfig - Raw configuration object from JSON or YAML
 * @returns The validated configuration
 * @throws ConfigError listing every schema issue
 */
export function validateConfig(rawConfig: unknown): Config {
  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodError(result.error)}`);
  }
  return result.data;
}

/**
 * JSON Schema of the configuration file, for `--print-config-schema`
 */
export function getConfigJsonSchema(): z.core.JSONSchema.JSONSchema {
  return z.toJSONSchema(ConfigSchema);
}

/**
 * Format Zod error into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.map(String).join('.')}"` : 'value';
      const code = issue.code.toUpperCase();
      return `${path} ${issue.message} [${code}]`;
    })
    .join('; ');
}
