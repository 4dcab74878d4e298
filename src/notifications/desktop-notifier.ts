import { execa } from 'execa';
import { describeError, NotificationError } from '../errors/custom-errors.js';
import type { Logger } from '../utils/logger.js';
import { isAtLeast, NotificationLevel } from './notification-level.js';
import type { Notifier } from './notifier.js';

export const NOTIFICATION_TITLE = 'torrentwatch';

/**
 * Runs a notification program to completion
 */
export type NotificationRunner = (file: string, args: string[]) => Promise<unknown>;

const execaRunner: NotificationRunner = (file, args) => execa(file, args, { timeout: 10_000 });

/**
 * Program and arguments that raise a desktop notification, if the platform has one
 */
export function desktopNotificationCommand(
  level: NotificationLevel,
  message: string,
  platform: NodeJS.Platform = process.platform,
): { file: string; args: string[] } | undefined {
  switch (platform) {
    case 'darwin':
      return {
        file: 'osascript',
        args: ['-e', `display notification ${JSON.stringify(message)} with title ${JSON.stringify(NOTIFICATION_TITLE)}`],
      };
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      return {
        file: 'notify-send',
        args: [`--urgency=${level === NotificationLevel.ERROR ? 'critical' : 'normal'}`, NOTIFICATION_TITLE, message],
      };
    default:
      return undefined;
  }
}

/**
 * Desktop notifications through notify-send (or osascript on macOS).
 * Sends errors only unless told otherwise.
 */
export class DesktopNotifier implements Notifier {
  constructor(
    private readonly logger: Logger,
    private readonly minLevel: NotificationLevel = NotificationLevel.ERROR,
    private readonly run: NotificationRunner = execaRunner,
    private readonly platform: NodeJS.Platform = process.platform,
  ) {}

  /**
   * @throws NotificationError if the notification program fails
   */
  async notify(level: NotificationLevel, message: string): Promise<void> {
    if (!isAtLeast(level, this.minLevel)) {
      return;
    }

    const command = desktopNotificationCommand(level, message, this.platform);
    if (!command) {
      this.logger.debug(`Desktop notifications are not supported on ${this.platform}`);
      return;
    }

    try {
      await this.run(command.file, command.args);
    } catch (error) {
      if (isMissingProgram(error)) {
        this.logger.debug(`Desktop notification skipped: ${command.file} not found`);
        return;
      }
      throw new NotificationError(`Failed to send desktop notification: ${describeError(error)}`, { cause: error });
    }
  }
}

function isMissingProgram(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
