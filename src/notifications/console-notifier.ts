import type { Logger } from '../utils/logger.js';
import { isAtLeast, NotificationLevel } from './notification-level.js';
import type { Notifier } from './notifier.js';

/**
 * Console notifier for terminal output with configurable minimum level
 */
export class ConsoleNotifier implements Notifier {
  constructor(
    private readonly logger: Logger,
    private readonly minLevel: NotificationLevel = NotificationLevel.INFO,
  ) {}

  notify(level: NotificationLevel, message: string): void {
    if (!isAtLeast(level, this.minLevel)) {
      return;
    }

    switch (level) {
      case NotificationLevel.DEBUG:
        this.logger.debug(message);
        break;
      case NotificationLevel.INFO:
        this.logger.info(message);
        break;
      case NotificationLevel.SUCCESS:
        this.logger.success(message);
        break;
      case NotificationLevel.WARNING:
        this.logger.warning(message);
        break;
      case NotificationLevel.ERROR:
        this.logger.error(message);
        break;
      case NotificationLevel.HIGHLIGHT:
        this.logger.highlight(message);
        break;
    }
  }
}
