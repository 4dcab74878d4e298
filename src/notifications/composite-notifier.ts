import { describeError } from '../errors/custom-errors.js';
import type { Logger } from '../utils/logger.js';
import type { NotificationLevel } from './notification-level.js';
import type { Notifier } from './notifier.js';

/**
 * Composite notifier that broadcasts to multiple registered notifiers
 * Notifiers can be added with priority (higher = called first)
 */
export class CompositeNotifier implements Notifier {
  private notifiers: Array<{ notifier: Notifier; priority: number }> = [];

  constructor(private readonly logger: Logger) {}

  /**
   * Add a notifier
   * @param notifier - Notifier instance to add
   * @param priority - Priority (higher = called first). Default: 0
   */
  add(notifier: Notifier, priority: number = 0): this {
    this.notifiers.push({ notifier, priority });
    this.notifiers.sort((a, b) => b.priority - a.priority);
    return this;
  }

  get size(): number {
    return this.notifiers.length;
  }

  /**
   * Send notification to all registered notifiers; a failing one is logged
   * and the rest still run
   */
  async notify(level: NotificationLevel, message: string): Promise<void> {
    for (const { notifier } of this.notifiers) {
      try {
        await notifier.notify(level, message);
      } catch (error) {
        this.logger.warning(`Notifier error: ${describeError(error)}`);
      }
    }
  }
}
