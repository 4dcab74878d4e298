import { z } from 'zod';

export const NotificationLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  SUCCESS: 'success',
  HIGHLIGHT: 'highlight',
  WARNING: 'warning',
  ERROR: 'error',
} as const;

export type NotificationLevel = (typeof NotificationLevel)[keyof typeof NotificationLevel];

export const NotificationLevelSchema = z.enum(NotificationLevel);

/**
 * Level priorities for filtering (lower = less severe)
 */
export const LEVEL_PRIORITIES = {
  debug: 0,
  info: 1,
  success: 2,
  highlight: 3,
  warning: 4,
  error: 5,
} as const satisfies Record<NotificationLevel, number>;

/**
 * Whether `level` is at least as severe as `minLevel`
 */
export function isAtLeast(level: NotificationLevel, minLevel: NotificationLevel): boolean {
  return LEVEL_PRIORITIES[level] >= LEVEL_PRIORITIES[minLevel];
}
