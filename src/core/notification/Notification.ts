// src/core/notification/Notification.ts

import { z } from 'zod';
import type { Notification, NotificationInput, NotificationKey } from './types';
import { MalformedItemError } from '../../utils/errors';

export const DEFAULT_TITLE = 'No Title';
export const DEFAULT_TYPE = 'Unknown';

const requiredText = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .refine((value) => value.trim() !== '', { message: `${field} must not be blank` });

// Blank or missing text collapses to undefined so defaults can apply
const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim() !== '' ? value : undefined));

// Validation schema for provider input (exported for reuse in tests and tooling)
export const NotificationSchema = z.object({
  id: requiredText('id'),
  source: requiredText('source'),
  timestamp: z.date({ required_error: 'timestamp is required', invalid_type_error: 'timestamp must be a Date' }),
  title: optionalText,
  type: optionalText,
  repository: optionalText,
  url: optionalText,
  reason: optionalText,
  rawData: z.record(z.unknown()).optional(),
});

/**
 * Build an immutable Notification, applying the title and type fallbacks
 *
 * @throws {MalformedItemError} If id, source or timestamp are unusable
 */
export function createNotification(input: NotificationInput): Notification {
  const result = NotificationSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
    throw new MalformedItemError(`Invalid notification: ${issues.join('; ')}`, {
      source: input.source,
      id: input.id,
      issues,
    });
  }

  const data = result.data;

  return Object.freeze({
    id: data.id,
    title: data.title ?? DEFAULT_TITLE,
    source: data.source,
    type: data.type ?? DEFAULT_TYPE,
    timestamp: data.timestamp,
    ...(data.repository !== undefined && { repository: data.repository }),
    ...(data.url !== undefined && { url: data.url }),
    ...(data.reason !== undefined && { reason: data.reason }),
    ...(data.rawData !== undefined && { rawData: data.rawData }),
  });
}

export function notificationKey(notification: Notification): NotificationKey {
  return { source: notification.source, id: notification.id };
}

/**
 * Same event iff source and id match; every other field may differ
 */
export function isSameEvent(a: Notification, b: Notification): boolean {
  return a.source === b.source && a.id === b.id;
}
