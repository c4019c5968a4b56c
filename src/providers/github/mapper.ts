// src/providers/github/mapper.ts

import { z } from 'zod';
import { GitHubNotificationSchema } from './types';
import type { Notification } from '../../core/notification/types';
import { createNotification } from '../../core/notification/Notification';
import { MalformedItemError } from '../../utils/errors';

export const UNKNOWN_REPO = 'Unknown Repo';
export const UNKNOWN_REASON = 'unknown';

// GitHub `reason` → display type
const REASON_TYPES: Record<string, string> = {
  approval_requested: 'Approval Request',
  assign: 'Assignment',
  author: 'Author',
  ci_activity: 'CI Activity',
  comment: 'Comment',
  invitation: 'Invitation',
  manual: 'Manual',
  mention: 'Mention',
  review_requested: 'Review Request',
  security_alert: 'Security Alert',
  state_change: 'State Change',
  subscribed: 'Subscription',
  team_mention: 'Team Mention',
};

/**
 * Capitalize each run of letters: "new_reason" → "New_Reason"
 */
export function titleCase(value: string): string {
  return value.replace(/[A-Za-z]+/g, (word) => word[0].toUpperCase() + word.slice(1).toLowerCase());
}

export function reasonToType(reason: string): string {
  return REASON_TYPES[reason.toLowerCase()] ?? titleCase(reason);
}

/**
 * API resource URL → github.com page, e.g.
 * https://api.github.com/repos/o/r/pulls/7 → https://github.com/o/r/pull/7
 * URLs of other hosts are returned unchanged.
 */
export function toWebUrl(apiUrl: string): string {
  const prefix = 'https://api.github.com/repos/';
  if (!apiUrl.startsWith(prefix)) return apiUrl;

  return `https://github.com/${apiUrl.slice(prefix.length)}`
    .replace(/\/pulls\/(\d+)$/, '/pull/$1')
    .replace(/\/commits\/([0-9a-f]+)$/i, '/commit/$1');
}

function parseTimestamp(value: string | null | undefined, fallback: () => Date): Date {
  if (!value) return fallback();
  const parsed = new Date(value);
  return isNaN(parsed.getTime()) ? fallback() : parsed;
}

export function mapGitHubNotification(
  raw: unknown,
  source: string,
  now: () => Date
): Notification {
  const record = z.record(z.unknown()).safeParse(raw);
  if (!record.success) {
    throw new MalformedItemError('GitHub notification is not an object', { source });
  }

  const parsed = GitHubNotificationSchema.safeParse(record.data);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
    throw new MalformedItemError(`Unusable GitHub notification: ${issues.join('; ')}`, {
      source,
      issues,
    });
  }

  const item = parsed.data;
  const reason = item.reason || UNKNOWN_REASON;
  const subjectUrl = item.subject?.url;

  return createNotification({
    id: item.id,
    title: item.subject?.title,
    source,
    type: reasonToType(reason),
    timestamp: parseTimestamp(item.updated_at, now),
    repository: item.repository?.full_name || UNKNOWN_REPO,
    url: subjectUrl ? toWebUrl(subjectUrl) : item.repository?.html_url,
    reason,
    rawData: record.data,
  });
}
