// src/sinks/printer/ReceiptFormatter.ts

import type { Notification } from '../../core/notification/types';

export const DEFAULT_WIDTH = 32;

export interface ReceiptFormatOptions {
  width?: number;
  useUtc?: boolean; // Render times in UTC instead of the host's zone
}

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * YYYY-MM-DD HH:MM
 */
export function formatDateTime(date: Date, useUtc = false): string {
  const parts = useUtc
    ? [date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate(), date.getUTCHours(), date.getUTCMinutes()]
    : [date.getFullYear(), date.getMonth() + 1, date.getDate(), date.getHours(), date.getMinutes()];
  const [year, month, day, hours, minutes] = parts;
  return `${year}-${pad(month)}-${pad(day)} ${pad(hours)}:${pad(minutes)}`;
}

/**
 * Greedy word wrap. Words longer than the width stay whole on their own line.
 */
export function wrapText(text: string, width = DEFAULT_WIDTH): string[] {
  const lines: string[] = [];
  let current = '';

  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (current === '') {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current += ` ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }

  if (current) lines.push(current);
  return lines;
}

/**
 * One notification block, each line fitted to the paper width
 */
export function formatNotification(notification: Notification, options: ReceiptFormatOptions = {}): string[] {
  const width = options.width ?? DEFAULT_WIDTH;
  const fit = (line: string) => line.slice(0, width);

  const lines = ['='.repeat(width), fit(`SERVICE: ${notification.source}`)];
  if (notification.repository) lines.push(fit(`REPO: ${notification.repository}`));
  lines.push(fit(`TYPE: ${notification.type}`));
  if (notification.reason) lines.push(fit(`REASON: ${notification.reason.toUpperCase()}`));
  lines.push(fit(`TIME: ${formatDateTime(notification.timestamp, options.useUtc)}`));
  lines.push('-'.repeat(width));
  lines.push(...wrapText(notification.title, width));
  lines.push('='.repeat(width));
  lines.push(''); // Gap between notifications

  return lines;
}

/**
 * Group by source, keeping first-appearance order of sources and batch order within each
 */
export function groupBySource(notifications: readonly Notification[]): Map<string, Notification[]> {
  const groups = new Map<string, Notification[]>();
  for (const notification of notifications) {
    const group = groups.get(notification.source);
    if (group) {
      group.push(notification);
    } else {
      groups.set(notification.source, [notification]);
    }
  }
  return groups;
}

/**
 * Full receipt for one batch: summary header, per-source sections, footer
 */
export function renderReceipt(
  notifications: readonly Notification[],
  printedAt: Date,
  options: ReceiptFormatOptions = {}
): string[] {
  const width = options.width ?? DEFAULT_WIDTH;
  const rule = '='.repeat(width);
  const groups = groupBySource(notifications);

  const lines = [
    rule,
    'NOTIFICATIONS',
    rule,
    `Total: ${notifications.length}`,
    `Services: ${Array.from(groups.keys()).join(', ')}`,
    `Time: ${formatDateTime(printedAt, options.useUtc)}`,
    '',
  ];

  for (const [source, group] of groups) {
    lines.push(`--- ${source.toUpperCase()} ---`, `Count: ${group.length}`, '');
    for (const notification of group) {
      lines.push(...formatNotification(notification, options));
    }
  }

  lines.push(rule, 'END OF NOTIFICATIONS', rule);
  return lines;
}
