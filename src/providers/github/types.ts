// src/providers/github/types.ts

import { z } from 'zod';

export interface GitHubProviderConfig {
  token?: string;
  apiUrl?: string; // GitHub Enterprise: https://<host>/api/v3
  all?: boolean; // Include notifications already marked as read
  participating?: boolean; // Only direct participation or mentions
  perPage?: number;
  maxPages?: number;
  name?: string;
}

// Fields of GET /notifications that normalization reads; the rest passes through
export const GitHubNotificationSchema = z
  .object({
    id: z.union([z.string().min(1), z.number()]).transform(String),
    reason: z.string().nullish(),
    updated_at: z.string().nullish(),
    subject: z
      .object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        type: z.string().nullish(),
      })
      .nullish(),
    repository: z
      .object({
        full_name: z.string().nullish(),
        html_url: z.string().nullish(),
      })
      .nullish(),
  })
  .passthrough();

export type GitHubNotification = z.infer<typeof GitHubNotificationSchema>;
