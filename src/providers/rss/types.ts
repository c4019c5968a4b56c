// src/providers/rss/types.ts

import { z } from 'zod';

export interface RSSProviderConfig {
  feeds: string[];
  limit?: number; // Items per feed (default: 50)
  name?: string;
}

// rss-parser item plus the title of the feed it came from
export const FeedItemSchema = z
  .object({
    guid: z.string().nullish(),
    id: z.string().nullish(),
    link: z.string().nullish(),
    title: z.string().nullish(),
    isoDate: z.string().nullish(),
    pubDate: z.string().nullish(),
    categories: z.array(z.unknown()).nullish(),
    feedTitle: z.string().nullish(),
    feedUrl: z.string(),
  })
  .passthrough();

export type FeedItem = z.infer<typeof FeedItemSchema>;
