// src/providers/github/GitHubProvider.ts

import { z } from 'zod';
import { BaseProvider } from '../BaseProvider';
import type { ProviderDeps } from '../types';
import type { GitHubProviderConfig } from './types';
import type { Notification } from '../../core/notification/types';
import { mapGitHubNotification } from './mapper';
import { FetchFailedError } from '../../utils/errors';

export const GITHUB_API_URL = 'https://api.github.com';

const PageSchema = z.array(z.unknown());

/**
 * GitHub notifications (GET /notifications) for the token's user.
 *
 * Follows `Link: rel="next"` up to `maxPages` and sends conditional requests,
 * so an unchanged inbox costs a 304 per page.
 */
export class GitHubProvider extends BaseProvider {
  readonly name: string;
  private token: string | undefined;
  private apiUrl: string;

  constructor(
    deps: ProviderDeps,
    private config: GitHubProviderConfig = {}
  ) {
    super(deps);
    this.name = config.name ?? 'GitHub';
    this.token = config.token;
    this.apiUrl = (config.apiUrl ?? GITHUB_API_URL).replace(/\/+$/, '');
  }

  isConfigured(): boolean {
    return this.token !== undefined && this.token.trim() !== '';
  }

  protected async fetchRaw(): Promise<unknown[]> {
    const maxPages = this.config.maxPages ?? 5;
    const items: unknown[] = [];

    for (let page = 1; page <= maxPages; page++) {
      const response = await this.deps.http.get(`${this.apiUrl}/notifications`, {
        provider: this.name,
        headers: {
          Authorization: `Bearer ${this.token ?? ''}`,
          Accept: 'application/vnd.github+json',
          'X-GitHub-Api-Version': '2022-11-28',
        },
        query: {
          all: this.config.all ?? false,
          participating: this.config.participating ?? false,
          per_page: this.config.perPage ?? 50,
          page,
        },
        etagKey: { provider: this.name, resource: `notifications_p${page}` },
      });

      const batch = PageSchema.safeParse(response.data);
      if (!batch.success) {
        throw new FetchFailedError('GitHub notifications response is not a list', {
          provider: this.name,
          status: response.status,
        });
      }

      items.push(...batch.data);

      if (response.cached) {
        this.deps.logger.debug('GitHub notifications unchanged', { provider: this.name, page });
      }

      if (!hasNextPage(response.headers.link)) break;
    }

    return items;
  }

  protected toNotification(raw: unknown): Notification {
    return mapGitHubNotification(raw, this.name, () => this.now());
  }
}

export function hasNextPage(link: string | undefined): boolean {
  return link !== undefined && /<[^>]+>;\s*rel="next"/.test(link);
}
