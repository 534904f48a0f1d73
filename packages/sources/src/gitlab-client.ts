/**
 * GitLab API client
 *
 * Only the two listings needed to clone a course group: the groups visible to
 * the token and the projects inside one group. Both endpoints are paginated;
 * the client follows `x-next-page` until it is empty.
 *
 * Uses ky for HTTP requests with built-in retry and timeout.
 */

import ky, { HTTPError, type KyInstance } from 'ky';
import { z } from 'zod';
import type { Logger } from '@simbatch/core';
import { GitLabApiError } from './gitlab-error';

export const GitLabGroupSchema = z.object({
  id: z.number(),
  name: z.string(),
  full_path: z.string(),
});

export const GitLabProjectSchema = z.object({
  id: z.number(),
  name: z.string(),
  path: z.string(),
  ssh_url_to_repo: z.string(),
  default_branch: z.string().nullish(),
});

export type GitLabGroup = z.infer<typeof GitLabGroupSchema>;
export type GitLabProject = z.infer<typeof GitLabProjectSchema>;

export interface GitLabClientConfig {
  url: string;
  token: string;
  timeout?: number;
  retry?: number;
  perPage?: number;
}

export class GitLabClient {
  private http: KyInstance;
  private perPage: number;

  constructor(config: GitLabClientConfig, private logger: Logger) {
    const { url, token, timeout = 30000, retry = 2, perPage = 100 } = config;
    const baseUrl = url.endsWith('/') ? url.slice(0, -1) : url;

    this.perPage = perPage;
    this.http = ky.create({
      prefixUrl: `${baseUrl}/api/v4`,
      timeout,
      retry,
      headers: { 'PRIVATE-TOKEN': token },
    });
  }

  /**
   * Groups whose name is one of `names`, in the order GitLab lists them
   */
  async listGroups(names: readonly string[]): Promise<GitLabGroup[]> {
    const groups = await this.paginate('groups', z.array(GitLabGroupSchema));
    const wanted = groups.filter(group => names.includes(group.name));

    const missing = names.filter(name => !wanted.some(group => group.name === name));
    if (missing.length > 0) {
      this.logger.warn('Groups not visible to this token', { missing });
    }
    return wanted;
  }

  async listProjects(groupId: number): Promise<GitLabProject[]> {
    return this.paginate(`groups/${groupId}/projects`, z.array(GitLabProjectSchema));
  }

  private async paginate<T>(endpoint: string, schema: z.ZodType<T[]>): Promise<T[]> {
    const items: T[] = [];
    let page: string | null = '1';

    while (page) {
      let response: Response;
      try {
        response = await this.http.get(endpoint, {
          searchParams: { per_page: this.perPage, page },
        });
      } catch (error) {
        throw await toApiError(error, endpoint);
      }

      const parsed = schema.safeParse(await response.json());
      if (!parsed.success) {
        throw new GitLabApiError(
          `Unexpected response from ${endpoint}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
          response.status,
          response.statusText,
          parsed.error.issues
        );
      }
      items.push(...parsed.data);

      const next = response.headers.get('x-next-page');
      page = next && next.trim() !== '' ? next.trim() : null;
    }

    this.logger.debug('Listed GitLab resources', { endpoint, count: items.length });
    return items;
  }
}

async function toApiError(error: unknown, endpoint: string): Promise<Error> {
  if (error instanceof HTTPError) {
    const { response } = error;
    const body: unknown = await response.json().catch(() => ({}));
    const message = isMessageBody(body) ? String(body.message) : `HTTP ${response.status}: ${response.statusText}`;
    return new GitLabApiError(`GitLab request to ${endpoint} failed: ${message}`, response.status, response.statusText, body);
  }
  return error instanceof Error ? error : new Error(String(error));
}

function isMessageBody(body: unknown): body is { message: unknown } {
  return typeof body === 'object' && body !== null && 'message' in body;
}
