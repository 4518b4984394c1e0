import { z } from 'zod';
import type { ReleaseRecord } from '../types/release';
import { TransportError } from './errors';
import type { HttpTransport } from './http-transport';

const ReleaseSchema = z.object({
  tag_name: z.string(),
  assets: z.array(
    z.object({
      name: z.string(),
      browser_download_url: z.string().url(),
    })
  ),
});

const ReleaseListSchema = z.array(ReleaseSchema);

type GitHubRelease = z.infer<typeof ReleaseSchema>;

/**
 * Remote catalogue of engine releases.
 */
export interface ReleaseIndex {
  /** Resolves to null when no release carries the tag */
  getRelease(tagName: string): Promise<ReleaseRecord | null>;
  listReleases(): Promise<ReleaseRecord[]>;
}

export interface GitHubReleaseIndexOptions {
  apiUrl: string;
  /** "owner/name" */
  repo: string;
  perPage?: number;
}

export class GitHubReleaseIndex implements ReleaseIndex {
  constructor(
    private readonly transport: HttpTransport,
    private readonly options: GitHubReleaseIndexOptions
  ) {}

  async getRelease(tagName: string): Promise<ReleaseRecord | null> {
    const url = `${this.reposUrl}/releases/tags/${encodeURIComponent(tagName)}`;
    const { status, body } = await this.transport.getJson(url);

    if (status === 404) {
      return null;
    }

    return toRecord(this.parse(ReleaseSchema, body, url));
  }

  async listReleases(): Promise<ReleaseRecord[]> {
    const url = `${this.reposUrl}/releases?per_page=${this.options.perPage ?? 100}`;
    const { status, body } = await this.transport.getJson(url);

    if (status === 404) {
      throw new TransportError(`Release repository ${this.options.repo} not found`, url, status);
    }

    return this.parse(ReleaseListSchema, body, url).map(toRecord);
  }

  private get reposUrl(): string {
    return `${this.options.apiUrl}/repos/${this.options.repo}`;
  }

  private parse<T>(schema: z.ZodType<T>, body: unknown, url: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new TransportError(
        `Unexpected response from release index ${url}: ${result.error.issues[0]?.message ?? 'invalid payload'}`,
        url
      );
    }
    return result.data;
  }
}

function toRecord(release: GitHubRelease): ReleaseRecord {
  return {
    tagName: release.tag_name,
    assets: release.assets.map(asset => ({
      name: asset.name,
      browserDownloadUrl: asset.browser_download_url,
    })),
  };
}
