/**
 * Confluence Source Adapter
 *
 * Lists pages through the Confluence REST API and converts their storage
 * format (XHTML) to plain text. A list path is either a space key ("ENG"),
 * meaning every page of the space, or "SPACE/<pageId>", meaning that page and,
 * with `recursive`, all of its descendants. Descriptor paths are always
 * "SPACE/<pageId>", which stays stable across page renames.
 *
 * @module @docpilot/rag/sources/confluence
 */

import { z } from 'zod';
import { PermanentSourceError, TransientSourceError, errorMessage } from '../errors';
import type { DocumentDescriptor, FetchedDocument } from '../types';
import { createPathFilter, httpSourceError, type FetchLike, type ListOptions, type SourceAdapter } from './adapter';
import { htmlToText } from './parsing';

export interface ConfluenceSourceConfig {
  /** Site root, e.g. https://wiki.example.com */
  baseUrl: string;
  /** Personal access token or OAuth bearer token */
  token: string;
  pageSize: number;
}

const DEFAULT_CONFIG: Omit<ConfluenceSourceConfig, 'baseUrl' | 'token'> = {
  pageSize: 50,
};

const pageSummarySchema = z.object({
  id: z.string(),
  type: z.string().optional(),
  title: z.string(),
  space: z.object({ key: z.string() }).optional(),
  version: z.object({ when: z.string() }).optional(),
  _links: z.object({ webui: z.string().optional() }).optional(),
});

const pageListSchema = z.object({
  results: z.array(pageSummarySchema),
  size: z.number().optional(),
  _links: z.object({ next: z.string().optional() }).optional(),
});

const pageBodySchema = pageSummarySchema.extend({
  body: z.object({
    storage: z.object({ value: z.string() }),
  }),
});

type PageSummary = z.infer<typeof pageSummarySchema>;

export function parseListPath(path: string): { spaceKey: string; pageId?: string } {
  const [spaceKey, pageId] = path.split('/').filter(Boolean);
  if (!spaceKey) {
    throw new PermanentSourceError(`Invalid Confluence path: "${path}"`, 'rejected');
  }
  return pageId ? { spaceKey, pageId } : { spaceKey };
}

export class ConfluenceSourceAdapter implements SourceAdapter {
  readonly name = 'confluence';
  private config: ConfluenceSourceConfig;
  private fetchImpl: FetchLike;

  constructor(
    config: Pick<ConfluenceSourceConfig, 'baseUrl' | 'token'> & Partial<ConfluenceSourceConfig>,
    fetchImpl: FetchLike = fetch
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config, baseUrl: config.baseUrl.replace(/\/$/, '') };
    this.fetchImpl = fetchImpl;
  }

  async list(options: ListOptions, signal?: AbortSignal): Promise<DocumentDescriptor[]> {
    const { spaceKey, pageId } = parseListPath(options.path);
    const accept = createPathFilter(options.include, options.exclude);
    const pages: PageSummary[] = [];

    if (pageId) {
      pages.push(pageSummarySchema.parse(await this.get(`/rest/api/content/${pageId}?expand=version`, signal)));
      if (options.recursive) {
        pages.push(...(await this.paginate(`/rest/api/content/${pageId}/descendant/page`, {}, signal)));
      }
    } else {
      pages.push(...(await this.paginate('/rest/api/content', { spaceKey, type: 'page' }, signal)));
    }

    return pages
      .map((page) => this.toDescriptor(spaceKey, page))
      .filter((descriptor) => accept(descriptor.path));
  }

  async fetch(descriptor: DocumentDescriptor, signal?: AbortSignal): Promise<FetchedDocument> {
    const { spaceKey, pageId } = parseListPath(descriptor.path);
    if (!pageId) {
      throw new PermanentSourceError(`Not a page path: "${descriptor.path}"`, 'rejected');
    }

    const page = pageBodySchema.parse(
      await this.get(`/rest/api/content/${pageId}?expand=body.storage,version`, signal)
    );
    const text = htmlToText(page.body.storage.value);

    return {
      descriptor: { ...this.toDescriptor(spaceKey, page), modifiedAt: descriptor.modifiedAt },
      content: text ? `# ${page.title}\n\n${text}` : '',
    };
  }

  private toDescriptor(spaceKey: string, page: PageSummary): DocumentDescriptor {
    const webui = page._links?.webui;
    return {
      path: `${page.space?.key ?? spaceKey}/${page.id}`,
      modifiedAt: page.version ? new Date(page.version.when) : new Date(0),
      title: page.title,
      url: webui ? `${this.config.baseUrl}${webui}` : undefined,
    };
  }

  private async paginate(
    path: string,
    query: Record<string, string>,
    signal?: AbortSignal
  ): Promise<PageSummary[]> {
    const pages: PageSummary[] = [];
    let start = 0;

    while (true) {
      const params = new URLSearchParams({
        ...query,
        expand: 'version',
        limit: String(this.config.pageSize),
        start: String(start),
      });
      const batch = pageListSchema.parse(await this.get(`${path}?${params}`, signal));
      pages.push(...batch.results);

      if (!batch._links?.next || batch.results.length === 0) break;
      start += batch.results.length;
    }

    return pages;
  }

  private async get(path: string, signal?: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.config.baseUrl}${path}`, {
        headers: {
          Accept: 'application/json',
          Authorization: `Bearer ${this.config.token}`,
        },
        signal,
      });
    } catch (error) {
      throw new TransientSourceError(`Confluence request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (response.ok) {
      return response.json();
    }

    throw httpSourceError(`Confluence ${path} returned ${response.status}`, response.status);
  }
}
