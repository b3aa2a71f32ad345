/**
 * SharePoint Source Adapter
 *
 * Lists files of a document library folder through the SharePoint REST API
 * and downloads their content. A list path is the folder's server-relative
 * URL ("/sites/eng/Shared Documents/Specs"); descriptor paths are the files'
 * server-relative URLs, so include/exclude patterns match the full location.
 * Only formats `parseDocument` understands are listed.
 *
 * @module @docpilot/rag/sources/sharepoint
 */

import { z } from 'zod';
import { PermanentSourceError, TransientSourceError, errorMessage } from '../errors';
import type { DocumentDescriptor, FetchedDocument } from '../types';
import { createPathFilter, httpSourceError, type FetchLike, type ListOptions, type SourceAdapter } from './adapter';
import { formatForPath, parseDocument } from './parsing';

export interface SharePointSourceConfig {
  /** Site URL, e.g. https://example.sharepoint.com/sites/eng */
  siteUrl: string;
  /** OAuth bearer token for the site */
  token: string;
  pageSize: number;
}

const DEFAULT_CONFIG: Omit<SharePointSourceConfig, 'siteUrl' | 'token'> = {
  pageSize: 100,
};

// Library system folder holding list forms, never documents
const SYSTEM_FOLDERS = new Set(['Forms']);

const fileSchema = z.object({
  Name: z.string(),
  ServerRelativeUrl: z.string(),
  TimeLastModified: z.string(),
});

const folderSchema = z.object({
  Name: z.string(),
  ServerRelativeUrl: z.string(),
});

function collectionSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    value: z.array(item),
    'odata.nextLink': z.string().optional(),
  });
}

type SharePointFile = z.infer<typeof fileSchema>;

/**
 * OData string literal for a server-relative URL, passed as the `@u` alias
 */
export function serverRelativeAlias(url: string): string {
  return `@u=${encodeURIComponent(`'${url.replace(/'/g, "''")}'`)}`;
}

export class SharePointSourceAdapter implements SourceAdapter {
  readonly name = 'sharepoint';
  private config: SharePointSourceConfig;
  private origin: string;
  private fetchImpl: FetchLike;

  constructor(
    config: Pick<SharePointSourceConfig, 'siteUrl' | 'token'> & Partial<SharePointSourceConfig>,
    fetchImpl: FetchLike = fetch
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config, siteUrl: config.siteUrl.replace(/\/$/, '') };
    this.origin = new URL(this.config.siteUrl).origin;
    this.fetchImpl = fetchImpl;
  }

  async list(options: ListOptions, signal?: AbortSignal): Promise<DocumentDescriptor[]> {
    const accept = createPathFilter(options.include, options.exclude);
    const descriptors: DocumentDescriptor[] = [];
    const pending = [options.path.replace(/\/$/, '')];

    while (pending.length > 0) {
      const folder = pending.shift() ?? '';
      const files = await this.collect(
        this.folderUrl(folder, 'Files', 'Name,ServerRelativeUrl,TimeLastModified'),
        fileSchema,
        signal
      );

      for (const file of files) {
        if (formatForPath(file.Name) && accept(file.ServerRelativeUrl)) {
          descriptors.push(this.toDescriptor(file));
        }
      }

      if (options.recursive) {
        const folders = await this.collect(
          this.folderUrl(folder, 'Folders', 'Name,ServerRelativeUrl'),
          folderSchema,
          signal
        );
        pending.push(
          ...folders.filter((sub) => !SYSTEM_FOLDERS.has(sub.Name)).map((sub) => sub.ServerRelativeUrl)
        );
      }
    }

    console.log(`[sharepoint] ${options.path}: ${descriptors.length} file(s) listed`);
    return descriptors.sort((a, b) => a.path.localeCompare(b.path));
  }

  async fetch(descriptor: DocumentDescriptor, signal?: AbortSignal): Promise<FetchedDocument> {
    const format = formatForPath(descriptor.path);
    if (!format) {
      throw new PermanentSourceError(`Unsupported SharePoint file type: ${descriptor.path}`, 'rejected');
    }

    const response = await this.request(
      `${this.config.siteUrl}/_api/web/GetFileByServerRelativeUrl(@u)/$value?${serverRelativeAlias(descriptor.path)}`,
      '*/*',
      signal
    );
    const parsed = parseDocument(await response.text(), descriptor.path, format);

    return {
      descriptor: { ...descriptor, title: parsed.title },
      content: parsed.content,
    };
  }

  private folderUrl(folder: string, kind: 'Files' | 'Folders', select: string): string {
    return (
      `${this.config.siteUrl}/_api/web/GetFolderByServerRelativeUrl(@u)/${kind}` +
      `?${serverRelativeAlias(folder)}&$select=${select}&$top=${this.config.pageSize}`
    );
  }

  private toDescriptor(file: SharePointFile): DocumentDescriptor {
    return {
      path: file.ServerRelativeUrl,
      modifiedAt: new Date(file.TimeLastModified),
      title: file.Name.replace(/\.[^.]+$/, ''),
      url: `${this.origin}${encodeURI(file.ServerRelativeUrl)}?web=1`,
    };
  }

  /**
   * Every item of a collection, following `odata.nextLink` pages
   */
  private async collect<T extends z.ZodTypeAny>(
    firstUrl: string,
    item: T,
    signal?: AbortSignal
  ): Promise<Array<z.infer<T>>> {
    const schema = collectionSchema(item);
    const items: Array<z.infer<T>> = [];
    let next: string | undefined = firstUrl;

    while (next) {
      const response = await this.request(next, 'application/json;odata=nometadata', signal);
      const page = schema.parse(await response.json());
      items.push(...page.value);
      next = page.value.length > 0 ? page['odata.nextLink'] : undefined;
    }

    return items;
  }

  private async request(url: string, accept: string, signal?: AbortSignal): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          Accept: accept,
          Authorization: `Bearer ${this.config.token}`,
        },
        signal,
      });
    } catch (error) {
      throw new TransientSourceError(`SharePoint request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (response.ok) return response;
    const path = url.slice(this.origin.length).split('?')[0];
    throw httpSourceError(`SharePoint ${path} returned ${response.status}`, response.status);
  }
}
