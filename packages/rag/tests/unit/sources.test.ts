/**
 * Source Adapter Tests
 *
 * Filesystem adapter against a temporary directory, Confluence and SharePoint
 * adapters against a fake fetch.
 *
 * @module @docpilot/rag/tests/unit/sources
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PermanentSourceError, TransientSourceError } from '../../src/errors';
import { createPathFilter } from '../../src/sources/adapter';
import { ConfluenceSourceAdapter, parseListPath } from '../../src/sources/confluence';
import { FilesystemSourceAdapter } from '../../src/sources/filesystem';
import { SharePointSourceAdapter, serverRelativeAlias } from '../../src/sources/sharepoint';
import { formatForPath, htmlToText, parseDocument, parseMarkdown } from '../../src/sources/parsing';

async function reasonOf(promise: Promise<unknown>): Promise<string> {
  const error = await promise.then(
    () => null,
    (e: unknown) => e
  );
  return error instanceof PermanentSourceError ? error.reason : 'not permanent';
}

// ============================================================================
// Path Filter
// ============================================================================

describe('createPathFilter', () => {
  it('should apply include before exclude', () => {
    const accept = createPathFilter('^guides/', 'draft');

    expect(accept('guides/deploy.md')).toBe(true);
    expect(accept('guides/draft-deploy.md')).toBe(false);
    expect(accept('notes/deploy.md')).toBe(false);
  });

  it('should accept everything without patterns', () => {
    expect(createPathFilter()('anything')).toBe(true);
  });

  it('should throw for an invalid expression', () => {
    expect(() => createPathFilter('(')).toThrow(SyntaxError);
  });
});

// ============================================================================
// Parsing
// ============================================================================

describe('parsing', () => {
  it('should map extensions to formats', () => {
    expect(formatForPath('a/b.MD')).toBe('markdown');
    expect(formatForPath('page.htm')).toBe('html');
    expect(formatForPath('notes.txt')).toBe('text');
    expect(formatForPath('diagram.png')).toBeNull();
    expect(formatForPath('Makefile')).toBeNull();
  });

  it('should prefer the front matter title, then the first heading, then the file name', () => {
    expect(parseMarkdown('---\ntitle: "Guide"\n---\n# Heading\nBody', 'g.md')).toEqual({
      title: 'Guide',
      content: '# Heading\nBody',
    });
    expect(parseMarkdown('Intro\n# Heading\nBody', 'g.md').title).toBe('Heading');
    expect(parseMarkdown('Body only', 'docs/release-notes_v2.md').title).toBe('release notes v2');
  });

  it('should collapse runs of blank lines', () => {
    expect(parseMarkdown('a\r\n\r\n\r\n\r\nb\n', 'x.md').content).toBe('a\n\nb');
  });

  it('should convert HTML to plain text without link targets or images', () => {
    expect(htmlToText('<h1>Title</h1><p>See <a href="https://x.test">docs</a><img src="a.png"></p>')).toBe(
      'Title\n\nSee docs'
    );
  });

  it('should take the HTML title element', () => {
    expect(parseDocument('<html><head><title> Runbook </title></head><body><p>Step</p></body></html>', 'r.html', 'html'))
      .toEqual({ title: 'Runbook', content: 'Step' });
  });
});

// ============================================================================
// Filesystem
// ============================================================================

describe('FilesystemSourceAdapter', () => {
  let baseDir: string;
  let adapter: FilesystemSourceAdapter;

  beforeAll(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'docpilot-sources-'));
    await mkdir(join(baseDir, 'docs', 'sub'), { recursive: true });
    await writeFile(join(baseDir, 'docs', 'guide.md'), '---\ntitle: Guide\n---\n# Heading\nBody');
    await writeFile(join(baseDir, 'docs', 'notes.txt'), 'Plain notes');
    await writeFile(join(baseDir, 'docs', 'image.png'), 'binary');
    await writeFile(join(baseDir, 'docs', 'sub', 'deep.md'), '# Deep\ntext');
    await writeFile(join(baseDir, 'docs', 'sub', 'draft.md'), '# Draft');
    adapter = new FilesystemSourceAdapter({ baseDir });
  });

  afterAll(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('should list supported files recursively in name order', async () => {
    const listed = await adapter.list({ path: 'docs', recursive: true });

    expect(listed.map((d) => d.path)).toEqual(['docs/guide.md', 'docs/notes.txt', 'docs/sub/deep.md', 'docs/sub/draft.md']);
  });

  it('should stay in the top directory without recursive', async () => {
    const listed = await adapter.list({ path: 'docs', recursive: false });

    expect(listed.map((d) => d.path)).toEqual(['docs/guide.md', 'docs/notes.txt']);
  });

  it('should apply include and exclude patterns', async () => {
    const listed = await adapter.list({ path: 'docs', recursive: true, include: '\\.md$', exclude: 'draft' });

    expect(listed.map((d) => d.path)).toEqual(['docs/guide.md', 'docs/sub/deep.md']);
  });

  it('should fetch a document with its parsed title', async () => {
    const doc = await adapter.fetch({ path: 'docs/guide.md', modifiedAt: new Date(0) });

    expect(doc.descriptor.title).toBe('Guide');
    expect(doc.content).toBe('# Heading\nBody');
  });

  it('should classify missing, unsupported and escaping paths as permanent', async () => {
    expect(await reasonOf(adapter.fetch({ path: 'docs/missing.md', modifiedAt: new Date(0) }))).toBe('not_found');
    expect(await reasonOf(adapter.fetch({ path: 'docs/image.png', modifiedAt: new Date(0) }))).toBe('rejected');
    expect(await reasonOf(adapter.fetch({ path: '../outside.md', modifiedAt: new Date(0) }))).toBe('access_denied');
    expect(await reasonOf(adapter.list({ path: 'nowhere', recursive: true }))).toBe('not_found');
  });
});

// ============================================================================
// Confluence
// ============================================================================

describe('ConfluenceSourceAdapter', () => {
  const BASE = 'https://wiki.test';

  function page(id: string, title: string) {
    return { id, title, space: { key: 'ENG' }, version: { when: '2024-05-01T10:00:00.000Z' }, _links: { webui: `/pages/${id}` } };
  }

  function fakeFetch(routes: Record<string, () => Response>) {
    const requests: Array<{ url: string; init: RequestInit }> = [];
    const fetchImpl = async (url: string, init: RequestInit): Promise<Response> => {
      requests.push({ url, init });
      const route = routes[url.slice(BASE.length)];
      return route ? route() : new Response('missing', { status: 404 });
    };
    return { fetchImpl, requests };
  }

  const json = (body: unknown, status = 200) => () => new Response(JSON.stringify(body), { status });

  it('should page through a whole space', async () => {
    const { fetchImpl, requests } = fakeFetch({
      '/rest/api/content?spaceKey=ENG&type=page&expand=version&limit=2&start=0': json({
        results: [page('1', 'Onboarding'), page('2', 'Deploy')],
        _links: { next: '/rest/api/content?start=2' },
      }),
      '/rest/api/content?spaceKey=ENG&type=page&expand=version&limit=2&start=2': json({
        results: [page('3', 'Oncall')],
        _links: {},
      }),
    });
    const adapter = new ConfluenceSourceAdapter({ baseUrl: `${BASE}/`, token: 'test-token', pageSize: 2 }, fetchImpl);

    const listed = await adapter.list({ path: 'ENG', recursive: true });

    expect(listed.map((d) => d.path)).toEqual(['ENG/1', 'ENG/2', 'ENG/3']);
    expect(listed[0]).toEqual({
      path: 'ENG/1',
      title: 'Onboarding',
      url: 'https://wiki.test/pages/1',
      modifiedAt: new Date('2024-05-01T10:00:00.000Z'),
    });
    expect(requests[0].init.headers).toEqual({ Accept: 'application/json', Authorization: 'Bearer test-token' });
  });

  it('should list a page and its descendants', async () => {
    const { fetchImpl } = fakeFetch({
      '/rest/api/content/7?expand=version': json(page('7', 'Runbooks')),
      '/rest/api/content/7/descendant/page?expand=version&limit=50&start=0': json({ results: [page('8', 'Restart')] }),
    });
    const adapter = new ConfluenceSourceAdapter({ baseUrl: BASE, token: 'test-token' }, fetchImpl);

    const listed = await adapter.list({ path: 'ENG/7', recursive: true });

    expect(listed.map((d) => d.path)).toEqual(['ENG/7', 'ENG/8']);
  });

  it('should fetch a page body as text under its title', async () => {
    const { fetchImpl } = fakeFetch({
      '/rest/api/content/1?expand=body.storage,version': json({
        ...page('1', 'Onboarding'),
        body: { storage: { value: '<p>Hello <b>team</b></p>' } },
      }),
    });
    const adapter = new ConfluenceSourceAdapter({ baseUrl: BASE, token: 'test-token' }, fetchImpl);

    const doc = await adapter.fetch({ path: 'ENG/1', modifiedAt: new Date(5) });

    expect(doc.content).toBe('# Onboarding\n\nHello team');
    expect(doc.descriptor.modifiedAt).toEqual(new Date(5));
  });

  it('should map HTTP failures onto the source error taxonomy', async () => {
    const statuses: Record<string, number> = { '1': 404, '2': 403, '3': 400 };
    const routes: Record<string, () => Response> = {};
    for (const [id, status] of Object.entries(statuses)) {
      routes[`/rest/api/content/${id}?expand=body.storage,version`] = () => new Response('', { status });
    }
    routes['/rest/api/content/4?expand=body.storage,version'] = () => new Response('', { status: 503 });
    const adapter = new ConfluenceSourceAdapter({ baseUrl: BASE, token: 'test-token' }, fakeFetch(routes).fetchImpl);
    const fetchPage = (id: string) => adapter.fetch({ path: `ENG/${id}`, modifiedAt: new Date(0) });

    expect(await reasonOf(fetchPage('1'))).toBe('not_found');
    expect(await reasonOf(fetchPage('2'))).toBe('access_denied');
    expect(await reasonOf(fetchPage('3'))).toBe('rejected');
    await expect(fetchPage('4')).rejects.toBeInstanceOf(TransientSourceError);
  });

  it('should treat a network failure as transient', async () => {
    const adapter = new ConfluenceSourceAdapter({ baseUrl: BASE, token: 'test-token' }, async () => {
      throw new Error('getaddrinfo ENOTFOUND wiki.test');
    });

    await expect(adapter.fetch({ path: 'ENG/1', modifiedAt: new Date(0) })).rejects.toThrow(
      'Confluence request failed: getaddrinfo ENOTFOUND wiki.test'
    );
  });
});

describe('parseListPath', () => {
  it('should split a space key and an optional page id', () => {
    expect(parseListPath('ENG')).toEqual({ spaceKey: 'ENG' });
    expect(parseListPath('ENG/42')).toEqual({ spaceKey: 'ENG', pageId: '42' });
    expect(() => parseListPath('')).toThrow('Invalid Confluence path: ""');
  });
});

// ============================================================================
// SharePoint
// ============================================================================

describe('SharePointSourceAdapter', () => {
  const SITE = 'https://sp.test/sites/eng';
  const ROOT = '/sites/eng/Shared Documents/Specs';

  interface SharePointCall {
    kind: string;
    target: string;
    page: string | null;
    raw: string;
  }

  function file(folder: string, name: string) {
    return { Name: name, ServerRelativeUrl: `${folder}/${name}`, TimeLastModified: '2024-05-01T10:00:00Z' };
  }

  function folder(name: string) {
    return { Name: name, ServerRelativeUrl: `${ROOT}/${name}` };
  }

  function fakeFetch(handler: (call: SharePointCall) => Response | undefined) {
    const calls: SharePointCall[] = [];
    const headers: unknown[] = [];
    const fetchImpl = async (raw: string, init: RequestInit): Promise<Response> => {
      const url = new URL(raw);
      const call: SharePointCall = {
        kind: url.pathname.split('/').pop() ?? '',
        target: (url.searchParams.get('@u') ?? '').slice(1, -1).replace(/''/g, "'"),
        page: url.searchParams.get('$skiptoken'),
        raw,
      };
      calls.push(call);
      headers.push(init.headers);
      return handler(call) ?? new Response('missing', { status: 404 });
    };
    return { fetchImpl, calls, headers };
  }

  const json = (body: unknown) => new Response(JSON.stringify(body), { status: 200 });

  function library() {
    const children: Record<string, { files: unknown[]; folders: unknown[] }> = {
      [`${ROOT}/Payments`]: { files: [file(`${ROOT}/Payments`, 'Refunds.md')], folders: [] },
      [`${ROOT}/Archive`]: { files: [file(`${ROOT}/Archive`, 'Old.md')], folders: [] },
    };

    return fakeFetch((call) => {
      if (call.target === ROOT && call.kind === 'Files') {
        return call.page === null
          ? json({ value: [file(ROOT, 'Overview.md')], 'odata.nextLink': `${call.raw}&$skiptoken=2` })
          : json({ value: [file(ROOT, 'Design.docx'), file(ROOT, 'Api.html')] });
      }
      if (call.target === ROOT && call.kind === 'Folders') {
        return json({ value: [folder('Forms'), folder('Archive'), folder('Payments')] });
      }
      const child = children[call.target];
      if (!child) return undefined;
      return json({ value: call.kind === 'Files' ? child.files : child.folders });
    });
  }

  it('should walk a folder tree, following pages and skipping system folders', async () => {
    const { fetchImpl, calls, headers } = library();
    const adapter = new SharePointSourceAdapter({ siteUrl: `${SITE}/`, token: 'test-token' }, fetchImpl);

    const listed = await adapter.list({ path: ROOT, recursive: true, exclude: '/Archive/' });

    expect(listed.map((d) => d.path)).toEqual([
      `${ROOT}/Api.html`,
      `${ROOT}/Overview.md`,
      `${ROOT}/Payments/Refunds.md`,
    ]);
    expect(listed[1]).toEqual({
      path: `${ROOT}/Overview.md`,
      title: 'Overview',
      url: 'https://sp.test/sites/eng/Shared%20Documents/Specs/Overview.md?web=1',
      modifiedAt: new Date('2024-05-01T10:00:00Z'),
    });
    expect(calls.some((call) => call.target.endsWith('/Forms'))).toBe(false);
    expect(headers[0]).toEqual({ Accept: 'application/json;odata=nometadata', Authorization: 'Bearer test-token' });
  });

  it('should stay in the folder without recursive', async () => {
    const { fetchImpl, calls } = library();
    const adapter = new SharePointSourceAdapter({ siteUrl: SITE, token: 'test-token' }, fetchImpl);

    const listed = await adapter.list({ path: ROOT, recursive: false });

    expect(listed.map((d) => d.path)).toEqual([`${ROOT}/Api.html`, `${ROOT}/Overview.md`]);
    expect(calls.map((call) => call.kind)).toEqual(['Files', 'Files']);
  });

  it('should download and parse a file', async () => {
    const { fetchImpl } = fakeFetch((call) =>
      call.kind === '$value' && call.target === `${ROOT}/Overview.md`
        ? new Response('# Checkout overview\n\nCards and wallets.', { status: 200 })
        : undefined
    );
    const adapter = new SharePointSourceAdapter({ siteUrl: SITE, token: 'test-token' }, fetchImpl);

    const doc = await adapter.fetch({ path: `${ROOT}/Overview.md`, title: 'Overview', modifiedAt: new Date(5) });

    expect(doc.content).toBe('# Checkout overview\n\nCards and wallets.');
    expect(doc.descriptor).toEqual({ path: `${ROOT}/Overview.md`, title: 'Checkout overview', modifiedAt: new Date(5) });
  });

  it('should map HTTP failures onto the source error taxonomy', async () => {
    const statuses: Record<string, number> = { 'a.md': 404, 'b.md': 401, 'c.md': 400, 'd.md': 429 };
    const { fetchImpl } = fakeFetch((call) => {
      const status = statuses[call.target.slice(ROOT.length + 1)];
      return status ? new Response('', { status }) : undefined;
    });
    const adapter = new SharePointSourceAdapter({ siteUrl: SITE, token: 'test-token' }, fetchImpl);
    const fetchFile = (name: string) => adapter.fetch({ path: `${ROOT}/${name}`, modifiedAt: new Date(0) });

    expect(await reasonOf(fetchFile('a.md'))).toBe('not_found');
    expect(await reasonOf(fetchFile('b.md'))).toBe('access_denied');
    expect(await reasonOf(fetchFile('c.md'))).toBe('rejected');
    await expect(fetchFile('d.md')).rejects.toBeInstanceOf(TransientSourceError);
    expect(await reasonOf(fetchFile('spec.docx'))).toBe('rejected');
  });

  it('should treat a network failure as transient', async () => {
    const adapter = new SharePointSourceAdapter({ siteUrl: SITE, token: 'test-token' }, async () => {
      throw new Error('getaddrinfo ENOTFOUND sp.test');
    });

    await expect(adapter.list({ path: ROOT, recursive: true })).rejects.toThrow(
      'SharePoint request failed: getaddrinfo ENOTFOUND sp.test'
    );
  });

  it('should quote server-relative URLs as OData literals', () => {
    expect(serverRelativeAlias("/sites/eng/O'Brien")).toBe("@u='%2Fsites%2Feng%2FO''Brien'");
  });
});
