/**
 * Text extraction for fetched documents
 *
 * @module @docpilot/rag/sources/parsing
 */

import { convert } from 'html-to-text';

export type DocumentFormat = 'markdown' | 'html' | 'text';

export interface ParsedText {
  content: string;
  title: string;
}

const FORMATS: Record<string, DocumentFormat> = {
  '.md': 'markdown',
  '.markdown': 'markdown',
  '.html': 'html',
  '.htm': 'html',
  '.txt': 'text',
};

export function formatForPath(path: string): DocumentFormat | null {
  const dot = path.lastIndexOf('.');
  if (dot === -1) return null;
  return FORMATS[path.slice(dot).toLowerCase()] ?? null;
}

function normalizeWhitespace(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\n{3,}/g, '\n\n').trim();
}

function titleFromPath(path: string): string {
  const filename = path.split('/').pop() || 'Untitled';
  return filename.replace(/\.[^.]+$/, '').replace(/[-_]/g, ' ');
}

/**
 * Markdown with optional YAML front matter. `title:` wins, then the first H1,
 * then the file name.
 */
export function parseMarkdown(raw: string, path: string): ParsedText {
  const normalized = raw.replace(/\r\n/g, '\n');
  let title: string | undefined;

  const frontMatter = normalized.match(/^---\n([\s\S]*?)\n---\n?/);
  if (frontMatter) {
    for (const line of frontMatter[1].split('\n')) {
      const field = line.match(/^title:\s*(.+)$/);
      if (field) title = field[1].replace(/^["']|["']$/g, '').trim();
    }
  }

  const body = frontMatter ? normalized.slice(frontMatter[0].length) : normalized;
  title ??= body.match(/^#\s+(.+?)$/m)?.[1].trim();

  return { content: normalizeWhitespace(body), title: title ?? titleFromPath(path) };
}

/**
 * HTML to plain text. Links keep their text only; images are dropped.
 */
export function htmlToText(html: string): string {
  return normalizeWhitespace(
    convert(html, {
      wordwrap: false,
      selectors: [
        { selector: 'a', options: { ignoreHref: true } },
        { selector: 'img', format: 'skip' },
        { selector: 'h1', options: { uppercase: false } },
        { selector: 'h2', options: { uppercase: false } },
        { selector: 'h3', options: { uppercase: false } },
        { selector: 'table', format: 'dataTable', options: { uppercaseHeaderCells: false } },
      ],
    })
  );
}

export function parseDocument(raw: string, path: string, format: DocumentFormat): ParsedText {
  switch (format) {
    case 'markdown':
      return parseMarkdown(raw, path);
    case 'html': {
      const title = raw.match(/<title[^>]*>([^<]*)<\/title>/i)?.[1].trim();
      return { content: htmlToText(raw), title: title || titleFromPath(path) };
    }
    case 'text':
      return { content: normalizeWhitespace(raw), title: titleFromPath(path) };
  }
}
