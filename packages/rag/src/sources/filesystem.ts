/**
 * Local directory source. Descriptor paths are POSIX paths relative to
 * `baseDir`; only markdown, HTML and plain-text files are listed.
 *
 * @module @docpilot/rag/sources/filesystem
 */

import type { Dirent } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import { join, relative, resolve, sep } from 'node:path';
import { PermanentSourceError, TransientSourceError, errorMessage } from '../errors';
import type { DocumentDescriptor, FetchedDocument } from '../types';
import { createPathFilter, type ListOptions, type SourceAdapter } from './adapter';
import { formatForPath, parseDocument } from './parsing';

export interface FilesystemSourceConfig {
  baseDir: string;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map a Node file-system error onto the source error taxonomy
 */
export function toSourceError(error: unknown, path: string): Error {
  switch (errorCode(error)) {
    case 'ENOENT':
    case 'ENOTDIR':
      return new PermanentSourceError(`Document not found: ${path}`, 'not_found', { cause: error });
    case 'EACCES':
    case 'EPERM':
      return new PermanentSourceError(`Permission denied accessing document: ${path}`, 'access_denied', {
        cause: error,
      });
    case 'EISDIR':
      return new PermanentSourceError(`Not a file: ${path}`, 'rejected', { cause: error });
    default:
      return new TransientSourceError(`Failed to read ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

export class FilesystemSourceAdapter implements SourceAdapter {
  readonly name = 'filesystem';
  private baseDir: string;

  constructor(config: FilesystemSourceConfig) {
    this.baseDir = resolve(config.baseDir);
  }

  async list(options: ListOptions, signal?: AbortSignal): Promise<DocumentDescriptor[]> {
    const root = this.resolveInside(options.path);
    const accept = createPathFilter(options.include, options.exclude);
    const descriptors: DocumentDescriptor[] = [];

    const walk = async (dir: string): Promise<void> => {
      if (signal?.aborted) return;

      let entries: Dirent[];
      try {
        entries = await readdir(dir, { withFileTypes: true });
      } catch (error) {
        throw toSourceError(error, this.toRelative(dir));
      }

      for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
          if (options.recursive) await walk(full);
          continue;
        }
        if (!entry.isFile()) continue;

        const path = this.toRelative(full);
        if (!formatForPath(path) || !accept(path)) continue;

        const info = await stat(full);
        descriptors.push({ path, modifiedAt: info.mtime });
      }
    };

    await walk(root);
    return descriptors;
  }

  async fetch(descriptor: DocumentDescriptor): Promise<FetchedDocument> {
    const format = formatForPath(descriptor.path);
    if (!format) {
      throw new PermanentSourceError(`Unsupported document type: ${descriptor.path}`, 'rejected');
    }

    const full = this.resolveInside(descriptor.path);
    let raw: string;
    try {
      raw = await readFile(full, 'utf8');
    } catch (error) {
      throw toSourceError(error, descriptor.path);
    }

    const parsed = parseDocument(raw, descriptor.path, format);
    return {
      descriptor: { ...descriptor, title: descriptor.title ?? parsed.title },
      content: parsed.content,
    };
  }

  private resolveInside(path: string): string {
    const full = resolve(this.baseDir, path);
    if (full !== this.baseDir && !full.startsWith(this.baseDir + sep)) {
      throw new PermanentSourceError(`Path escapes the source directory: ${path}`, 'access_denied');
    }
    return full;
  }

  private toRelative(full: string): string {
    return relative(this.baseDir, full).split(sep).join('/');
  }
}
