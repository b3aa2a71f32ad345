/**
 * Source adapters list and fetch documents of one collection.
 *
 * `fetch` must tell missing documents, denied access and transient trouble
 * apart: throw `PermanentSourceError` ('not_found' | 'access_denied' |
 * 'rejected') or `TransientSourceError`.
 *
 * @module @docpilot/rag/sources/adapter
 */

import { PermanentSourceError, TransientSourceError } from '../errors';
import type { DocumentDescriptor, FetchedDocument, SourceConfig } from '../types';

export type ListOptions = SourceConfig;

export interface SourceAdapter {
  readonly name: string;
  list(options: ListOptions, signal?: AbortSignal): Promise<DocumentDescriptor[]>;
  fetch(descriptor: DocumentDescriptor, signal?: AbortSignal): Promise<FetchedDocument>;
}

export interface PathFilter {
  (path: string): boolean;
}

/**
 * Build the include/exclude predicate. Invalid expressions throw here, before
 * anything is listed.
 */
export function createPathFilter(include?: string, exclude?: string): PathFilter {
  const includeRe = include ? new RegExp(include) : null;
  const excludeRe = exclude ? new RegExp(exclude) : null;

  return (path) => (!includeRe || includeRe.test(path)) && !(excludeRe && excludeRe.test(path));
}

/** `fetch` as the HTTP adapters call it; tests pass a fake */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Error for a failed HTTP response: gone or missing is `not_found`, 401/403
 * `access_denied`, timeouts, throttling and 5xx transient, the rest `rejected`.
 */
export function httpSourceError(message: string, status: number): Error {
  if (status === 404 || status === 410) {
    return new PermanentSourceError(message, 'not_found');
  }
  if (status === 401 || status === 403) {
    return new PermanentSourceError(message, 'access_denied');
  }
  if (status === 408 || status === 429 || status >= 500) {
    return new TransientSourceError(message);
  }
  return new PermanentSourceError(message, 'rejected');
}
