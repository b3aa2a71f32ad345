import { createHash } from 'node:crypto';

/**
 * sha256 of the document text, hex encoded
 */
export function contentHash(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Stable 64-character primary key of one chunk of one document version
 */
export function chunkId(collection: string, path: string, version: number, chunkIndex: number): string {
  return createHash('sha256')
    .update([collection, path, String(version), String(chunkIndex)].join('\u0000'))
    .digest('hex');
}
