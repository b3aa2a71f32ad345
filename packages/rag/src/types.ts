/**
 * Core types shared by ingestion, retrieval and routing
 * @module @docpilot/rag/types
 */

// ============================================================================
// Documents and Chunks
// ============================================================================

/**
 * A document as listed by a source adapter
 */
export interface DocumentDescriptor {
  /** Source-relative identity of the document inside its collection */
  path: string;
  modifiedAt: Date;
  title?: string;
  url?: string;
}

export interface FetchedDocument {
  descriptor: DocumentDescriptor;
  content: string;
}

/**
 * A stored fragment of one document version
 */
export interface ChunkRecord {
  id: string;
  collection: string;
  path: string;
  version: number;
  contentHash: string;
  chunkIndex: number;
  text: string;
  tokenCount: number;
  title?: string;
  url?: string;
}

export interface EmbeddedChunk extends ChunkRecord {
  embedding: number[];
}

export interface ScoredChunk {
  chunk: ChunkRecord;
  score: number;
}

/**
 * Ledger entry for one (collection, path)
 */
export interface IngestionRecord {
  collection: string;
  path: string;
  contentHash: string;
  version: number;
  title: string | null;
  url: string | null;
  chunkCount: number;
  lastSuccessAt: Date | null;
  lastAttemptAt: Date;
  lastError: string | null;
}

// ============================================================================
// Ingestion
// ============================================================================

export interface SourceConfig {
  /** Root the adapter lists from (directory, Confluence space key, ...) */
  path: string;
  recursive: boolean;
  /** Regular expression a document path must match */
  include?: string;
  /** Regular expression that removes a document path */
  exclude?: string;
}

export type IngestionFailureKind =
  | 'not_found'
  | 'access_denied'
  | 'rejected'
  | 'transient'
  | 'embedding'
  | 'vector_store'
  | 'empty_document'
  | 'unknown';

export interface IngestionFailure {
  path: string;
  kind: IngestionFailureKind;
  message: string;
  attempts: number;
}

export interface IngestionReport {
  collection: string;
  ingested: number;
  unchanged: number;
  deleted: number;
  failed: number;
  failures: IngestionFailure[];
  cancelled: boolean;
  startedAt: Date;
  finishedAt: Date;
}

// ============================================================================
// Query and Answer
// ============================================================================

export interface Query {
  question: string;
  collections: string[];
  topK?: number;
  minScore?: number;
  tokenBudget?: number;
}

export interface CitedDocument {
  collection: string;
  path: string;
  title?: string;
  url?: string;
  /** Best chunk score of this document in the context */
  score: number;
}

export type AnswerStatus = 'grounded' | 'no_grounded_answer';

export interface Answer {
  status: AnswerStatus;
  text: string;
  citations: CitedDocument[];
  chunks: ScoredChunk[];
}

/**
 * Streaming answer: citations are known before the first fragment arrives.
 * `fragments` can be iterated once.
 */
export interface AnswerStream {
  status: AnswerStatus;
  citations: CitedDocument[];
  chunks: ScoredChunk[];
  fragments: AsyncIterable<string>;
  cancel(reason?: string): void;
}

// ============================================================================
// Generation
// ============================================================================

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Server-sent event payloads for streamed answers
 */
export type StreamEvent =
  | { type: 'route'; specialists: string[] }
  | { type: 'citations'; status: AnswerStatus; citations: CitedDocument[] }
  | { type: 'token'; content: string }
  | { type: 'done'; latencyMs: number }
  | { type: 'error'; error: string };

// ============================================================================
// API
// ============================================================================

/**
 * Standard error response
 */
export interface ErrorResponse {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface ComponentHealth {
  healthy: boolean;
  latencyMs?: number;
  message?: string;
}
