/**
 * @docpilot/rag
 *
 * Incremental ingestion, retrieval and synthesis, and the supervisor router.
 *
 * @module @docpilot/rag
 */

// Types
export * from './types';
export * from './errors';

// Configuration
export {
  loadRagConfig,
  getRagConfig,
  loadSourcesFile,
  parseSourcesFile,
  sourcesFileSchema,
  type RagConfig,
  type SourcesFile,
  type CollectionConfig,
  type SpecialistConfig,
} from './config';

// Concurrency
export { ConcurrencyLimiter, LimiterError, type LimiterConfig, type LimiterStatus } from './concurrency/limiter';
export { KeyedMutex } from './concurrency/mutex';
export { CollectionLockRegistry, type CollectionLease, type LockRegistryConfig } from './concurrency/locks';
export { runWithConcurrency, type PoolOptions, type PoolResult } from './concurrency/pool';

// Sources
export { createPathFilter, type SourceAdapter, type ListOptions } from './sources/adapter';
export { FilesystemSourceAdapter, type FilesystemSourceConfig } from './sources/filesystem';
export { ConfluenceSourceAdapter, type ConfluenceSourceConfig } from './sources/confluence';
export { SharePointSourceAdapter, type SharePointSourceConfig } from './sources/sharepoint';
export { parseDocument, formatForPath, htmlToText } from './sources/parsing';

// Ingestion
export {
  DocumentChunker,
  createChunker,
  countTokens,
  type ChunkerConfig,
  type TextChunk,
  type TokenLanguage,
} from './ingestion/chunker';
export { contentHash, chunkId } from './ingestion/hashing';
export { BatchEmbedder, type BatchEmbedderConfig } from './ingestion/embedder';
export { MilvusVectorStore, type VectorStore, type VectorQuery, type MilvusStoreConfig } from './ingestion/storage';
export { PostgresIngestionLedger, type IngestionLedger } from './ingestion/ledger';
export {
  IngestionPipeline,
  createIngestionPipeline,
  type IngestionPipelineConfig,
  type IngestionDependencies,
  type SyncOptions,
} from './ingestion/pipeline';
export {
  IngestionCoordinator,
  type CollectionBinding,
  type CollectionStatus,
  type IngestionRun,
  type IngestionRunOutcome,
  type Syncable,
} from './ingestion/coordinator';
export { IngestScheduler, type ScheduleEntry, type SchedulerOptions } from './ingestion/scheduler';

// Generation
export {
  OpenAICompatibleEmbedder,
  createEmbedder,
  type EmbeddingService,
  type EmbeddingClientConfig,
} from './generation/embedder';
export {
  OpenAICompletionService,
  createCompletionService,
  CompletionServiceError,
  classifyCompletionError,
  type ChatCompletionService,
  type CompletionClientConfig,
  type CompletionErrorType,
} from './generation/llm';
export { numberSources, selectCitations, extractCitationNumbers, type ContextSource } from './generation/citations';
export { NO_GROUNDED_ANSWER_TEXT, buildChatMessages } from './generation/prompts';
export { Channel, SSE_HEADERS, toSSEMessage, formatSSEEvent, parseSSEEvent, parseSSEBody } from './generation/streaming';
export {
  ModelHealthChecker,
  createHealthChecker,
  type HealthCheckable,
  type ModelHealthStatus,
} from './generation/health';

// Retrieval
export { VectorRetriever, createRetriever, compareHits, type RetrieverConfig } from './retrieval/vector';
export { fitTokenBudget, truncateToTokens } from './retrieval/context';

// Pipeline
export { RAGPipeline, createRAGPipeline, type RAGPipelineConfig } from './pipeline';

// Router
export {
  RouterStateMachine,
  InvalidTransitionError,
  TRANSITIONS,
  canTransition,
  type RouterState,
} from './router/state-machine';
export {
  HeuristicClassifier,
  ModelClassifier,
  keywordScore,
  extractTicketKeys,
  type QueryClassifier,
  type SpecialistScore,
} from './router/classifier';
export {
  RetrievalSpecialist,
  type Specialist,
  type SpecialistRequest,
  type RetrievalSpecialistOptions,
} from './router/specialists';
export {
  SupervisorRouter,
  createSupervisor,
  dedupeCitations,
  mergeAnswers,
  orderAnswers,
  type RouteMode,
  type RouteRequest,
  type RouteOptions,
  type RouteOutcome,
  type RouteStreamOutcome,
  type AnswerOutcome,
  type StreamOutcome,
  type ClarificationOutcome,
  type ClarificationReason,
  type FailedOutcome,
  type SpecialistResult,
  type SpecialistFailure,
  type SupervisorConfig,
} from './router/supervisor';
