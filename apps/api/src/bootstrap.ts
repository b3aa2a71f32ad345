/**
 * Composition root: connects the stores, builds one ingestion pipeline per
 * configured collection, the retrieval pipeline, the specialists and the
 * supervisor, and the ticket services when a tracker is configured.
 *
 * @module @docpilot/api/bootstrap
 */

import { resolve } from 'node:path';
import { getDatabaseManager, initMilvusCollection, loadDatabaseConfig } from '@docpilot/database';
import {
  BatchEmbedder,
  ConcurrencyLimiter,
  ConfluenceSourceAdapter,
  FilesystemSourceAdapter,
  HeuristicClassifier,
  IngestScheduler,
  IngestionCoordinator,
  KeyedMutex,
  MilvusVectorStore,
  ModelClassifier,
  PostgresIngestionLedger,
  RetrievalSpecialist,
  SharePointSourceAdapter,
  createChunker,
  createCompletionService,
  createEmbedder,
  createHealthChecker,
  createIngestionPipeline,
  createRAGPipeline,
  createRetriever,
  createSupervisor,
  loadRagConfig,
  loadSourcesFile,
  type CollectionConfig,
  type RagConfig,
  type SourceAdapter,
  type Specialist,
} from '@docpilot/rag';
import {
  FollowUpNotifier,
  PostgresFollowUpStore,
  createChangelogAnalyzer,
  createFollowUpDetector,
  createJiraClient,
  createJiraSpecialist,
  loadTicketsConfig,
  stalenessWindowMs,
  workflowConfig,
} from '@docpilot/tickets';
import type { ApiConfig } from './config';
import type { Services } from './services';

export interface Runtime {
  services: Services;
  shutdown(): Promise<void>;
}

function createAdapterFactory(rag: RagConfig): (collection: CollectionConfig) => SourceAdapter {
  let filesystem: FilesystemSourceAdapter | null = null;
  let confluence: ConfluenceSourceAdapter | null = null;
  let sharepoint: SharePointSourceAdapter | null = null;

  return (collection) => {
    if (collection.adapter === 'filesystem') {
      filesystem ??= new FilesystemSourceAdapter({ baseDir: resolve(rag.SOURCES_ROOT) });
      return filesystem;
    }

    if (collection.adapter === 'sharepoint') {
      if (!rag.SHAREPOINT_SITE_URL || !rag.SHAREPOINT_TOKEN) {
        throw new Error(
          `Collection "${collection.name}" uses SharePoint but SHAREPOINT_SITE_URL or SHAREPOINT_TOKEN is not set`
        );
      }
      sharepoint ??= new SharePointSourceAdapter({ siteUrl: rag.SHAREPOINT_SITE_URL, token: rag.SHAREPOINT_TOKEN });
      return sharepoint;
    }

    if (!rag.CONFLUENCE_BASE_URL || !rag.CONFLUENCE_TOKEN) {
      throw new Error(
        `Collection "${collection.name}" uses Confluence but CONFLUENCE_BASE_URL or CONFLUENCE_TOKEN is not set`
      );
    }
    confluence ??= new ConfluenceSourceAdapter({ baseUrl: rag.CONFLUENCE_BASE_URL, token: rag.CONFLUENCE_TOKEN });
    return confluence;
  };
}

export async function createRuntime(api: ApiConfig): Promise<Runtime> {
  const databaseConfig = loadDatabaseConfig();
  const rag = loadRagConfig();
  const ticketsConfig = loadTicketsConfig();
  const sources = await loadSourcesFile(rag.SOURCES_FILE);

  const db = getDatabaseManager();
  await db.connect();
  await initMilvusCollection(db.milvus, {
    collectionName: databaseConfig.MILVUS_COLLECTION,
    dimensions: rag.EMBEDDING_DIMENSIONS,
  });

  // ==========================================================================
  // Ingestion
  // ==========================================================================

  const embedder = createEmbedder({
    baseUrl: rag.EMBEDDING_BASE_URL,
    apiKey: rag.EMBEDDING_API_KEY,
    model: rag.EMBEDDING_MODEL,
    dimensions: rag.EMBEDDING_DIMENSIONS,
    timeoutMs: rag.EMBEDDING_TIMEOUT_MS,
  });
  const embeddingLimiter = new ConcurrencyLimiter({
    maxConcurrent: rag.EMBEDDING_MAX_CONCURRENT,
    minIntervalMs: rag.EMBEDDING_MIN_INTERVAL_MS,
  });
  const store = new MilvusVectorStore(db.milvus, { collectionName: databaseConfig.MILVUS_COLLECTION });
  const ledger = new PostgresIngestionLedger(db.postgres);
  const chunker = createChunker({ maxTokens: rag.CHUNK_MAX_TOKENS, overlapTokens: rag.CHUNK_OVERLAP_TOKENS });
  const batchEmbedder = new BatchEmbedder(embedder, embeddingLimiter, { batchSize: rag.EMBEDDING_BATCH_SIZE });
  const mutex = new KeyedMutex();
  const adapterFor = createAdapterFactory(rag);

  const coordinator = new IngestionCoordinator(
    sources.collections.map((collection) => ({
      collection: collection.name,
      source: {
        path: collection.path,
        recursive: collection.recursive,
        include: collection.include,
        exclude: collection.exclude,
      },
      pipeline: createIngestionPipeline(
        { adapter: adapterFor(collection), chunker, embedder: batchEmbedder, store, ledger, mutex },
        { concurrency: rag.INGEST_CONCURRENCY }
      ),
    }))
  );
  const scheduler = new IngestScheduler(
    coordinator,
    sources.collections.map((collection) => ({
      collection: collection.name,
      intervalMinutes: collection.intervalMinutes,
    })),
    { runOnStart: api.INGEST_RUN_ON_START }
  );

  // ==========================================================================
  // Retrieval and routing
  // ==========================================================================

  const completion = createCompletionService({
    baseUrl: rag.LLM_BASE_URL,
    apiKey: rag.LLM_API_KEY,
    model: rag.LLM_MODEL,
    maxTokens: rag.LLM_MAX_TOKENS,
    temperature: rag.LLM_TEMPERATURE,
    timeoutMs: rag.LLM_TIMEOUT_MS,
    streamIdleTimeoutMs: rag.LLM_STREAM_IDLE_TIMEOUT_MS,
  });
  const retriever = createRetriever(embedder, store, {
    topK: rag.RETRIEVAL_TOP_K,
    minScore: rag.RETRIEVAL_MIN_SCORE,
  });
  const pipeline = createRAGPipeline(retriever, completion, { tokenBudget: rag.CONTEXT_TOKEN_BUDGET });

  const analyzer = createChangelogAnalyzer(workflowConfig(ticketsConfig));
  const tracker =
    ticketsConfig.JIRA_BASE_URL && ticketsConfig.JIRA_TOKEN
      ? createJiraClient({
          baseUrl: ticketsConfig.JIRA_BASE_URL,
          token: ticketsConfig.JIRA_TOKEN,
          timeoutMs: ticketsConfig.JIRA_TIMEOUT_MS,
          maxRetries: ticketsConfig.JIRA_MAX_RETRIES,
        })
      : null;

  const specialists: Specialist[] = sources.specialists.map(
    (specialist) => new RetrievalSpecialist(specialist, pipeline)
  );
  if (tracker) {
    specialists.push(createJiraSpecialist(tracker, analyzer));
  } else {
    console.warn('[api] JIRA_BASE_URL or JIRA_TOKEN not set; ticket routes and the jira specialist are disabled');
  }

  const heuristic = new HeuristicClassifier();
  const router = createSupervisor(
    specialists,
    rag.ROUTER_CLASSIFIER === 'model' ? new ModelClassifier(completion, heuristic) : heuristic,
    {
      mode: rag.ROUTER_MODE,
      confidenceThreshold: rag.ROUTER_CONFIDENCE_THRESHOLD,
      tieMargin: rag.ROUTER_TIE_MARGIN,
      fallbackTag: specialists.some((s) => s.tag === rag.ROUTER_FALLBACK) ? rag.ROUTER_FALLBACK : null,
    }
  );

  // ==========================================================================
  // Follow-ups and health
  // ==========================================================================

  const followUps = createFollowUpDetector(new PostgresFollowUpStore(db.postgres), {
    stalenessWindowMs: stalenessWindowMs(ticketsConfig),
  });
  const models = createHealthChecker({ llm: completion, embedder });

  const services: Services = {
    coordinator,
    query: pipeline,
    collections: coordinator.collections,
    router,
    queryLimiter: new ConcurrencyLimiter({
      maxConcurrent: api.QUERY_MAX_CONCURRENT,
      maxQueueSize: api.QUERY_MAX_QUEUE,
      queueTimeoutMs: api.QUERY_QUEUE_TIMEOUT_MS,
    }),
    tickets: {
      tracker,
      analyzer,
      followUps,
      notifier: tracker ? new FollowUpNotifier(tracker, followUps) : null,
      teamQuery: ticketsConfig.JIRA_TEAM_QUERY,
    },
    async health() {
      const [stores, modelStatus] = await Promise.all([
        db.healthCheck({ collection: databaseConfig.MILVUS_COLLECTION }),
        models.checkAll(),
      ]);
      return {
        healthy: stores.healthy && modelStatus.allHealthy,
        components: {
          milvus: stores.milvus,
          postgres: stores.postgres,
          embedding: modelStatus.embedding,
          llm: modelStatus.llm,
        },
      };
    },
  };

  scheduler.start();
  console.log(
    `[api] ${coordinator.collections.length} collection(s), specialists: ${specialists.map((s) => s.tag).join(', ') || 'none'}`
  );

  return {
    services,
    async shutdown() {
      await scheduler.stop();
      await coordinator.shutdown();
      await db.disconnect();
    },
  };
}
