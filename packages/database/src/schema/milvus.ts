import { DataType, type MilvusClient } from '@zilliz/milvus2-sdk-node';

export const DEFAULT_COLLECTION_NAME = 'document_chunks';

export interface MilvusCollectionOptions {
  collectionName: string;
  dimensions: number;
}

const createVectorIndex = async (client: MilvusClient, collectionName: string) => {
  await client.createIndex({
    collection_name: collectionName,
    field_name: 'vector',
    index_name: 'vector_hnsw',
    index_type: 'HNSW',
    metric_type: 'COSINE',
    params: { M: 16, efConstruction: 200 },
  });
};

/**
 * Create (or load) the chunk collection. Every logical document collection shares one
 * Milvus collection and is separated by the `collection` field.
 */
export const initMilvusCollection = async (
  client: MilvusClient,
  options: MilvusCollectionOptions
) => {
  const { collectionName, dimensions } = options;
  console.log(`Checking Milvus collection: ${collectionName}...`);

  const hasCollection = await client.hasCollection({
    collection_name: collectionName,
  });

  if (hasCollection.value) {
    console.log(`Collection ${collectionName} already exists.`);
    await createVectorIndex(client, collectionName);
    await client.loadCollectionSync({ collection_name: collectionName });
    return;
  }

  console.log(`Creating collection ${collectionName}...`);

  await client.createCollection({
    collection_name: collectionName,
    fields: [
      {
        name: 'chunk_id',
        description: 'collection/path/version/index digest',
        data_type: DataType.VarChar,
        max_length: 64,
        is_primary_key: true,
        autoID: false,
      },
      {
        name: 'vector',
        data_type: DataType.FloatVector,
        dim: dimensions,
      },
      {
        name: 'collection',
        data_type: DataType.VarChar,
        max_length: 256,
      },
      {
        name: 'path',
        data_type: DataType.VarChar,
        max_length: 2048,
      },
      {
        name: 'version',
        data_type: DataType.Int64,
      },
      {
        name: 'chunk_index',
        data_type: DataType.Int64,
      },
      {
        name: 'token_count',
        data_type: DataType.Int64,
      },
      {
        name: 'content_hash',
        data_type: DataType.VarChar,
        max_length: 64,
      },
      {
        name: 'content_text',
        data_type: DataType.VarChar,
        max_length: 65535,
      },
      {
        name: 'metadata',
        description: 'title and url of the source document',
        data_type: DataType.JSON,
      },
    ],
  });

  console.log(`Creating index for ${collectionName}...`);
  await createVectorIndex(client, collectionName);

  console.log(`Loading collection ${collectionName}...`);
  await client.loadCollectionSync({ collection_name: collectionName });

  console.log(`Collection ${collectionName} initialized successfully.`);
};
