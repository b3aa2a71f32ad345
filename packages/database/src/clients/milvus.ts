import { MilvusClient } from '@zilliz/milvus2-sdk-node';
import { getDatabaseConfig } from '../config/index';
import { withRetry } from '../retry/index';
import { isMilvusReachable } from '../health/index';

let clientInstance: MilvusClient | null = null;

export const getMilvusClient = async (): Promise<MilvusClient> => {
  if (clientInstance) {
    if (await isMilvusReachable(clientInstance)) {
      return clientInstance;
    }
    console.log('Milvus connection stale, reconnecting...');
    const stale = clientInstance;
    clientInstance = null;
    await stale.closeConnection().catch((error: unknown) => {
      console.warn('Closing stale Milvus connection failed:', error);
    });
  }

  const config = getDatabaseConfig();
  const address = `${config.MILVUS_HOST}:${config.MILVUS_PORT}`;

  // Milvus may still be starting up when the API boots
  const client = await withRetry(
    async () => {
      console.log(`Connecting to Milvus at ${address}...`);
      const candidate = new MilvusClient({
        address,
        username: config.MILVUS_USER,
        password: config.MILVUS_PASSWORD,
      });

      if (!(await isMilvusReachable(candidate))) {
        throw new Error(`Failed to connect to Milvus at ${address}: health check failed`);
      }

      console.log('Successfully connected to Milvus');
      return candidate;
    },
    { label: 'Milvus connect' }
  );

  clientInstance = client;
  return client;
};

export const closeMilvusClient = async () => {
  if (clientInstance) {
    await clientInstance.closeConnection();
    clientInstance = null;
  }
};
