import postgres from 'postgres';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import * as schema from '../schema/postgres';
import { getDatabaseConfig, postgresConnectionString } from '../config/index';

export type PostgresDb = PostgresJsDatabase<typeof schema>;
export type PostgresSql = ReturnType<typeof postgres>;

let clientInstance: PostgresSql | null = null;
let dbInstance: PostgresDb | null = null;

export const getPostgresSql = (): PostgresSql => {
  if (clientInstance) return clientInstance;

  const config = getDatabaseConfig();
  console.log(`Connecting to Postgres at ${config.POSTGRES_HOST}:${config.POSTGRES_PORT}...`);

  // postgres.js pools and reconnects on its own
  clientInstance = postgres(postgresConnectionString(config), {
    max: 10,
    onnotice: () => {},
  });
  return clientInstance;
};

export const getPostgresClient = (): PostgresDb => {
  if (dbInstance) return dbInstance;
  dbInstance = drizzle(getPostgresSql(), { schema });
  return dbInstance;
};

export const closePostgresClient = async () => {
  if (clientInstance) {
    await clientInstance.end();
    clientInstance = null;
    dbInstance = null;
  }
};
