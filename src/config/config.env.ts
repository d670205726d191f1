export const EDUHUB_DB_NAME = 'eduhub_db';

export interface MongoConfig {
  url?: string;
  host: string;
  port: number;
  dbName: string;
  serverSelectionTimeoutMS: number;
}

export default () => ({
  mongo: {
    url: process.env.MONGO_URL || undefined,
    host: process.env.MONGO_HOST || 'localhost',
    port: parseInt(process.env.MONGO_PORT ?? '', 10) || 27017,
    dbName: EDUHUB_DB_NAME,
    serverSelectionTimeoutMS:
      parseInt(process.env.MONGO_SERVER_SELECTION_TIMEOUT_MS ?? '', 10) || 5000,
  } satisfies MongoConfig,
});

export const MONGO = 'mongo';

// MONGO_URL wins over host/port when both are set
export function buildMongoUri(config: Pick<MongoConfig, 'url' | 'host' | 'port'>): string {
  if (config.url) return config.url;
  return `mongodb://${config.host}:${config.port}`;
}
