import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { DatabaseConfiguration } from 'src/core/config/configuration';
import { RecordEntity } from 'src/modules/records/entities/record.entity';

// Detect if SSL is required from DATABASE_URL (e.g., ?sslmode=require from Neon, Supabase)
export const getSSLConfig = (dbUrl: string, nodeEnv: string): boolean | object => {
  if (dbUrl.includes('sslmode=require')) {
    return { rejectUnauthorized: false };
  }

  // Most cloud databases require SSL in production
  if (nodeEnv === 'production') {
    return { rejectUnauthorized: false };
  }

  return false;
};

export const buildDatabaseConfig = (options: DatabaseConfiguration): TypeOrmModuleOptions => ({
  type: 'postgres',
  url: options.url,
  synchronize: options.synchronize,
  entities: [RecordEntity],
  ssl: getSSLConfig(options.url, options.nodeEnv),
  schema: 'public',
  extra: {
    max: 20,
    min: 2,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    statement_timeout: 30000, // storage faults surface as StorageUnavailable instead of hanging
  },
});
