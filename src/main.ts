import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { ValidationPipe, Logger as NestLogger } from '@nestjs/common';
import { AppModule } from './app.module';
import configuration from './core/config/configuration';
import { RecordStoreExceptionFilter } from './common/filters/record-store-exception.filter';

async function bootstrap() {
  const config = configuration();
  const app = await NestFactory.create(AppModule.forRoot(config));
  const logger = new NestLogger('Bootstrap');

  app.useGlobalPipes(new ValidationPipe());

  // Map store error values (NotFound, InvalidArgument, StorageUnavailable) to HTTP statuses
  app.useGlobalFilters(new RecordStoreExceptionFilter());

  // All routes prefixed with /api
  app.setGlobalPrefix('api');

  if (config.database) {
    try {
      const dataSource = app.get<DataSource>(DataSource);
      if (!dataSource.isInitialized) {
        await dataSource.initialize();
      }
      logger.log('Database connection established successfully');
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Failed to connect to database: ${errorMsg}`);
      process.exit(1);
    }
  }

  const port = app.get(ConfigService).getOrThrow<number>('port');
  await app.listen(port);
  logger.log(`Application running on: http://localhost:${port}`);
  logger.log(`Records backend: ${config.records.backend}`);
  logger.log(`Environment: ${config.nodeEnv}`);
}

bootstrap().catch((err) => {
  const logger = new NestLogger('Bootstrap');
  logger.error(`Failed to bootstrap application: ${err instanceof Error ? err.message : err}`);
  process.exit(1);
});
