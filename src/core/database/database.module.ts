import { DynamicModule, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DatabaseConfiguration } from 'src/core/config/configuration';
import { buildDatabaseConfig } from './database-config';

@Module({})
export class DatabaseModule {
  static forRoot(options: DatabaseConfiguration): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [TypeOrmModule.forRoot(buildDatabaseConfig(options))],
      exports: [TypeOrmModule],
    };
  }
}
