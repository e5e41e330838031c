import { DynamicModule, Module } from '@nestjs/common';
import { TypeOrmModule, getRepositoryToken } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { RecordsConfiguration } from 'src/core/config/configuration';
import { RecordEntity } from './entities/record.entity';
import { InMemoryRecordPersistence } from './persistence/in-memory-record.persistence';
import { RECORD_PERSISTENCE } from './persistence/record-persistence';
import { TypeOrmRecordPersistence } from './persistence/typeorm-record.persistence';
import { RecordStoreService } from './record-store.service';
import { RecordsController } from './records.controller';

@Module({})
export class RecordsModule {
  static forRoot(options: RecordsConfiguration): DynamicModule {
    if (options.backend === 'postgres') {
      return {
        module: RecordsModule,
        imports: [TypeOrmModule.forFeature([RecordEntity])],
        controllers: [RecordsController],
        providers: [
          RecordStoreService,
          {
            provide: RECORD_PERSISTENCE,
            useFactory: (repository: Repository<RecordEntity>) =>
              new TypeOrmRecordPersistence(repository, options.scanBatchSize),
            inject: [getRepositoryToken(RecordEntity)],
          },
        ],
        exports: [RecordStoreService],
      };
    }

    return {
      module: RecordsModule,
      controllers: [RecordsController],
      providers: [
        RecordStoreService,
        { provide: RECORD_PERSISTENCE, useClass: InMemoryRecordPersistence },
      ],
      exports: [RecordStoreService],
    };
  }
}
