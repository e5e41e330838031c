import { DynamicModule, Module } from '@nestjs/common';
import { AppConfiguration } from './core/config/configuration';
import { AppConfigModule } from './core/config/config.module';
import { DatabaseModule } from './core/database/database.module';
import { RecordsModule } from './modules/records/records.module';

@Module({})
export class AppModule {
  static forRoot(config: AppConfiguration): DynamicModule {
    return {
      module: AppModule,
      imports: [
        AppConfigModule,
        ...(config.database ? [DatabaseModule.forRoot(config.database)] : []),
        RecordsModule.forRoot(config.records),
      ],
    };
  }
}
