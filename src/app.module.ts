import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import databaseConfig from './config/database.config';
import pipelineConfig from './config/pipeline.config';
import { DatabaseModule } from './database/database.module';
import { PipelineModule } from './pipeline/pipeline.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [databaseConfig, pipelineConfig],
    }),
    DatabaseModule,
    PipelineModule,
  ],
})
export class AppModule {}
