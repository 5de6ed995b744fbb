import { Module } from '@nestjs/common';
import { IngestionModule } from '../ingestion/ingestion.module';
import { StorageModule } from '../storage/storage.module';
import { TransformModule } from '../transform/transform.module';
import { WarehouseModule } from '../warehouse/warehouse.module';
import { PipelineService } from './pipeline.service';

@Module({
  imports: [StorageModule, IngestionModule, TransformModule, WarehouseModule],
  providers: [PipelineService],
  exports: [PipelineService],
})
export class PipelineModule {}
