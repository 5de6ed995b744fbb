import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { IngestionService } from './ingestion.service';

@Module({
  imports: [StorageModule],
  providers: [IngestionService],
  exports: [IngestionService],
})
export class IngestionModule {}
