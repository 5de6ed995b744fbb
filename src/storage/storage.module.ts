import { Module } from '@nestjs/common';
import { PartitionStore } from './partition-store.service';

@Module({
  providers: [PartitionStore],
  exports: [PartitionStore],
})
export class StorageModule {}
