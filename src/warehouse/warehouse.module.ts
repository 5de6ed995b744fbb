import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { LoaderService } from './loader.service';
import { PostgresWarehouse } from './postgres.warehouse';
import { WAREHOUSE } from './warehouse.types';

@Module({
  imports: [StorageModule],
  providers: [LoaderService, { provide: WAREHOUSE, useClass: PostgresWarehouse }],
  exports: [LoaderService],
})
export class WarehouseModule {}
