import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { TransformService } from './transform.service';
import { ValidationService } from './validation.service';

@Module({
  imports: [StorageModule],
  providers: [TransformService, ValidationService],
  exports: [TransformService],
})
export class TransformModule {}
