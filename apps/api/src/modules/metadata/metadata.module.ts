import { Module } from '@nestjs/common';
import { FieldRegistry } from './field-registry.service';

@Module({
  providers: [FieldRegistry],
  exports: [FieldRegistry],
})
export class MetadataModule {}
