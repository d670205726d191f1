import { Module } from '@nestjs/common';
import { SchemaManagerService } from './schema-manager.service';

@Module({
  providers: [SchemaManagerService],
  exports: [SchemaManagerService],
})
export class SchemaModule {}
