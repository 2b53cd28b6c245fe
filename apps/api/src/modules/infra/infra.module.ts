// src/modules/infra/infra.module.ts
import { Module } from '@nestjs/common';
import { DatabaseModule } from '@/modules/infra/database/database.module';

@Module({
  imports: [DatabaseModule],
  exports: [DatabaseModule],
})
export class InfraModule {}
