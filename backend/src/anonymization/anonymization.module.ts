import { Module } from '@nestjs/common';
import { ANONYMIZATION_STORE } from './anonymization.store';
import { AnonymizationService } from './anonymization.service';
import { TypeOrmAnonymizationStore } from './typeorm-anonymization.store';

@Module({
  providers: [AnonymizationService, { provide: ANONYMIZATION_STORE, useClass: TypeOrmAnonymizationStore }],
  exports: [AnonymizationService],
})
export class AnonymizationModule {}
