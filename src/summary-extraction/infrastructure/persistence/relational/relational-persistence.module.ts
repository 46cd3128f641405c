import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ClinicalSummaryEntity } from './entities/clinical-summary.entity';
import { HospitalSummaryEntity } from './entities/hospital-summary.entity';
import { ClinicalSummaryRepositoryAdapter } from './repositories/clinical-summary.repository';
import { HospitalSummaryRepositoryAdapter } from './repositories/hospital-summary.repository';

@Module({
  imports: [
    TypeOrmModule.forFeature([HospitalSummaryEntity, ClinicalSummaryEntity]),
  ],
  providers: [
    {
      provide: 'HospitalSummaryRepositoryPort',
      useClass: HospitalSummaryRepositoryAdapter,
    },
    {
      provide: 'ClinicalSummaryRepositoryPort',
      useClass: ClinicalSummaryRepositoryAdapter,
    },
  ],
  exports: ['HospitalSummaryRepositoryPort', 'ClinicalSummaryRepositoryPort'],
})
export class RelationalSummaryPersistenceModule {}
