import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import {
  DiagnosisDataSchema,
  FacilityDataSchema,
  RiskAssessmentSchema,
  TimingDataSchema,
} from '../../../../schemas';

@Entity({ name: 'hospital_summaries' })
export class HospitalSummaryEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  // Upsert conflict target
  @Column({ name: 'hospitalization_id', type: 'varchar', length: 100 })
  @Index({ unique: true })
  hospitalizationId!: string;

  @Column({ name: 'patient_id', type: 'varchar', length: 100 })
  @Index()
  patientId!: string;

  // Sections (PHI - NEVER log)
  @Column({ type: 'jsonb' })
  facility!: FacilityDataSchema;

  @Column({ type: 'jsonb' })
  timing!: TimingDataSchema;

  @Column({ type: 'jsonb' })
  diagnosis!: DiagnosisDataSchema;

  @Column({ name: 'medication_risk_assessment', type: 'jsonb' })
  medicationRiskAssessment!: RiskAssessmentSchema;

  @Column({ name: 'length_of_stay_days', type: 'int' })
  lengthOfStayDays!: number;

  @CreateDateColumn({ name: 'created_at' })
  @Index()
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
