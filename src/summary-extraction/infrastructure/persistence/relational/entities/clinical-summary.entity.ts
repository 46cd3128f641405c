import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import {
  AssessmentDataSchema,
  CourseDataSchema,
  FindingsDataSchema,
  FollowUpDataSchema,
  HistoryDataSchema,
  LabSummarySchema,
  LabTestSchema,
  PresentationDataSchema,
  TreatmentSchema,
} from '../../../../schemas';

@Entity({ name: 'clinical_summaries' })
export class ClinicalSummaryEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  // Upsert conflict target
  @Column({ name: 'hospitalization_id', type: 'varchar', length: 100 })
  @Index({ unique: true })
  hospitalizationId!: string;

  @Column({ name: 'patient_id', type: 'varchar', length: 100 })
  @Index()
  patientId!: string;

  // Sections (PHI - NEVER log), each null when its extractor failed
  @Column({ name: 'patient_presentation', type: 'jsonb', nullable: true })
  patientPresentation!: PresentationDataSchema | null;

  @Column({ name: 'relevant_history', type: 'jsonb', nullable: true })
  relevantHistory!: HistoryDataSchema | null;

  @Column({ name: 'clinical_findings', type: 'jsonb', nullable: true })
  clinicalFindings!: FindingsDataSchema | null;

  @Column({ name: 'clinical_assessment', type: 'jsonb', nullable: true })
  clinicalAssessment!: AssessmentDataSchema | null;

  @Column({ name: 'hospital_course', type: 'jsonb', nullable: true })
  hospitalCourse!: CourseDataSchema | null;

  @Column({ name: 'follow_up_plan', type: 'jsonb', nullable: true })
  followUpPlan!: FollowUpDataSchema | null;

  @Column({ name: 'treatments_procedures', type: 'jsonb', nullable: true })
  treatmentsProcedures!: TreatmentSchema[] | null;

  @Column({ name: 'lab_results', type: 'jsonb', nullable: true })
  labResults!: LabTestSchema[] | null;

  @Column({ name: 'lab_summary', type: 'jsonb', nullable: true })
  labSummary!: LabSummarySchema | null;

  @Column({
    name: 'parsing_model_version',
    type: 'varchar',
    length: 100,
    nullable: true,
  })
  parsingModelVersion!: string | null;

  @Column({ name: 'parsed_at', type: 'timestamptz' })
  parsedAt!: Date;

  @CreateDateColumn({ name: 'created_at' })
  @Index()
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
