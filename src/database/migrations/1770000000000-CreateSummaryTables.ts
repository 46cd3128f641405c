import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm';

const jsonbColumn = (name: string, isNullable: boolean) => ({
  name,
  type: 'jsonb',
  isNullable,
});

const timestampColumns = [
  {
    name: 'created_at',
    type: 'timestamp',
    default: 'now()',
    isNullable: false,
  },
  {
    name: 'updated_at',
    type: 'timestamp',
    default: 'now()',
    isNullable: false,
  },
];

const keyColumns = [
  {
    name: 'id',
    type: 'uuid',
    isPrimary: true,
    default: 'uuid_generate_v4()',
  },
  {
    name: 'hospitalization_id',
    type: 'varchar',
    length: '100',
    isNullable: false,
  },
  {
    name: 'patient_id',
    type: 'varchar',
    length: '100',
    isNullable: false,
  },
];

export class CreateSummaryTables1770000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('CREATE EXTENSION IF NOT EXISTS "uuid-ossp"');

    await queryRunner.createTable(
      new Table({
        name: 'hospital_summaries',
        columns: [
          ...keyColumns,
          jsonbColumn('facility', false),
          jsonbColumn('timing', false),
          jsonbColumn('diagnosis', false),
          jsonbColumn('medication_risk_assessment', false),
          {
            name: 'length_of_stay_days',
            type: 'integer',
            isNullable: false,
          },
          ...timestampColumns,
        ],
        checks: [
          {
            name: 'chk_hospital_summaries_length_of_stay',
            expression: 'length_of_stay_days >= 0',
          },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'clinical_summaries',
        columns: [
          ...keyColumns,
          jsonbColumn('patient_presentation', true),
          jsonbColumn('relevant_history', true),
          jsonbColumn('clinical_findings', true),
          jsonbColumn('clinical_assessment', true),
          jsonbColumn('hospital_course', true),
          jsonbColumn('follow_up_plan', true),
          jsonbColumn('treatments_procedures', true),
          jsonbColumn('lab_results', true),
          jsonbColumn('lab_summary', true),
          {
            name: 'parsing_model_version',
            type: 'varchar',
            length: '100',
            isNullable: true,
          },
          {
            name: 'parsed_at',
            type: 'timestamptz',
            isNullable: false,
          },
          ...timestampColumns,
        ],
      }),
      true,
    );

    for (const table of ['hospital_summaries', 'clinical_summaries']) {
      // One row per hospitalization: the upsert conflict target
      await queryRunner.createIndex(
        table,
        new TableIndex({
          name: `IDX_${table}_hospitalization_id`,
          columnNames: ['hospitalization_id'],
          isUnique: true,
        }),
      );
      await queryRunner.createIndex(
        table,
        new TableIndex({
          name: `IDX_${table}_patient_id`,
          columnNames: ['patient_id'],
        }),
      );
      await queryRunner.createIndex(
        table,
        new TableIndex({
          name: `IDX_${table}_created_at`,
          columnNames: ['created_at'],
        }),
      );
    }
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('clinical_summaries', true);
    await queryRunner.dropTable('hospital_summaries', true);
  }
}
