import { EntityKind } from '../enums/entity-kind.enum';
import { ExtractorFailureError } from '../errors/extraction.errors';
import { ENTITY_DEFINITIONS } from '../registry/extraction.registry';
import {
  DiagnosisPayloadSchema,
  FacilityType,
  PresentationPayloadSchema,
} from '../../schemas';
import { validateEntityPayload } from './payload-validation.util';

describe('validateEntityPayload', () => {
  it('should return a schema instance with defaults applied', () => {
    const payload = validateEntityPayload(
      ENTITY_DEFINITIONS[EntityKind.PRESENTATION],
      { patient_presentation: { symptoms: ['fever'] } },
    );

    expect(payload).toBeInstanceOf(PresentationPayloadSchema);
    expect(payload.patient_presentation.symptoms).toEqual(['fever']);
    expect(payload.patient_presentation.severity_indicators).toEqual([]);
  });

  it('should default the facility type to acute care', () => {
    const payload = validateEntityPayload(
      ENTITY_DEFINITIONS[EntityKind.FACILITY_TIMING],
      {
        facility: { facility_name: 'Lakeside Medical Center' },
        timing: { admission_date: '2025-01-01', discharge_date: '2025-01-02' },
      },
    );

    expect(payload.facility.facility_type).toBe(FacilityType.ACUTE_CARE);
  });

  it.each([['plain text'], [null], [[{ diagnosis: {} }]], [42]])(
    'should reject a non-object result (%p)',
    (raw) => {
      expect(() =>
        validateEntityPayload(ENTITY_DEFINITIONS[EntityKind.DIAGNOSIS], raw),
      ).toThrow(
        new ExtractorFailureError(
          EntityKind.DIAGNOSIS,
          "Extractor 'diagnosis' returned a non-object payload",
        ),
      );
    },
  );

  it('should name invalid nested paths without their values', () => {
    expect(() =>
      validateEntityPayload(ENTITY_DEFINITIONS[EntityKind.LABS], {
        lab_results: [
          { id: 'lab-1', test_name: 'sodium', value: 138, status: 'normal' },
          {
            id: 'lab-2',
            test_name: 'potassium',
            value: 9.9,
            status: 'sky-high',
          },
        ],
      }),
    ).toThrow("Invalid 'labs' payload: lab_results.1.status");
  });

  it('should reject a missing section', () => {
    expect(() =>
      validateEntityPayload(ENTITY_DEFINITIONS[EntityKind.DIAGNOSIS], {}),
    ).toThrow("Invalid 'diagnosis' payload: diagnosis");
  });

  it('should reject an empty primary diagnosis', () => {
    const attempt = () =>
      validateEntityPayload(ENTITY_DEFINITIONS[EntityKind.DIAGNOSIS], {
        diagnosis: {
          primary_diagnosis: '',
          primary_diagnosis_evidence: 'assessment section',
          diagnosis_category: 'respiratory',
        },
      });

    expect(attempt).toThrow(ExtractorFailureError);
    expect(attempt).toThrow(
      "Invalid 'diagnosis' payload: diagnosis.primary_diagnosis",
    );
  });

  it('should default secondary diagnoses to an empty list', () => {
    const payload = validateEntityPayload(
      ENTITY_DEFINITIONS[EntityKind.DIAGNOSIS],
      {
        diagnosis: {
          primary_diagnosis: 'community-acquired pneumonia',
          primary_diagnosis_evidence: 'assessment section',
          diagnosis_category: 'respiratory',
        },
      },
    );

    expect(payload).toBeInstanceOf(DiagnosisPayloadSchema);
    expect(payload.diagnosis.secondary_diagnoses).toEqual([]);
  });

  it('should keep diagnostic notes as a name to text map', () => {
    const payload = validateEntityPayload(
      ENTITY_DEFINITIONS[EntityKind.FINDINGS],
      {
        clinical_findings: {
          lab_results: [],
          diagnostic_notes: { ekg: 'sinus tachycardia' },
        },
      },
    );

    expect(payload.clinical_findings.diagnostic_notes).toEqual({
      ekg: 'sinus tachycardia',
    });
  });

  it('should reject diagnostic notes with non-text values', () => {
    expect(() =>
      validateEntityPayload(ENTITY_DEFINITIONS[EntityKind.FINDINGS], {
        clinical_findings: {
          lab_results: [],
          diagnostic_notes: { ekg: { rhythm: 'sinus' } },
        },
      }),
    ).toThrow("Invalid 'findings' payload: clinical_findings.diagnostic_notes");
  });
});
