import { LabStatus, LabSummarySchema, LabTestSchema } from '../../schemas';
import { ensureLabSummary } from './lab-summary.util';

const lab = (id: string, status: LabStatus): LabTestSchema => ({
  id,
  test_name: `test ${id}`,
  value: 1,
  status,
});

describe('ensureLabSummary', () => {
  const results = [
    lab('1', LabStatus.CRITICAL),
    lab('2', LabStatus.ABNORMAL_HIGH),
    lab('3', LabStatus.ABNORMAL_LOW),
    lab('4', LabStatus.NORMAL),
    lab('5', LabStatus.NORMAL),
  ];

  it('should count results when no summary was extracted', () => {
    expect(ensureLabSummary(results)).toEqual({
      total_tests: 5,
      critical_count: 1,
      abnormal_count: 2,
      normal_count: 2,
    });
  });

  it('should recount when the extracted summary reports zero tests', () => {
    const empty = new LabSummarySchema();

    expect(ensureLabSummary(results, empty).total_tests).toBe(5);
  });

  it('should keep an extracted summary that reports tests', () => {
    const extracted: LabSummarySchema = {
      total_tests: 7,
      critical_count: 0,
      abnormal_count: 3,
      normal_count: 4,
    };

    expect(ensureLabSummary(results, extracted)).toBe(extracted);
  });

  it('should return an all-zero summary for no results', () => {
    expect(ensureLabSummary([], null)).toEqual({
      total_tests: 0,
      critical_count: 0,
      abnormal_count: 0,
      normal_count: 0,
    });
  });
});
