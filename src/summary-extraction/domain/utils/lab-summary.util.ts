import { LabStatus, LabSummarySchema, LabTestSchema } from '../../schemas';

/**
 * Keep the extractor's lab summary when it reports tests, otherwise count
 * them from the lab results.
 */
export function ensureLabSummary(
  labResults: LabTestSchema[],
  labSummary?: LabSummarySchema | null,
): LabSummarySchema {
  if (labSummary && labSummary.total_tests > 0) {
    return labSummary;
  }

  const totalTests = labResults.length;
  const criticalCount = labResults.filter(
    (lab) => lab.status === LabStatus.CRITICAL,
  ).length;
  const abnormalCount = labResults.filter(
    (lab) =>
      lab.status === LabStatus.ABNORMAL_HIGH ||
      lab.status === LabStatus.ABNORMAL_LOW,
  ).length;

  const summary = new LabSummarySchema();
  summary.total_tests = totalTests;
  summary.critical_count = criticalCount;
  summary.abnormal_count = abnormalCount;
  summary.normal_count = totalTests - criticalCount - abnormalCount;
  return summary;
}
