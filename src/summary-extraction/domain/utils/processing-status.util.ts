import { PersistenceOutcome } from '../entities/persistence-outcome.entity';
import { PersistenceStatus } from '../enums/persistence-status.enum';
import { ProcessingStatus } from '../enums/processing-status.enum';

export function resolveProcessingStatus(
  clinical: PersistenceOutcome,
  hospital: PersistenceOutcome,
): ProcessingStatus {
  const persisted = [clinical, hospital].filter(
    (outcome) => outcome.status === PersistenceStatus.PERSISTED,
  ).length;

  if (persisted === 2) {
    return ProcessingStatus.COMPLETED;
  }
  return persisted === 1 ? ProcessingStatus.PARTIAL : ProcessingStatus.FAILED;
}

function describe(label: string, outcome: PersistenceOutcome): string {
  if (outcome.status === PersistenceStatus.PERSISTED) {
    return `${label} saved`;
  }
  return `${label} failed: ${outcome.failure.message}`;
}

/**
 * e.g. "clinical summary saved, hospital summary failed: missing diagnosis"
 */
export function describeProcessingResult(
  clinical: PersistenceOutcome,
  hospital: PersistenceOutcome,
): string {
  const clinicalPart = describe('clinical summary', clinical);
  const hospitalPart = describe('hospital summary', hospital);
  return `${clinicalPart}, ${hospitalPart}`;
}
