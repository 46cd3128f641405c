import { EntityKind } from '../enums/entity-kind.enum';
import { ExtractionStatus } from '../enums/extraction-status.enum';
import { EntityPayload } from './entity-payload.type';

interface EntityOutcomeBase<K extends EntityKind> {
  kind: K;
  durationMs: number;
}

export interface SuccessfulEntityOutcome<K extends EntityKind>
  extends EntityOutcomeBase<K> {
  status: ExtractionStatus.SUCCESS;
  payload: EntityPayload<K>;
}

export interface UnsuccessfulEntityOutcome<K extends EntityKind>
  extends EntityOutcomeBase<K> {
  status: ExtractionStatus.FAILED | ExtractionStatus.TIMED_OUT;
  error: string; // Sanitized, safe to log and return
}

/**
 * Result of one extractor invocation. `payload` exists only on success.
 */
export type EntityOutcome<K extends EntityKind = EntityKind> =
  | SuccessfulEntityOutcome<K>
  | UnsuccessfulEntityOutcome<K>;

/**
 * Exactly one outcome per registered kind
 */
export type EntityOutcomeSet = {
  [K in EntityKind]: EntityOutcome<K>;
};

export function isSuccessfulOutcome<K extends EntityKind>(
  outcome: EntityOutcome<K>,
): outcome is SuccessfulEntityOutcome<K> {
  return outcome.status === ExtractionStatus.SUCCESS;
}
