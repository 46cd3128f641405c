import { EntityKind } from '../enums/entity-kind.enum';
import {
  AggregateFailureType,
  PersistenceStatus,
} from '../enums/persistence-status.enum';
import { AssemblyFailureError } from '../errors/extraction.errors';

export interface AggregateFailure {
  type: AggregateFailureType;
  message: string;
  entityKinds: EntityKind[]; // Kinds responsible, empty for store failures
}

/**
 * Per-aggregate write result. `attempts` is 0 when no write was issued.
 */
export type PersistenceOutcome =
  | { status: PersistenceStatus.PERSISTED; recordId: string; attempts: number }
  | {
      status: PersistenceStatus.FAILED;
      failure: AggregateFailure;
      attempts: number;
    };

export type AssembledAggregate<T> =
  | { assembled: true; aggregate: T }
  | { assembled: false; failure: AssemblyFailureError };
