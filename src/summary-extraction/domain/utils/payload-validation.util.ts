import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { EntityPayload } from '../entities/entity-payload.type';
import { EntityKind } from '../enums/entity-kind.enum';
import { ExtractorFailureError } from '../errors/extraction.errors';
import { EntityDefinition } from '../registry/extraction.registry';

/**
 * Dotted paths of every invalid property. Values are left out, they are PHI.
 */
export function collectInvalidPaths(
  errors: ValidationError[],
  parentPath = '',
): string[] {
  return errors.flatMap((error) => {
    const path = parentPath
      ? `${parentPath}.${error.property}`
      : error.property;
    if (error.children && error.children.length > 0) {
      return collectInvalidPaths(error.children, path);
    }
    return [path];
  });
}

/**
 * Transform a raw extractor result into its kind's schema and validate it.
 * Throws ExtractorFailureError when the shape does not match.
 */
export function validateEntityPayload<K extends EntityKind>(
  definition: EntityDefinition<K>,
  raw: unknown,
): EntityPayload<K> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ExtractorFailureError(
      definition.kind,
      `Extractor '${definition.kind}' returned a non-object payload`,
    );
  }

  const payload = plainToInstance(definition.schema, raw);
  const errors = validateSync(payload);
  if (errors.length > 0) {
    const paths = collectInvalidPaths(errors);
    throw new ExtractorFailureError(
      definition.kind,
      `Invalid '${definition.kind}' payload: ${paths.join(', ')}`,
    );
  }

  return payload;
}
