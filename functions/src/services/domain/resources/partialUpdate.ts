import { ValidationError } from '../../errors';
import type { DocumentData } from '../../repositories/documents/DocumentStore';
import {
  isFieldName,
  isReferenceField,
  type FieldName,
  type ResourceDefinition,
} from './ResourceDefinition';

/**
 * Sparse update keyed by field name. A field that is absent from the map is
 * left untouched; a field that is present is written, even when its value is
 * an empty string or null.
 */
export type SparsePatch<TFields> = ReadonlyMap<FieldName<TFields>, TFields[FieldName<TFields>]>;

/**
 * What to do with `"owner": ""` (or whitespace) in an update.
 * - `reject`: fail the update with ValidationError.
 * - `ignore`: drop the field from the patch so the stored reference stays.
 */
export type BlankReferencePolicy = 'reject' | 'ignore';

export type BuildPatchOptions = {
  blankReferencePolicy?: BlankReferencePolicy;
};

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBlankString(value: unknown): boolean {
  return typeof value === 'string' && value.trim().length === 0;
}

/**
 * Validates every recognised field of `body` and collects them into a patch.
 * Keys the resource does not declare (including `id`) are ignored. Any invalid
 * field rejects the whole body.
 */
export function buildPatch<TFields extends DocumentData>(
  definition: ResourceDefinition<TFields>,
  body: unknown,
  options: BuildPatchOptions = {},
): SparsePatch<TFields> {
  if (!isJsonObject(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }

  const blankReferencePolicy = options.blankReferencePolicy ?? 'reject';
  const patch = new Map<FieldName<TFields>, TFields[FieldName<TFields>]>();
  const issues: string[] = [];

  for (const [key, rawValue] of Object.entries(body)) {
    if (!isFieldName(definition, key)) {
      continue;
    }

    if (
      blankReferencePolicy === 'ignore' &&
      isBlankString(rawValue) &&
      isReferenceField(definition, key)
    ) {
      continue;
    }

    const parsed = definition.fields[key].safeParse(rawValue);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        issues.push(`${key}: ${issue.message}`);
      }
      continue;
    }

    patch.set(key, parsed.data);
  }

  if (issues.length > 0) {
    throw new ValidationError(`Invalid ${definition.label} update: ${issues.join('; ')}`, issues);
  }

  return patch;
}

/**
 * Returns a new document with every patched field overwritten and every other
 * field carried over from `existing`. `existing` is not modified.
 */
export function mergeDocument<TFields extends DocumentData>(
  existing: TFields,
  patch: SparsePatch<TFields>,
): TFields {
  const merged: TFields = { ...existing };
  for (const [field, value] of patch) {
    merged[field] = value;
  }
  return merged;
}
