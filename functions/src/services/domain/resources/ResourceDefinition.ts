import type { z } from 'zod';
import type { CollectionName, DocumentData } from '../../repositories/documents/DocumentStore';

export type FieldName<TFields> = keyof TFields & string;

export type FieldSchemas<TFields> = {
  [K in FieldName<TFields>]-?: z.ZodType<TFields[K], z.ZodTypeDef, unknown>;
};

export type ReferenceDeclaration<TFields> = {
  field: FieldName<TFields>;
  collection: CollectionName;
};

/**
 * Everything the generic handlers need to know about one collection.
 *
 * `fields` validates a single field of a sparse update; `createSchema`
 * validates a full payload (and fills defaults) on create and re-validates
 * documents read back from the store.
 */
export type ResourceDefinition<TFields extends DocumentData> = {
  collection: CollectionName;
  label: string;
  fields: FieldSchemas<TFields>;
  createSchema: z.ZodType<TFields, z.ZodTypeDef, unknown>;
  references: ReadonlyArray<ReferenceDeclaration<TFields>>;
  /** Fields a create body cannot set; `createSchema` supplies their initial value. */
  ignoredOnCreate?: ReadonlyArray<FieldName<TFields>>;
};

export type ResourceRecord<TFields extends DocumentData> = TFields & { id: string };

export function isFieldName<TFields extends DocumentData>(
  definition: ResourceDefinition<TFields>,
  key: string,
): key is FieldName<TFields> {
  return Object.prototype.hasOwnProperty.call(definition.fields, key);
}

export function isReferenceField<TFields extends DocumentData>(
  definition: ResourceDefinition<TFields>,
  field: FieldName<TFields>,
): boolean {
  return definition.references.some((reference) => reference.field === field);
}
