import { DanglingReferenceError } from '../../errors';
import type { DocumentData, DocumentStore } from '../../repositories/documents/DocumentStore';
import type { FieldName, ReferenceDeclaration } from './ResourceDefinition';

export type ValidateReferencesOptions<TFields> = {
  /** Restrict the check to these fields (an update only checks what it changes). */
  onlyFields?: ReadonlySet<FieldName<TFields>>;
};

/**
 * Resolves each declared foreign key of `candidate` against its target
 * collection, in declaration order. Throws on the first reference that does
 * not resolve; nothing is written by this function.
 */
export async function validateReferences<TFields extends DocumentData>(
  store: DocumentStore,
  candidate: TFields,
  references: ReadonlyArray<ReferenceDeclaration<TFields>>,
  options: ValidateReferencesOptions<TFields> = {},
): Promise<void> {
  for (const reference of references) {
    if (options.onlyFields && !options.onlyFields.has(reference.field)) {
      continue;
    }

    const attemptedId = candidate[reference.field];
    if (typeof attemptedId !== 'string') {
      throw new DanglingReferenceError(reference.field, attemptedId);
    }

    const target = await store.get(reference.collection, attemptedId);
    if (!target) {
      throw new DanglingReferenceError(reference.field, attemptedId);
    }
  }
}
