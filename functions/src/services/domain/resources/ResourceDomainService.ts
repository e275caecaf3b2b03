import * as functions from 'firebase-functions';
import { NotFoundError, StoreError, ValidationError } from '../../errors';
import type { DocumentData, DocumentStore, StoredDocument } from '../../repositories/documents/DocumentStore';
import { buildPatch, isJsonObject, mergeDocument, type BlankReferencePolicy } from './partialUpdate';
import { validateReferences } from './referenceValidator';
import type { ResourceDefinition, ResourceRecord } from './ResourceDefinition';

export type DeletionAck = {
  id: string;
  deleted: true;
};

export type ResourceDomainServiceOptions = {
  blankReferencePolicy?: BlankReferencePolicy;
};

function omitFields(
  body: Record<string, unknown>,
  fields: ReadonlyArray<string>,
): Record<string, unknown> {
  const payload = { ...body };
  for (const field of fields) {
    delete payload[field];
  }
  return payload;
}

function withId<TFields extends DocumentData>(id: string, fields: TFields): ResourceRecord<TFields> {
  return { ...fields, id };
}

/**
 * CRUD orchestration shared by every collection. Validation and reference
 * checks always run before the store is written, so a rejected request
 * leaves the collection unchanged.
 */
export class ResourceDomainService<TFields extends DocumentData> {
  constructor(
    private readonly definition: ResourceDefinition<TFields>,
    private readonly store: DocumentStore,
    private readonly options: ResourceDomainServiceOptions = {},
  ) {}

  get label(): string {
    return this.definition.label;
  }

  private notFound(): NotFoundError {
    return new NotFoundError(`${this.definition.label} not found`);
  }

  private parseStored(doc: StoredDocument): TFields {
    const parsed = this.definition.createSchema.safeParse(doc.data);
    if (!parsed.success) {
      functions.logger.error(
        `[${this.definition.collection}] Stored document ${doc.id} failed validation`,
        { issues: parsed.error.issues },
      );
      throw new StoreError(`Stored ${this.definition.label} is malformed`);
    }
    return parsed.data;
  }

  private async loadFields(id: string): Promise<TFields> {
    const doc = await this.store.get(this.definition.collection, id);
    if (!doc) {
      throw this.notFound();
    }
    return this.parseStored(doc);
  }

  async list(): Promise<Array<ResourceRecord<TFields>>> {
    const docs = await this.store.list(this.definition.collection);
    return docs.map((doc) => withId(doc.id, this.parseStored(doc)));
  }

  async getById(id: string): Promise<ResourceRecord<TFields>> {
    return withId(id, await this.loadFields(id));
  }

  async create(body: unknown): Promise<ResourceRecord<TFields>> {
    if (!isJsonObject(body)) {
      throw new ValidationError('Request body must be a JSON object');
    }

    const payload = omitFields(body, this.definition.ignoredOnCreate ?? []);
    const parsed = this.definition.createSchema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`,
      );
      throw new ValidationError(`Invalid ${this.definition.label}: ${issues.join('; ')}`, issues);
    }

    await validateReferences(this.store, parsed.data, this.definition.references);

    const id = await this.store.insert(this.definition.collection, parsed.data);
    return withId(id, parsed.data);
  }

  /**
   * Applies a sparse update. A body with no recognised fields returns the
   * stored document without writing.
   */
  async update(id: string, body: unknown): Promise<ResourceRecord<TFields>> {
    const existing = await this.loadFields(id);
    const patch = buildPatch(this.definition, body, {
      blankReferencePolicy: this.options.blankReferencePolicy,
    });

    if (patch.size === 0) {
      return withId(id, existing);
    }

    const merged = mergeDocument(existing, patch);
    await validateReferences(this.store, merged, this.definition.references, {
      onlyFields: new Set(patch.keys()),
    });

    const replaced = await this.store.replace(this.definition.collection, id, merged);
    if (!replaced) {
      throw this.notFound();
    }

    return withId(id, merged);
  }

  async deleteById(id: string): Promise<DeletionAck> {
    const existing = await this.store.get(this.definition.collection, id);
    if (!existing) {
      throw this.notFound();
    }

    const removed = await this.store.remove(this.definition.collection, id);
    if (!removed) {
      throw this.notFound();
    }

    return { id, deleted: true };
  }
}
