import { z } from 'zod';
import { boundedIntegerSchema, referenceIdSchema } from '../resources/fieldSchemas';
import type { FieldSchemas, ResourceDefinition } from '../resources/ResourceDefinition';

export const DOG_MAX_AGE = 255;

export type DogFields = {
  owner: string;
  name: string;
  age: number | null;
  breed: string | null;
};

const dogFields: FieldSchemas<DogFields> = {
  owner: referenceIdSchema,
  name: z.string().min(1, 'Name must not be empty'),
  age: boundedIntegerSchema(0, DOG_MAX_AGE).nullable(),
  breed: z.string().nullable(),
};

export const dogResource: ResourceDefinition<DogFields> = {
  collection: 'dogs',
  label: 'Dog',
  fields: dogFields,
  createSchema: z.object({
    ...dogFields,
    age: dogFields.age.default(null),
    breed: dogFields.breed.default(null),
  }),
  references: [{ field: 'owner', collection: 'owners' }],
};
