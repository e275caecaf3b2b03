import { z } from 'zod';
import type { FieldSchemas, ResourceDefinition } from '../resources/ResourceDefinition';

export type OwnerFields = {
  name: string;
  email: string;
  phone: string;
  address: string;
};

const ownerFields: FieldSchemas<OwnerFields> = {
  name: z.string().min(1, 'Name must not be empty'),
  email: z.string().email('Email must be a valid address'),
  phone: z.string().min(7, 'Phone number too short'),
  address: z.string().min(5, 'Address must be at least 5 characters'),
};

export const ownerResource: ResourceDefinition<OwnerFields> = {
  collection: 'owners',
  label: 'Owner',
  fields: ownerFields,
  createSchema: z.object(ownerFields),
  references: [],
};
