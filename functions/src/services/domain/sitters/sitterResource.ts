import { z } from 'zod';
import type { FieldSchemas, ResourceDefinition } from '../resources/ResourceDefinition';

export const SITTER_GENDERS = ['male', 'female', 'other'] as const;

export type SitterGender = (typeof SITTER_GENDERS)[number];

export type SitterFields = {
  firstname: string;
  lastname: string;
  gender: SitterGender;
  email: string;
  phone: string;
  address: string;
};

const sitterFields: FieldSchemas<SitterFields> = {
  firstname: z.string().min(1, 'First name must not be empty'),
  lastname: z.string().min(1, 'Last name must not be empty'),
  gender: z.enum(SITTER_GENDERS),
  email: z.string().email('Email must be a valid address'),
  phone: z.string().min(7, 'Phone number too short'),
  address: z.string().min(1, 'Address must not be empty'),
};

export const sitterResource: ResourceDefinition<SitterFields> = {
  collection: 'sitters',
  label: 'Sitter',
  fields: sitterFields,
  createSchema: z.object(sitterFields),
  references: [],
};
