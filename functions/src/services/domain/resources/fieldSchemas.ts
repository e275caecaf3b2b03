import { z } from 'zod';

/**
 * Id of a document in another collection. Existence is checked separately by
 * the reference validator; this only rejects values that cannot be an id.
 */
export const referenceIdSchema = z
  .string({ invalid_type_error: 'Reference must be a document id string' })
  .refine((value) => value.trim().length > 0, 'Reference must not be empty');

const RFC3339_MESSAGE = 'Start time must be an RFC3339 date-time including a date';

// zod's offset check also takes "+0200"; RFC3339 needs "Z" or "+02:00"
const RFC3339_OFFSET_REGEX = /(Z|[+-]\d{2}:\d{2})$/i;

const offsetDateTimeSchema = z.string().datetime({ offset: true });

/**
 * RFC3339 date-time with a date part and an explicit offset, normalised to
 * UTC ISO-8601 so stored values compare and sort consistently.
 */
export const rfc3339TimestampSchema = z
  .string()
  .refine(
    (value) => offsetDateTimeSchema.safeParse(value).success && RFC3339_OFFSET_REGEX.test(value),
    RFC3339_MESSAGE,
  )
  .transform((value) => new Date(value).toISOString());

export function boundedIntegerSchema(min: number, max: number) {
  return z
    .number({ invalid_type_error: 'Expected an integer' })
    .int('Expected an integer')
    .min(min)
    .max(max);
}
