import { z } from 'zod';
import {
  boundedIntegerSchema,
  referenceIdSchema,
  rfc3339TimestampSchema,
} from '../resources/fieldSchemas';
import type { FieldSchemas, ResourceDefinition } from '../resources/ResourceDefinition';

export const BOOKING_MAX_DURATION_MINUTES = 255;

export type BookingFields = {
  owner: string;
  start_time: string;
  duration_minutes: number;
  cancelled: boolean;
};

const bookingFields: FieldSchemas<BookingFields> = {
  owner: referenceIdSchema,
  start_time: rfc3339TimestampSchema,
  duration_minutes: boundedIntegerSchema(1, BOOKING_MAX_DURATION_MINUTES),
  cancelled: z.boolean(),
};

export const bookingResource: ResourceDefinition<BookingFields> = {
  collection: 'bookings',
  label: 'Booking',
  fields: bookingFields,
  createSchema: z.object({
    ...bookingFields,
    cancelled: bookingFields.cancelled.default(false),
  }),
  references: [{ field: 'owner', collection: 'owners' }],
  // New bookings are always active; cancelling is an update
  ignoredOnCreate: ['cancelled'],
};
