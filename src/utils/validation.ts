import { DateTime } from 'luxon';
import { z } from 'zod';
import { ValidationError } from './errors';
import { Slot } from '../types/slot';
import { ClinicConfig } from '../types/config';

export const DATE_FORMAT = 'yyyy-MM-dd';
export const TIME_FORMAT = 'HH:mm';

export const dateSchema = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a date in YYYY-MM-DD format')
  .refine((value) => DateTime.fromFormat(value, DATE_FORMAT).isValid, 'is not a real calendar date');

export const timeSchema = z
  .string()
  .trim()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'must be a 24-hour time in HH:MM format');

export const emailSchema = z.string().trim().toLowerCase().email('must be a valid email address');

export const statusSchema = z.enum(['available', 'booked']);

const requiredText = z.string().trim().min(1, 'is required');

export const setupInputSchema = z.object({
  student: requiredText,
  clinic: requiredText,
});

export const viewFilterSchema = z.object({
  date: dateSchema.optional(),
  status: statusSchema.optional(),
});

export const volunteerInputSchema = z.object({
  date: dateSchema,
  time: timeSchema,
  name: requiredText,
  email: emailSchema,
});

export const bookInputSchema = z.object({
  date: dateSchema,
  time: timeSchema,
  subject: requiredText,
  description: requiredText,
  email: emailSchema,
});

export const cancelInputSchema = z.object({
  date: dateSchema,
  time: timeSchema,
  email: emailSchema,
});

export type SetupInput = z.input<typeof setupInputSchema>;
export type ViewInput = z.input<typeof viewFilterSchema>;
export type VolunteerInput = z.input<typeof volunteerInputSchema>;
export type BookInput = z.input<typeof bookInputSchema>;
export type CancelInput = z.input<typeof cancelInputSchema>;

// Persisted documents are checked structurally only; inputs were normalized on the way in.
const slotBaseShape = {
  date: z.string(),
  time: z.string(),
  volunteer_name: z.string(),
  volunteer_email: z.string(),
  event_id: z.string().nullable(),
};

export const slotRecordSchema: z.ZodType<Slot> = z.discriminatedUnion('status', [
  z.object({ ...slotBaseShape, status: z.literal('available') }),
  z.object({
    ...slotBaseShape,
    status: z.literal('booked'),
    student_email: z.string(),
    subject: z.string(),
    description: z.string(),
    booked_at: z.string(),
  }),
]);

export const slotCollectionSchema = z.array(slotRecordSchema);

export const clinicConfigSchema: z.ZodType<ClinicConfig> = z.object({
  student_calendar: z.string().nullable(),
  clinic_calendar: z.string().nullable(),
});

/**
 * Parses `input` against `schema`, raising a ValidationError that names
 * the first offending field.
 */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const field = issue.path.join('.');
  throw new ValidationError(field ? `Invalid ${field}: ${issue.message}` : issue.message, field || undefined);
}
