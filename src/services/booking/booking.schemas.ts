import { z } from 'zod';

const instant = z.union([z.date(), z.string().trim().min(1)], {
  errorMap: () => ({ message: 'must be an ISO datetime' }),
});

const purpose = z.string().trim().min(1, 'purpose is required').max(500);
const materials = z.array(z.string().trim().min(1).max(100)).max(50);
const notes = z.string().max(2000);

export const CreateBookingSchema = z.object({
  ownerId: z.string().trim().min(1, 'ownerId is required'),
  spaceId: z.string().trim().min(1, 'spaceId is required'),
  startAt: instant,
  endAt: instant,
  purpose,
  materialsRequested: materials.default([]),
  notes: notes.default(''),
});

export const UpdateBookingSchema = z
  .object({
    startAt: instant.optional(),
    endAt: instant.optional(),
    purpose: purpose.optional(),
    materialsRequested: materials.optional(),
    notes: notes.optional(),
  })
  .strict()
  .refine((patch) => Object.values(patch).some((v) => v !== undefined), {
    message: 'at least one field must be provided',
  });

export function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
}
