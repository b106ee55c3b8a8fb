import { z } from 'zod';

const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .transform((v) => (v === '' ? null : v))
    .nullish()
    .transform((v) => v ?? null);

// ── Location ─────────────────────────────────────────────────────
export const createLocationSchema = z.object({
  name: z.string().trim().min(1).max(200),
  description: z.string().trim().max(2000).default(''),
  capacity: z.number().int().min(0).default(0),
  createdBy: optionalText(128),
});
export type CreateLocationInput = z.input<typeof createLocationSchema>;

// ── Ticket ───────────────────────────────────────────────────────
export const issueTicketSchema = z.object({
  visitorName: optionalText(200),
  phone: z
    .string()
    .trim()
    .regex(/^\+?[0-9 ()-]{3,32}$/, 'Invalid phone number')
    .nullish()
    .transform((v) => v ?? null),
  notes: optionalText(1000),
});
export type IssueTicketInput = z.input<typeof issueTicketSchema>;
