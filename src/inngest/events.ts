import { z } from 'zod';

// Event schemas for type safety
export const DigestRequestedSchema = z.object({
  trigger: z.enum(['schedule', 'manual', 'api']).default('manual'),
  /** Print the payload instead of posting it, and leave history alone */
  dryRun: z.boolean().optional(),
});

// Event name constants
export const EVENTS = {
  DIGEST_REQUESTED: 'digest/run.requested',
} as const;

export type DigestRequestedEvent = z.infer<typeof DigestRequestedSchema>;
