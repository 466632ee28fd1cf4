import { z } from 'zod';

// An unusable url is still a target: the prober reports it as down.
export const checkTargetInputSchema = z.object({
  websiteId: z.string().uuid(),
  url: z.string(),
});

// Batch size is enforced by the orchestrator so it can answer with its own message.
export const checkBatchInputSchema = z.object({
  region: z.string().optional(),
  urls: z.array(checkTargetInputSchema),
});

export type CheckBatchInput = z.infer<typeof checkBatchInputSchema>;
