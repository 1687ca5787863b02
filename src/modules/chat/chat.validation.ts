import { z } from 'zod';

export const MAX_MESSAGE_LENGTH = 4000;

export const chatRequestSchema = z.object({
  message: z.string().trim().min(1, 'Message is required').max(MAX_MESSAGE_LENGTH),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;
