import { z } from 'zod';

/** The fields of Twilio's inbound message webhook this service reads. */
export const twilioWebhookSchema = z.object({
  From: z.string().trim().min(1),
  Body: z.string(),
  MessageSid: z.string().optional(),
});
