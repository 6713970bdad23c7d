import { z } from 'zod';

export const rawMessageSchema = z.object({
  id: z.number().int().positive(),
  text: z.unknown(),
  timestamp: z.date(),
});

export type ValidatedRawMessage = z.infer<typeof rawMessageSchema>;

export interface ValidateRawMessagesOptions {
  onInvalid?: (issues: z.ZodIssue[], message: unknown) => void;
}

export function validateRawMessage(message: unknown, options?: ValidateRawMessagesOptions): ValidatedRawMessage | null {
  const result = rawMessageSchema.safeParse(message);
  if (result.success) {
    return result.data;
  }

  options?.onInvalid?.(result.error.issues, message);
  return null;
}

export function validateRawMessages(messages: unknown[], options?: ValidateRawMessagesOptions): ValidatedRawMessage[] {
  const valid: ValidatedRawMessage[] = [];

  for (const message of messages) {
    const validated = validateRawMessage(message, options);
    if (validated) {
      valid.push(validated);
    }
  }

  return valid;
}
