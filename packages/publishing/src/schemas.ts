import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { PublishValidationError } from './errors.js';
import type { NewPostRequest } from './types.js';

export const NewPostMessageSchema = z.object({
  content: z.string(),
  link: z.string().optional(),
  images: z.array(z.string()).optional(),
});

const TargetsSchema = z.array(z.string()).nullish();

const ThreadRequestSchema = z.object({
  targets: TargetsSchema,
  language: z.string().optional(),
  messages: z.array(NewPostMessageSchema),
});

/** `{ content, link?, images? }` stands for a one-message thread. */
const SingleMessageRequestSchema = NewPostMessageSchema.extend({
  targets: TargetsSchema,
  language: z.string().optional(),
}).transform(
  ({ targets, language, ...message }): NewPostRequest => ({ targets, language, messages: [message] })
);

export const NewPostRequestSchema = z.union([ThreadRequestSchema, SingleMessageRequestSchema]);

/**
 * Validate an untrusted request body. Only the shape is checked here; content
 * rules are applied by the publish service.
 */
export function parseNewPostRequest(input: unknown): Result<NewPostRequest, PublishValidationError> {
  const result = NewPostRequestSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
    return err(new PublishValidationError(`Invalid post request: ${details.join('; ')}`, { cause: result.error }));
  }
  return ok(result.data);
}
