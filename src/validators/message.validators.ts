import { z } from 'zod';
import { ValidationError } from '../utils/errors';
import { charLength } from '../utils/text';

export const MAX_CONTENT_LENGTH = 10_000;

// Content is stored exactly as sent; trimming is only used to reject blank input.
export const contentSchema = z
  .string({ required_error: 'Content is required' })
  .refine((value) => charLength(value) <= MAX_CONTENT_LENGTH, `Content cannot exceed ${MAX_CONTENT_LENGTH} characters`)
  .refine((value) => value.trim().length > 0, 'Content cannot be empty');

export const idSchema = z.string().uuid('Invalid id');

export const createMessageSchema = z.object({
  receiverId: z.string({ required_error: 'receiverId is required' }).min(1),
  content: contentSchema,
  parentId: idSchema.nullish(),
});

export const updateMessageSchema = z.object({
  content: contentSchema,
  reason: z.string().max(255).nullish(),
});

export const notificationListQuerySchema = z.object({
  unread: z.enum(['true', 'false']).optional(),
});

export const parse = <T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> => {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(issues[0]?.message ?? 'Invalid input', issues);
  }
  return result.data;
};
