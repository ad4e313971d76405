import type { Request, Response } from 'express';
import { z } from 'zod';
import { DEFAULT_DELIVERY_HOUR, DEFAULT_TIMEZONE, DELIVERY_METHODS } from '../../shared/schema';
import { withSource } from '../logger';
import { createValidationFailure } from '../types/errors';

const log = withSource('validateRequest');

export const MAX_PAGE_LIMIT = 1000;

function requiredText(field: string) {
  const message = `'${field}' is required and cannot be empty`;
  return z
    .string({ required_error: message, invalid_type_error: `'${field}' must be a string` })
    .trim()
    .min(1, message);
}

const TagListSchema = z
  .array(
    z
      .string({ invalid_type_error: 'All tags must be non-empty strings' })
      .trim()
      .min(1, 'All tags must be non-empty strings'),
    { invalid_type_error: "'tags' must be an array" }
  )
  .default([]);

export const QuoteInputSchema = z.object({
  quote: requiredText('quote'),
  author: requiredText('author'),
  tags: TagListSchema,
});

export type QuoteInput = z.infer<typeof QuoteInputSchema>;

export const DuplicateCheckSchema = z.object({
  quote: requiredText('quote'),
  author: requiredText('author'),
});

const limitSchema = z
  .preprocess((v) => {
    if (typeof v === 'string') {
      // Only plain digits; anything else fails the number check
      return /^\d+$/.test(v) ? parseInt(v, 10) : NaN;
    }
    return v;
  }, z.number({ invalid_type_error: "'limit' must be a positive integer" }).int().min(1, "'limit' must be a positive integer"))
  .optional()
  .default(50)
  .transform((n) => Math.min(n, MAX_PAGE_LIMIT));

const pageQueryShape = {
  limit: limitSchema,
  sortBy: z
    .enum(['quote', 'author', 'createdAt', 'updatedAt'], {
      errorMap: () => ({ message: "'sortBy' must be one of quote, author, createdAt, updatedAt" }),
    })
    .default('createdAt'),
  sortOrder: z
    .enum(['asc', 'desc'], { errorMap: () => ({ message: "'sortOrder' must be asc or desc" }) })
    .default('desc'),
  lastKey: z.string().min(1).optional(),
};

export const ListQuotesQuerySchema = z.object(pageQueryShape);

export const SearchQuotesQuerySchema = z.object({
  ...pageQueryShape,
  q: z
    .string({ required_error: 'Search query is required' })
    .trim()
    .min(1, 'Search query is required'),
});

export const TagBodySchema = z.object({
  tag: requiredText('tag'),
});

export const RenameTagBodySchema = z.object({
  newTag: requiredText('newTag'),
});

export const CustomImageSchema = z.object({
  quoteId: requiredText('quoteId'),
  imageUrl: requiredText('imageUrl').pipe(z.string().url("'imageUrl' must be a valid URL")),
});

export const ExportQuerySchema = z.object({
  format: z
    .enum(['json', 'csv'], { errorMap: () => ({ message: "'format' must be json or csv" }) })
    .default('json'),
});

const HOUR_MESSAGE = 'must be an hour from 0 to 23';

function hourOfDay(field: string) {
  const message = `'${field}' ${HOUR_MESSAGE}`;
  return z.number({ invalid_type_error: message }).int(message).min(0, message).max(23, message);
}

// Unknown preference keys are stored as sent
export const SubscriptionInputSchema = z.object({
  isSubscribed: z.boolean({ invalid_type_error: "'isSubscribed' must be a boolean" }).default(false),
  deliveryMethod: z
    .enum(DELIVERY_METHODS, { errorMap: () => ({ message: "'deliveryMethod' must be email or push" }) })
    .default('email'),
  timezone: z
    .string({ invalid_type_error: "'timezone' must be a string" })
    .trim()
    .min(1, "'timezone' cannot be empty")
    .default(DEFAULT_TIMEZONE),
  notificationPreferences: z
    .object(
      { deliveryHour: hourOfDay('deliveryHour').default(DEFAULT_DELIVERY_HOUR) },
      { invalid_type_error: "'notificationPreferences' must be an object" }
    )
    .passthrough()
    .default({}),
});

export const DeliveryRunSchema = z.object({
  hourUtc: hourOfDay('hourUtc').optional(),
});

export function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map((issue) => issue.message);
}

export function sendValidationError(res: Response, reqPath: string, issues: z.ZodIssue[]) {
  const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined;
  log.warn({ path: reqPath, issues, requestId }, 'request validation failed');
  return res.status(400).json(createValidationFailure(formatIssues(issues)));
}

/**
 * Parse `input` with `schema`; on failure answer 400 and return undefined.
 * Handlers return early when nothing comes back.
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  req: Request,
  res: Response
): z.output<T> | undefined {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    sendValidationError(res, req.path, parsed.error.issues);
    return undefined;
  }
  return parsed.data;
}
