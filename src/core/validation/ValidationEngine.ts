// src/core/validation/ValidationEngine.ts

import { z } from 'zod';
import { RSS_VERSION } from '../model/Channel';
import type { RssFeed } from '../model/Channel';
import { ValidationError } from '../../utils/errors';

// Invariant schemas (exported so callers can reuse them on their own models)
export const VersionSchema = z.literal(RSS_VERSION, {
  errorMap: () => ({ message: `RSS 2.0 documents must declare version '${RSS_VERSION}'` }),
});

export const SkipHoursSchema = z
  .array(
    z
      .number()
      .int('Each skip hour must be a whole number')
      .min(0, 'Each skip hour must be between 0 and 23 inclusive')
      .max(23, 'Each skip hour must be between 0 and 23 inclusive')
  )
  .max(24, 'skipHours may contain at most 24 entries');

export const SkipDaysSchema = z
  .array(z.string())
  .max(7, 'skipDays may contain at most the seven days of the week');

export const TtlSchema = z
  .number()
  .int('ttl must be a whole number of minutes')
  .nonnegative('ttl must be a non-negative number of minutes')
  .optional();

export const ItemSchema = z
  .object({
    title: z.string().optional(),
    description: z.string().optional(),
  })
  .refine((item) => item.title !== undefined || item.description !== undefined, {
    message: 'RSS items require at least a title or a description',
  });

interface InvariantCheck {
  invariant: string;
  schema: z.ZodTypeAny;
  value: unknown;
}

/**
 * Checks in the order they are reported
 */
function checksFor(feed: RssFeed): InvariantCheck[] {
  const { channel } = feed;
  return [
    { invariant: 'feed.version', schema: VersionSchema, value: feed.version },
    { invariant: 'channel.skipHours', schema: SkipHoursSchema, value: channel.skipHours },
    { invariant: 'channel.skipDays', schema: SkipDaysSchema, value: channel.skipDays },
    { invariant: 'channel.ttl', schema: TtlSchema, value: channel.ttl },
    ...channel.items.map((item, index) => ({
      invariant: `channel.items[${index}]`,
      schema: ItemSchema,
      value: item,
    })),
  ];
}

function violationOf(check: InvariantCheck): ValidationError | undefined {
  const result = check.schema.safeParse(check.value);
  if (result.success) {
    return undefined;
  }
  const [issue] = result.error.errors;
  return new ValidationError(issue.message, check.invariant, {
    path: issue.path.join('.'),
  });
}

/**
 * Validate an assembled feed, stopping at the first violated invariant.
 *
 * Holds for any RssFeed, however it was built.
 *
 * @throws {ValidationError} Carrying the invariant id (e.g. `channel.skipHours`)
 */
export function validateFeed(feed: RssFeed): RssFeed {
  for (const check of checksFor(feed)) {
    const violation = violationOf(check);
    if (violation) {
      throw violation;
    }
  }
  return feed;
}

/**
 * Every violated invariant, in check order
 */
export function collectViolations(feed: RssFeed): ValidationError[] {
  return checksFor(feed)
    .map(violationOf)
    .filter((violation): violation is ValidationError => violation !== undefined);
}
