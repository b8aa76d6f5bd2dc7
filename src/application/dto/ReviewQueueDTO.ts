import { z } from 'zod';
import { InvalidRequestError } from '../errors/RecommendationErrors.js';

export const DEFAULT_REVIEW_LIMIT = 10;
export const MAX_REVIEW_LIMIT = 100;

const LimitSchema = z.coerce.number().int().min(1).max(MAX_REVIEW_LIMIT);

export const parseReviewLimit = (value: unknown): number => {
  if (value === undefined || value === '') {
    return DEFAULT_REVIEW_LIMIT;
  }

  const parsed = LimitSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidRequestError(`limit must be a whole number from 1 to ${MAX_REVIEW_LIMIT}`);
  }

  return parsed.data;
};
