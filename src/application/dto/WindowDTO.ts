import { z } from 'zod';
import { isWindowDays, type WindowDays } from '../../domain/entities/Window.js';
import { InvalidWindowError } from '../errors/RecommendationErrors.js';

const WindowSchema = z.coerce.number().int();

/** Accepts query-string or numeric input; anything outside 30/90/180 is rejected. */
export const parseWindowDays = (value: unknown, fallback: WindowDays = 30): WindowDays => {
  if (value === undefined || value === '') {
    return fallback;
  }

  const parsed = WindowSchema.safeParse(value);
  if (!parsed.success || !isWindowDays(parsed.data)) {
    throw new InvalidWindowError(value);
  }

  return parsed.data;
};
