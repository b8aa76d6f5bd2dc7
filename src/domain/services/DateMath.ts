import dayjs from 'dayjs';

export const daysBetween = (from: string, to: string): number => dayjs(to).diff(dayjs(from), 'day');

/** Gaps in whole days between consecutive dates, after sorting ascending. */
export const consecutiveGaps = (dates: readonly string[]): number[] => {
  const sorted = [...dates].sort((a, b) => dayjs(a).valueOf() - dayjs(b).valueOf());
  const gaps: number[] = [];

  for (let i = 1; i < sorted.length; i += 1) {
    gaps.push(daysBetween(sorted[i - 1], sorted[i]));
  }

  return gaps;
};

/** Inclusive on both ends: a 30-day window ending on the 30th starts on the 1st. */
export const windowRange = (asOf: Date, windowDays: number): { startDate: string; endDate: string } => {
  const end = dayjs(asOf);

  return {
    startDate: end.subtract(windowDays - 1, 'day').format('YYYY-MM-DD'),
    endDate: end.format('YYYY-MM-DD'),
  };
};
