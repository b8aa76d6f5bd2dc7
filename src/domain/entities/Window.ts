export const WINDOW_DAYS = [30, 90, 180] as const;

export type WindowDays = (typeof WINDOW_DAYS)[number];

export const isWindowDays = (value: number): value is WindowDays =>
  WINDOW_DAYS.some((days) => days === value);

export const monthsInWindow = (windowDays: number): number => windowDays / 30;
