export const SIGNAL_TAGS = [
  'high_utilization_80',
  'high_utilization_50',
  'moderate_utilization_30',
  'interest_charges',
  'overdue',
  'minimum_payment_only',
  'subscription_heavy',
  'variable_income',
  'stable_income',
  'positive_savings',
  'low_emergency_fund',
] as const;

export type SignalTag = (typeof SIGNAL_TAGS)[number];
