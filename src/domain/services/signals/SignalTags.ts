import type { BehaviorSignals } from '../../entities/BehaviorSignals.js';
import { SIGNAL_TAGS, type SignalTag } from '../../entities/SignalTag.js';

export const VARIABLE_INCOME_GAP_DAYS = 45;
export const LOW_EMERGENCY_FUND_MONTHS = 3;
export const SUBSCRIPTION_HEAVY_COUNT = 3;

/** Boolean facts the catalog matches against, in canonical tag order. */
export const deriveSignalTags = (signals: BehaviorSignals): SignalTag[] => {
  const active = new Set<SignalTag>(signals.credit.flags);
  const { income, savings, subscriptions } = signals;

  if (subscriptions.count >= SUBSCRIPTION_HEAVY_COUNT) {
    active.add('subscription_heavy');
  }

  if (income.frequency !== 'unknown') {
    if (income.medianGapDays > VARIABLE_INCOME_GAP_DAYS) {
      active.add('variable_income');
    }
    if (income.stability === 'stable') {
      active.add('stable_income');
    }
  }

  if (savings.monthlyInflow > 0) {
    active.add('positive_savings');
  }

  if (!savings.emergencyFundUnbounded && savings.emergencyFundMonths < LOW_EMERGENCY_FUND_MONTHS) {
    active.add('low_emergency_fund');
  }

  return SIGNAL_TAGS.filter((tag) => active.has(tag));
};
