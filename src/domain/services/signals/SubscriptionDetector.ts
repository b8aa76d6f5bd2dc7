import {
  emptySubscriptionSignals,
  type RecurringMerchant,
  type SubscriptionCadence,
  type SubscriptionSignals,
} from '../../entities/BehaviorSignals.js';
import { isExpenseDebit, type Transaction } from '../../entities/Transaction.js';
import { monthsInWindow } from '../../entities/Window.js';
import { consecutiveGaps } from '../DateMath.js';
import { normalizeMerchant } from '../MerchantNormalizer.js';
import { mean, roundTo, sum } from '../Numeric.js';

export const MIN_RECURRING_OCCURRENCES = 3;
export const MONTHLY_GAP_DAYS = { min: 28, max: 35 } as const;
export const WEEKLY_GAP_DAYS = { min: 6, max: 8 } as const;
const WEEKS_PER_MONTH = 4.33;

const classifyCadence = (averageGap: number): SubscriptionCadence | null => {
  if (averageGap >= MONTHLY_GAP_DAYS.min && averageGap <= MONTHLY_GAP_DAYS.max) {
    return 'monthly';
  }

  if (averageGap >= WEEKLY_GAP_DAYS.min && averageGap <= WEEKLY_GAP_DAYS.max) {
    return 'weekly';
  }

  return null;
};

export const detectSubscriptions = (
  transactions: readonly Transaction[],
  windowDays: number,
): SubscriptionSignals => {
  if (transactions.length < MIN_RECURRING_OCCURRENCES) {
    return emptySubscriptionSignals();
  }

  const debits = transactions.filter(isExpenseDebit);
  const byMerchant = new Map<string, { name: string; charges: Transaction[] }>();

  for (const txn of debits) {
    const name = txn.merchantName?.trim();
    if (!name) {
      continue;
    }

    const key = normalizeMerchant(name);
    if (!key) {
      continue;
    }

    const group = byMerchant.get(key) ?? { name, charges: [] };
    group.charges.push(txn);
    byMerchant.set(key, group);
  }

  const recurringMerchants: RecurringMerchant[] = [];

  for (const { name, charges } of byMerchant.values()) {
    if (charges.length < MIN_RECURRING_OCCURRENCES) {
      continue;
    }

    const cadence = classifyCadence(mean(consecutiveGaps(charges.map((txn) => txn.date))));
    if (!cadence) {
      continue;
    }

    const averageAmount = Math.floor(sum(charges.map((txn) => txn.amount)) / charges.length);

    recurringMerchants.push({
      name,
      cadence,
      averageAmount,
      count: charges.length,
      monthlyEstimate: cadence === 'monthly' ? averageAmount : Math.trunc(averageAmount * WEEKS_PER_MONTH),
    });
  }

  recurringMerchants.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const monthlyRecurringSpend = sum(recurringMerchants.map((merchant) => merchant.monthlyEstimate));
  const totalSpend = sum(debits.map((txn) => txn.amount));

  return {
    recurringMerchants,
    count: recurringMerchants.length,
    monthlyRecurringSpend,
    percentageOfSpending:
      totalSpend > 0 ? roundTo(((monthlyRecurringSpend * monthsInWindow(windowDays)) / totalSpend) * 100, 2) : 0,
  };
};
