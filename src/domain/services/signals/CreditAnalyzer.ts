import dayjs from 'dayjs';
import { isCreditAccount, type Account } from '../../entities/Account.js';
import {
  emptyCreditSignals,
  type CreditFlag,
  type CreditSignals,
  type UtilizationFlag,
} from '../../entities/BehaviorSignals.js';
import type { Transaction } from '../../entities/Transaction.js';
import { roundTo, sum } from '../Numeric.js';

export const UTILIZATION_THRESHOLDS: ReadonlyArray<{ min: number; flag: UtilizationFlag }> = [
  { min: 80, flag: 'high_utilization_80' },
  { min: 50, flag: 'high_utilization_50' },
  { min: 30, flag: 'moderate_utilization_30' },
];

const MINIMUM_PAYMENT_TOLERANCE = 1.1;

const utilizationOf = (balance: number, limit: number): number => (limit > 0 ? (balance * 100) / limit : 0);

const lastPaymentFor = (card: Account, transactions: readonly Transaction[]): number => {
  if (card.lastPaymentAmount !== undefined) {
    return card.lastPaymentAmount;
  }

  const payments = transactions
    .filter((txn) => txn.accountId === card.id && txn.amount < 0)
    .sort((a, b) => dayjs(b.date).valueOf() - dayjs(a.date).valueOf());

  return payments.length > 0 ? Math.abs(payments[0].amount) : 0;
};

const paysOnlyMinimum = (card: Account, transactions: readonly Transaction[]): boolean => {
  const minimum = card.minimumPayment ?? 0;
  const lastPayment = lastPaymentFor(card, transactions);

  return minimum > 0 && lastPayment > 0 && lastPayment <= minimum * MINIMUM_PAYMENT_TOLERANCE;
};

export const utilizationFlagFor = (utilization: number): UtilizationFlag | null =>
  UTILIZATION_THRESHOLDS.find((threshold) => utilization >= threshold.min)?.flag ?? null;

/**
 * Interest assumes each card's full balance carries into next month at its APR.
 */
export const analyzeCredit = (accounts: readonly Account[], transactions: readonly Transaction[]): CreditSignals => {
  const cards = accounts.filter(isCreditAccount);

  if (cards.length === 0) {
    return emptyCreditSignals();
  }

  const totalBalance = sum(cards.map((card) => card.balance));
  const totalLimit = sum(cards.map((card) => card.limit ?? 0));
  const overallUtilization = utilizationOf(totalBalance, totalLimit);
  const monthlyInterest = Math.round(
    sum(cards.map((card) => (Math.max(card.balance, 0) * (card.apr ?? 0)) / 100 / 12)),
  );

  const flags: CreditFlag[] = [];

  if (cards.some((card) => card.isOverdue)) {
    flags.push('overdue');
  }

  if (monthlyInterest > 0) {
    flags.push('interest_charges');
  }

  if (cards.some((card) => paysOnlyMinimum(card, transactions))) {
    flags.push('minimum_payment_only');
  }

  const utilizationFlag = utilizationFlagFor(overallUtilization);
  if (utilizationFlag) {
    flags.push(utilizationFlag);
  }

  return {
    overallUtilization,
    totalBalance,
    totalLimit,
    monthlyInterest,
    cards: cards.map((card) => ({
      accountId: card.id,
      balance: card.balance,
      limit: card.limit ?? 0,
      utilization: roundTo(utilizationOf(card.balance, card.limit ?? 0), 2),
    })),
    flags,
  };
};
