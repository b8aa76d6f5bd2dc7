import {
  emptyIncomeSignals,
  type IncomeFrequency,
  type IncomeSignals,
} from '../../entities/BehaviorSignals.js';
import { isExpenseDebit, isIncome, type Transaction } from '../../entities/Transaction.js';
import { monthsInWindow } from '../../entities/Window.js';
import { consecutiveGaps } from '../DateMath.js';
import { mean, median, roundTo, sampleStdDev, sum } from '../Numeric.js';

export const STABLE_INCOME_MAX_CV = 0.15;

const FREQUENCY_BANDS: ReadonlyArray<{ frequency: IncomeFrequency; min: number; max: number }> = [
  { frequency: 'biweekly', min: 13, max: 16 },
  { frequency: 'monthly', min: 28, max: 32 },
  { frequency: 'weekly', min: 6, max: 8 },
];

const classifyFrequency = (medianGap: number): IncomeFrequency =>
  FREQUENCY_BANDS.find((band) => medianGap >= band.min && medianGap <= band.max)?.frequency ?? 'variable';

export const analyzeIncome = (transactions: readonly Transaction[], windowDays: number): IncomeSignals => {
  const payments = transactions.filter(isIncome);

  if (payments.length < 2) {
    return emptyIncomeSignals();
  }

  const amounts = payments.map((txn) => Math.abs(txn.amount));
  const totalIncome = sum(amounts);

  if (totalIncome === 0) {
    return emptyIncomeSignals();
  }

  const medianGapDays = Math.trunc(median(consecutiveGaps(payments.map((txn) => txn.date))));
  const averageIncome = mean(amounts);
  const coefficientOfVariation = averageIncome > 0 ? sampleStdDev(amounts) / averageIncome : 0;

  const months = monthsInWindow(windowDays);
  const expenses = sum(transactions.filter(isExpenseDebit).map((txn) => txn.amount));
  const monthlyExpenses = expenses / months;

  return {
    frequency: classifyFrequency(medianGapDays),
    stability: coefficientOfVariation < STABLE_INCOME_MAX_CV ? 'stable' : 'variable',
    paymentCount: payments.length,
    averageAmount: Math.trunc(averageIncome),
    monthlyIncome: Math.trunc(totalIncome / months),
    coefficientOfVariation: roundTo(coefficientOfVariation, 4),
    medianGapDays,
    bufferMonths: monthlyExpenses > 0 ? roundTo((totalIncome - expenses) / monthlyExpenses, 2) : 0,
  };
};
