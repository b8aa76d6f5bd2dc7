import { isSavingsAccount, type Account } from '../../entities/Account.js';
import { emptySavingsSignals, type SavingsSignals } from '../../entities/BehaviorSignals.js';
import { isExpenseDebit, type Transaction } from '../../entities/Transaction.js';
import { monthsInWindow } from '../../entities/Window.js';
import { roundTo, sum } from '../Numeric.js';

// JSON has no Infinity; paired with emergencyFundUnbounded.
export const UNBOUNDED_COVERAGE_MONTHS = 999;

export const analyzeSavings = (
  accounts: readonly Account[],
  transactions: readonly Transaction[],
  windowDays: number,
): SavingsSignals => {
  const savingsAccounts = accounts.filter(isSavingsAccount);

  if (savingsAccounts.length === 0) {
    return emptySavingsSignals();
  }

  const savingsIds = new Set(savingsAccounts.map((account) => account.id));
  const months = monthsInWindow(windowDays);

  const totalBalance = sum(savingsAccounts.map((account) => account.balance));
  const netInflow = sum(transactions.filter((txn) => savingsIds.has(txn.accountId)).map((txn) => -txn.amount));
  const spending = sum(
    transactions.filter((txn) => !savingsIds.has(txn.accountId) && isExpenseDebit(txn)).map((txn) => txn.amount),
  );
  const monthlyExpenses = Math.trunc(spending / months);

  let emergencyFundMonths = 0;
  let emergencyFundUnbounded = false;

  if (monthlyExpenses > 0) {
    emergencyFundMonths = roundTo(totalBalance / monthlyExpenses, 2);
  } else if (totalBalance > 0) {
    emergencyFundMonths = UNBOUNDED_COVERAGE_MONTHS;
    emergencyFundUnbounded = true;
  }

  return {
    totalBalance,
    netInflow,
    monthlyInflow: Math.trunc(netInflow / months),
    growthRate: totalBalance > 0 ? roundTo((netInflow / totalBalance) * 100, 2) : 0,
    monthlyExpenses,
    emergencyFundMonths,
    emergencyFundUnbounded,
  };
};
