export const INCOME_CATEGORY = 'INCOME';

export interface Transaction {
  id: string;
  accountId: string;
  date: string; // ISO date
  /** Minor units. Positive is money leaving the account, negative is money arriving. */
  amount: number;
  merchantName?: string;
  category: string;
  pending: boolean;
}

export const isIncome = (txn: Transaction): boolean => txn.category === INCOME_CATEGORY;

export const isExpenseDebit = (txn: Transaction): boolean => txn.amount > 0 && !isIncome(txn);
