export type AccountType = 'depository' | 'credit' | 'loan' | 'investment';

export interface Account {
  id: string;
  userId: string;
  name: string;
  type: AccountType;
  subtype: string; // checking, savings, money_market, cd, credit_card, ...
  currency: string;
  balance: number; // minor units
  limit?: number;
  apr?: number; // percent, e.g. 24.99
  minimumPayment?: number;
  lastPaymentAmount?: number;
  isOverdue: boolean;
}

export const SAVINGS_SUBTYPES: readonly string[] = ['savings', 'money_market', 'cd', 'hsa'];

export const isSavingsAccount = (account: Account): boolean =>
  account.type === 'depository' && SAVINGS_SUBTYPES.includes(account.subtype);

export const isCreditAccount = (account: Account): boolean => account.type === 'credit';
