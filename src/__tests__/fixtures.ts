import type { Account } from '../domain/entities/Account.js';
import {
  emptySignals,
  type BehaviorSignals,
  type CreditSignals,
  type IncomeSignals,
  type SavingsSignals,
  type SubscriptionSignals,
} from '../domain/entities/BehaviorSignals.js';
import type { EducationItem, PartnerOffer } from '../domain/entities/CatalogItem.js';
import type { Transaction } from '../domain/entities/Transaction.js';

export const FIXED_NOW = new Date('2025-06-30T12:00:00Z');

let sequence = 0;

export const createAccount = (overrides: Partial<Account> = {}): Account => ({
  id: 'acc_checking',
  userId: 'user_1',
  name: 'Checking',
  type: 'depository',
  subtype: 'checking',
  currency: 'USD',
  balance: 0,
  isOverdue: false,
  ...overrides,
});

export const createCard = (overrides: Partial<Account> = {}): Account =>
  createAccount({ id: 'acc_card', name: 'Card', type: 'credit', subtype: 'credit_card', ...overrides });

export const createTransaction = (overrides: Partial<Transaction> = {}): Transaction => {
  sequence += 1;
  return {
    id: `txn_${sequence}`,
    accountId: 'acc_checking',
    date: '2025-06-01',
    amount: 1000,
    category: 'GENERAL_MERCHANDISE',
    pending: false,
    ...overrides,
  };
};

export const buildSignals = (
  overrides: {
    subscriptions?: Partial<SubscriptionSignals>;
    savings?: Partial<SavingsSignals>;
    credit?: Partial<CreditSignals>;
    income?: Partial<IncomeSignals>;
  } = {},
): BehaviorSignals => {
  const base = emptySignals();
  return {
    subscriptions: { ...base.subscriptions, ...overrides.subscriptions },
    savings: { ...base.savings, ...overrides.savings },
    credit: { ...base.credit, ...overrides.credit },
    income: { ...base.income, ...overrides.income },
  };
};

export const createEducationItem = (overrides: Partial<EducationItem> = {}): EducationItem => ({
  id: 'edu_item',
  title: 'Getting started',
  summary: 'A short summary.',
  body: 'A helpful body.',
  cta: 'Read more',
  source: 'Test library',
  personaTags: ['balanced'],
  signalTags: [],
  ...overrides,
});

export const createOffer = (overrides: Partial<PartnerOffer> = {}): PartnerOffer => ({
  id: 'offer_item',
  title: 'Helpful product',
  provider: 'Test Partner',
  offerType: 'savings_account',
  summary: 'A partner product.',
  benefits: ['No fees'],
  cta: 'Learn more',
  ctaUrl: 'https://example.com/offer',
  disclaimer: 'Terms apply.',
  personaTags: ['balanced'],
  signalTags: [],
  eligibility: {},
  ...overrides,
});
