import type { Account } from '../../domain/entities/Account.js';
import {
  emptyCreditSignals,
  emptyIncomeSignals,
  emptySavingsSignals,
  emptySubscriptionSignals,
  type BehaviorSignals,
  type ExtractorFailure,
  type SignalName,
} from '../../domain/entities/BehaviorSignals.js';
import type { SignalTag } from '../../domain/entities/SignalTag.js';
import type { Transaction } from '../../domain/entities/Transaction.js';
import { windowRange } from '../../domain/services/DateMath.js';
import { analyzeCredit } from '../../domain/services/signals/CreditAnalyzer.js';
import { analyzeIncome } from '../../domain/services/signals/IncomeAnalyzer.js';
import { analyzeSavings } from '../../domain/services/signals/SavingsAnalyzer.js';
import { deriveSignalTags } from '../../domain/services/signals/SignalTags.js';
import { detectSubscriptions } from '../../domain/services/signals/SubscriptionDetector.js';
import type { StoragePort } from '../ports/StoragePort.js';

export interface ExtractorInput {
  accounts: readonly Account[];
  transactions: readonly Transaction[];
  windowDays: number;
}

export type SignalExtractors = { [K in SignalName]: (input: ExtractorInput) => BehaviorSignals[K] };

export const defaultExtractors: SignalExtractors = {
  subscriptions: ({ transactions, windowDays }) => detectSubscriptions(transactions, windowDays),
  savings: ({ accounts, transactions, windowDays }) => analyzeSavings(accounts, transactions, windowDays),
  credit: ({ accounts, transactions }) => analyzeCredit(accounts, transactions),
  income: ({ transactions, windowDays }) => analyzeIncome(transactions, windowDays),
};

const fallbacks: { [K in SignalName]: () => BehaviorSignals[K] } = {
  subscriptions: emptySubscriptionSignals,
  savings: emptySavingsSignals,
  credit: emptyCreditSignals,
  income: emptyIncomeSignals,
};

export interface SignalSnapshot {
  signals: BehaviorSignals;
  activeSignalTags: SignalTag[];
  accounts: Account[];
  transactionCount: number;
  failures: ExtractorFailure[];
}

export class SignalService {
  constructor(
    private readonly storage: StoragePort,
    private readonly extractors: SignalExtractors = defaultExtractors,
  ) {}

  async computeSignals(userId: string, windowDays: number, asOf: Date): Promise<SignalSnapshot> {
    const [accounts, transactions] = await Promise.all([
      this.storage.loadAccounts(userId),
      this.storage.loadTransactions(userId, windowRange(asOf, windowDays)),
    ]);

    const input: ExtractorInput = { accounts, transactions, windowDays };
    const failures: ExtractorFailure[] = [];
    const context = { userId, windowDays, failures };

    const signals: BehaviorSignals = {
      subscriptions: this.extract('subscriptions', input, context),
      savings: this.extract('savings', input, context),
      credit: this.extract('credit', input, context),
      income: this.extract('income', input, context),
    };

    return {
      signals,
      activeSignalTags: deriveSignalTags(signals),
      accounts,
      transactionCount: transactions.length,
      failures,
    };
  }

  private extract<K extends SignalName>(
    name: K,
    input: ExtractorInput,
    context: { userId: string; windowDays: number; failures: ExtractorFailure[] },
  ): BehaviorSignals[K] {
    try {
      return this.extractors[name](input);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      context.failures.push({ extractor: name, message });
      console.error('❌ Signal extractor failed, using defaults:', {
        userId: context.userId,
        windowDays: context.windowDays,
        stage: `signals.${name}`,
        error,
      });
      return fallbacks[name]();
    }
  }
}
