export type SubscriptionCadence = 'monthly' | 'weekly';

export interface RecurringMerchant {
  name: string;
  cadence: SubscriptionCadence;
  averageAmount: number;
  count: number;
  monthlyEstimate: number;
}

export interface SubscriptionSignals {
  recurringMerchants: RecurringMerchant[];
  count: number;
  monthlyRecurringSpend: number;
  percentageOfSpending: number;
}

export interface SavingsSignals {
  totalBalance: number;
  netInflow: number;
  monthlyInflow: number;
  growthRate: number;
  monthlyExpenses: number;
  emergencyFundMonths: number;
  /** Set when there are savings but no expenses to cover. */
  emergencyFundUnbounded: boolean;
}

export type UtilizationFlag = 'high_utilization_80' | 'high_utilization_50' | 'moderate_utilization_30';
export type CreditFlag = UtilizationFlag | 'overdue' | 'interest_charges' | 'minimum_payment_only';

export interface CardUtilization {
  accountId: string;
  balance: number;
  limit: number;
  utilization: number;
}

export interface CreditSignals {
  /** Unrounded percent; thresholds compare this value, output rounds it. */
  overallUtilization: number;
  totalBalance: number;
  totalLimit: number;
  monthlyInterest: number;
  cards: CardUtilization[];
  flags: CreditFlag[];
}

export type IncomeFrequency = 'weekly' | 'biweekly' | 'monthly' | 'variable' | 'unknown';
export type IncomeStability = 'stable' | 'variable' | 'unknown';

export interface IncomeSignals {
  frequency: IncomeFrequency;
  stability: IncomeStability;
  paymentCount: number;
  averageAmount: number;
  monthlyIncome: number;
  coefficientOfVariation: number;
  medianGapDays: number;
  bufferMonths: number;
}

export interface BehaviorSignals {
  subscriptions: SubscriptionSignals;
  savings: SavingsSignals;
  credit: CreditSignals;
  income: IncomeSignals;
}

export type SignalName = keyof BehaviorSignals;

export interface ExtractorFailure {
  extractor: SignalName;
  message: string;
}

export const emptySubscriptionSignals = (): SubscriptionSignals => ({
  recurringMerchants: [],
  count: 0,
  monthlyRecurringSpend: 0,
  percentageOfSpending: 0,
});

export const emptySavingsSignals = (): SavingsSignals => ({
  totalBalance: 0,
  netInflow: 0,
  monthlyInflow: 0,
  growthRate: 0,
  monthlyExpenses: 0,
  emergencyFundMonths: 0,
  emergencyFundUnbounded: false,
});

export const emptyCreditSignals = (): CreditSignals => ({
  overallUtilization: 0,
  totalBalance: 0,
  totalLimit: 0,
  monthlyInterest: 0,
  cards: [],
  flags: [],
});

export const emptyIncomeSignals = (): IncomeSignals => ({
  frequency: 'unknown',
  stability: 'unknown',
  paymentCount: 0,
  averageAmount: 0,
  monthlyIncome: 0,
  coefficientOfVariation: 0,
  medianGapDays: 0,
  bufferMonths: 0,
});

export const emptySignals = (): BehaviorSignals => ({
  subscriptions: emptySubscriptionSignals(),
  savings: emptySavingsSignals(),
  credit: emptyCreditSignals(),
  income: emptyIncomeSignals(),
});
