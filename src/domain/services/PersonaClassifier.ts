import type { BehaviorSignals, CreditFlag } from '../entities/BehaviorSignals.js';
import type { PersonaClassification, PersonaEvaluation, PersonaRule } from '../entities/Persona.js';
import { clamp, roundTo } from './Numeric.js';
import { VARIABLE_INCOME_GAP_DAYS } from './signals/SignalTags.js';

const hasFlag = (signals: BehaviorSignals, flag: CreditFlag): boolean => signals.credit.flags.includes(flag);

const cardsCarryingBalance = (signals: BehaviorSignals): number =>
  signals.credit.cards.filter((card) => card.balance > 0).length;

/**
 * Ordered persona rules. The first rule whose predicate holds decides the
 * persona; bands never overlap so a nudged confidence still identifies it.
 */
export const PERSONA_RULES: readonly PersonaRule[] = [
  {
    persona: 'high_utilization',
    baseConfidence: 0.95,
    band: { min: 0.93, max: 0.99 },
    criteria: 'credit utilization >= 50%, an overdue card, or minimum-only payments',
    matches: (signals) =>
      signals.credit.overallUtilization >= 50 ||
      hasFlag(signals, 'overdue') ||
      hasFlag(signals, 'minimum_payment_only'),
    adjust: (signals) => {
      const utilization = signals.credit.overallUtilization;
      let delta = 0;
      if (utilization >= 90) delta += 0.01;
      if (utilization < 80) delta -= 0.02;
      if (hasFlag(signals, 'overdue')) delta += 0.01;
      if (hasFlag(signals, 'interest_charges')) delta += 0.01;
      if (hasFlag(signals, 'minimum_payment_only')) delta += 0.01;
      return delta;
    },
    evidence: (signals) => ({
      creditUtilization: roundTo(signals.credit.overallUtilization, 2),
      totalBalance: signals.credit.totalBalance,
      totalLimit: signals.credit.totalLimit,
      monthlyInterest: signals.credit.monthlyInterest,
      overdue: hasFlag(signals, 'overdue'),
      minimumPaymentOnly: hasFlag(signals, 'minimum_payment_only'),
    }),
  },
  {
    persona: 'variable_income',
    baseConfidence: 0.9,
    band: { min: 0.89, max: 0.92 },
    criteria: `median pay gap > ${VARIABLE_INCOME_GAP_DAYS} days and cash-flow buffer < 1 month`,
    matches: (signals) =>
      signals.income.frequency !== 'unknown' &&
      signals.income.medianGapDays > VARIABLE_INCOME_GAP_DAYS &&
      signals.income.bufferMonths < 1,
    adjust: (signals) => {
      let delta = 0;
      if (signals.income.medianGapDays >= 90) delta += 0.01;
      if (signals.income.bufferMonths < 0.25) delta += 0.01;
      return delta;
    },
    evidence: (signals) => ({
      medianGapDays: signals.income.medianGapDays,
      bufferMonths: signals.income.bufferMonths,
      incomeFrequency: signals.income.frequency,
      averageIncome: signals.income.averageAmount,
    }),
  },
  {
    persona: 'debt_consolidator',
    baseConfidence: 0.88,
    band: { min: 0.865, max: 0.885 },
    criteria: 'utilization 30-50% across 2+ cards with balances, paying interest, not overdue, with known income',
    matches: (signals) =>
      signals.credit.overallUtilization >= 30 &&
      signals.credit.overallUtilization < 50 &&
      cardsCarryingBalance(signals) >= 2 &&
      signals.credit.monthlyInterest > 0 &&
      !hasFlag(signals, 'overdue') &&
      signals.income.frequency !== 'unknown',
    adjust: (signals) => {
      let delta = 0;
      if (cardsCarryingBalance(signals) >= 3) delta += 0.005;
      if (signals.credit.monthlyInterest >= 10_000) delta += 0.005;
      if (signals.credit.overallUtilization < 35) delta -= 0.015;
      return delta;
    },
    evidence: (signals) => ({
      creditUtilization: roundTo(signals.credit.overallUtilization, 2),
      cardsWithBalance: cardsCarryingBalance(signals),
      monthlyInterest: signals.credit.monthlyInterest,
      incomeFrequency: signals.income.frequency,
    }),
  },
  {
    persona: 'subscription_heavy',
    baseConfidence: 0.85,
    band: { min: 0.83, max: 0.86 },
    criteria: '3+ recurring merchants costing >= $50/month or >= 10% of spending',
    matches: (signals) =>
      signals.subscriptions.count >= 3 &&
      (signals.subscriptions.monthlyRecurringSpend >= 5_000 || signals.subscriptions.percentageOfSpending >= 10),
    adjust: (signals) => {
      let delta = 0;
      if (signals.subscriptions.count >= 5) delta += 0.01;
      if (signals.subscriptions.percentageOfSpending < 10) delta -= 0.02;
      return delta;
    },
    evidence: (signals) => ({
      recurringMerchants: signals.subscriptions.count,
      monthlyRecurringSpend: signals.subscriptions.monthlyRecurringSpend,
      percentageOfSpending: signals.subscriptions.percentageOfSpending,
    }),
  },
  {
    persona: 'savings_builder',
    baseConfidence: 0.8,
    band: { min: 0.75, max: 0.82 },
    criteria: 'savings growth >= 2% or >= $200/month inflow, with utilization < 30%',
    matches: (signals) =>
      (signals.savings.growthRate >= 2 || signals.savings.monthlyInflow >= 20_000) &&
      signals.credit.overallUtilization < 30,
    adjust: (signals) => {
      let delta = 0;
      if (signals.savings.growthRate >= 5) delta += 0.01;
      if (signals.savings.monthlyInflow >= 50_000) delta += 0.01;
      if (signals.credit.overallUtilization >= 20) delta -= 0.03;
      return delta;
    },
    evidence: (signals) => ({
      growthRate: signals.savings.growthRate,
      monthlyInflow: signals.savings.monthlyInflow,
      emergencyFundMonths: signals.savings.emergencyFundMonths,
      creditUtilization: roundTo(signals.credit.overallUtilization, 2),
    }),
  },
];

export const BALANCED_RULE: PersonaRule = {
  persona: 'balanced',
  baseConfidence: 0.6,
  band: { min: 0.6, max: 0.6 },
  criteria: 'no higher-priority persona matched',
  matches: () => true,
  adjust: () => 0,
  evidence: (signals) => ({
    creditUtilization: roundTo(signals.credit.overallUtilization, 2),
    emergencyFundMonths: signals.savings.emergencyFundMonths,
    incomeFrequency: signals.income.frequency,
  }),
};

const classifyWith = (
  rule: PersonaRule,
  signals: BehaviorSignals,
  evaluated: PersonaEvaluation[],
): PersonaClassification => {
  const nudged = clamp(rule.baseConfidence + rule.adjust(signals), rule.band.min, rule.band.max);

  return {
    personaType: rule.persona,
    confidence: roundTo(nudged, 3),
    criteria: rule.criteria,
    evidence: rule.evidence(signals),
    evaluated,
  };
};

export const classifyPersona = (signals: BehaviorSignals): PersonaClassification => {
  const evaluated: PersonaEvaluation[] = [];

  for (const rule of PERSONA_RULES) {
    const matched = rule.matches(signals);
    evaluated.push({ persona: rule.persona, matched });

    if (matched) {
      return classifyWith(rule, signals, evaluated);
    }
  }

  evaluated.push({ persona: BALANCED_RULE.persona, matched: true });
  return classifyWith(BALANCED_RULE, signals, evaluated);
};
