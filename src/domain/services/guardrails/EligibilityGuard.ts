import type { Account } from '../../entities/Account.js';
import type { BehaviorSignals } from '../../entities/BehaviorSignals.js';
import type { PartnerOffer } from '../../entities/CatalogItem.js';
import type { SignalTag } from '../../entities/SignalTag.js';

export const PREDATORY_OFFER_TYPES: readonly string[] = ['payday_loan', 'title_loan', 'rent_to_own', 'cash_advance'];
export const MAX_OFFER_APR = 36;

export type EligibilityCode =
  | 'predatory_product'
  | 'income_below_minimum'
  | 'existing_account'
  | 'utilization_below_minimum'
  | 'utilization_above_maximum'
  | 'missing_required_signal';

export interface EligibilityFailure {
  code: EligibilityCode;
  detail: string;
}

export interface EligibilityContext {
  signals: BehaviorSignals;
  activeSignalTags: readonly SignalTag[];
  accounts: readonly Account[];
}

export const isPredatoryOffer = (offer: PartnerOffer): boolean =>
  PREDATORY_OFFER_TYPES.includes(offer.offerType) || (offer.apr ?? 0) > MAX_OFFER_APR;

/** Runs every check so the trace carries all failure reasons, not just the first. */
export const checkEligibility = (offer: PartnerOffer, context: EligibilityContext): EligibilityFailure[] => {
  const failures: EligibilityFailure[] = [];
  const rules = offer.eligibility;
  const utilization = context.signals.credit.overallUtilization;
  const monthlyIncome = context.signals.income.monthlyIncome;

  if (isPredatoryOffer(offer)) {
    failures.push({ code: 'predatory_product', detail: `${offer.offerType} at ${offer.apr ?? 0}% APR` });
  }

  if (rules.minMonthlyIncome !== undefined && monthlyIncome < rules.minMonthlyIncome) {
    failures.push({
      code: 'income_below_minimum',
      detail: `monthly income ${monthlyIncome} < ${rules.minMonthlyIncome}`,
    });
  }

  const excluded = rules.excludedAccountSubtypes ?? [];
  const held = context.accounts.find((account) => excluded.includes(account.subtype));
  if (held) {
    failures.push({ code: 'existing_account', detail: `already holds ${held.subtype}` });
  }

  if (rules.minUtilization !== undefined && utilization < rules.minUtilization) {
    failures.push({ code: 'utilization_below_minimum', detail: `${utilization}% < ${rules.minUtilization}%` });
  }

  if (rules.maxUtilization !== undefined && utilization > rules.maxUtilization) {
    failures.push({ code: 'utilization_above_maximum', detail: `${utilization}% > ${rules.maxUtilization}%` });
  }

  const missing = (rules.requiredSignals ?? []).filter((tag) => !context.activeSignalTags.includes(tag));
  if (missing.length > 0) {
    failures.push({ code: 'missing_required_signal', detail: missing.join(', ') });
  }

  return failures;
};
