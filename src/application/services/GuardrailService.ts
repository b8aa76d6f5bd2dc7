import type { EducationItem, PartnerOffer } from '../../domain/entities/CatalogItem.js';
import type { OperatorOverride } from '../../domain/entities/OperatorOverride.js';
import type { GuardrailOutcome, RankedCandidate, Rationale } from '../../domain/entities/Recommendation.js';
import type { UserProfile } from '../../domain/entities/UserProfile.js';
import {
  checkEligibility,
  type EligibilityContext,
  type EligibilityFailure,
} from '../../domain/services/guardrails/EligibilityGuard.js';
import type { OverrideDecision } from '../../domain/services/guardrails/OverrideResolver.js';
import { findShamingLanguage } from '../../domain/services/guardrails/ToneGuard.js';

export interface Draft<T> {
  candidate: RankedCandidate<T>;
  rationale: Rationale;
}

export interface Reviewed<T> extends Draft<T> {
  outcomes: GuardrailOutcome[];
  approvedBy: OperatorOverride | null;
  kept: boolean;
}

export interface ReviewContext {
  userId: string;
  windowDays: number;
  eligibility: EligibilityContext;
  overrides: OverrideDecision;
}

const describeOverride = (override: OperatorOverride): string =>
  `${override.action} by ${override.operatorId}${override.reason ? `: ${override.reason}` : ''}`;

const describeFailure = (failure: EligibilityFailure): string => `${failure.code}: ${failure.detail}`;

/**
 * Consent, tone, eligibility and operator override, applied in that order.
 * Each stage records an outcome on the item; an item is kept only if no
 * stage suppressed it.
 */
export class GuardrailService {
  hasConsent(user: UserProfile, windowDays: number): boolean {
    if (!user.consentGranted) {
      console.warn('🛡️ Consent not granted, withholding recommendations', {
        userId: user.id,
        windowDays,
        stage: 'consent',
      });
    }

    return user.consentGranted;
  }

  reviewEducation(draft: Draft<EducationItem>, context: ReviewContext): Reviewed<EducationItem> {
    const { item } = draft.candidate;
    const approvedBy = context.overrides.approved.get(item.id) ?? null;

    return this.finish(draft, context, approvedBy, [
      this.consentOutcome(),
      this.toneOutcome([draft.rationale.text, item.title, item.summary, item.body]),
      this.overrideOutcome(item.id, context, approvedBy),
    ]);
  }

  reviewOffer(draft: Draft<PartnerOffer>, context: ReviewContext): Reviewed<PartnerOffer> {
    const { item } = draft.candidate;
    const approvedBy = context.overrides.approved.get(item.id) ?? null;

    return this.finish(draft, context, approvedBy, [
      this.consentOutcome(),
      this.toneOutcome([draft.rationale.text, item.title, item.summary, ...item.benefits]),
      this.eligibilityOutcome(item, context, approvedBy),
      this.overrideOutcome(item.id, context, approvedBy),
    ]);
  }

  private consentOutcome(): GuardrailOutcome {
    return { stage: 'consent', outcome: 'passed', reasons: [] };
  }

  private toneOutcome(texts: string[]): GuardrailOutcome {
    const matches = findShamingLanguage(texts);
    return matches.length > 0
      ? { stage: 'tone', outcome: 'suppressed', reasons: matches }
      : { stage: 'tone', outcome: 'passed', reasons: [] };
  }

  private eligibilityOutcome(
    offer: PartnerOffer,
    context: ReviewContext,
    approvedBy: OperatorOverride | null,
  ): GuardrailOutcome {
    const failures = checkEligibility(offer, context.eligibility);
    const reasons = failures.map(describeFailure);

    if (failures.length === 0) {
      return { stage: 'eligibility', outcome: 'passed', reasons };
    }

    // Operators may waive eligibility, never the predatory-product block.
    const predatory = failures.some((failure) => failure.code === 'predatory_product');
    if (approvedBy && !predatory) {
      return { stage: 'eligibility', outcome: 'forced', reasons };
    }

    return { stage: 'eligibility', outcome: 'suppressed', reasons };
  }

  private overrideOutcome(id: string, context: ReviewContext, approvedBy: OperatorOverride | null): GuardrailOutcome {
    if (approvedBy) {
      return { stage: 'override', outcome: 'forced', reasons: [describeOverride(approvedBy)] };
    }

    const flaggedBy = context.overrides.flagged.get(id);
    if (flaggedBy) {
      return { stage: 'override', outcome: 'suppressed', reasons: [describeOverride(flaggedBy)] };
    }

    return { stage: 'override', outcome: 'passed', reasons: [] };
  }

  private finish<T extends { id: string }>(
    draft: Draft<T>,
    context: ReviewContext,
    approvedBy: OperatorOverride | null,
    outcomes: GuardrailOutcome[],
  ): Reviewed<T> {
    const suppressed = outcomes.filter((outcome) => outcome.outcome === 'suppressed');

    for (const outcome of suppressed) {
      console.warn('🛡️ Recommendation suppressed', {
        userId: context.userId,
        windowDays: context.windowDays,
        stage: outcome.stage,
        itemId: draft.candidate.item.id,
        reasons: outcome.reasons,
      });
    }

    return { ...draft, outcomes, approvedBy, kept: suppressed.length === 0 };
  }
}
