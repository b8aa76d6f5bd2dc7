import type { EducationItem, PartnerOffer } from '../../domain/entities/CatalogItem.js';
import type { PersonaClassification } from '../../domain/entities/Persona.js';
import type {
  DecisionTrace,
  EducationRecommendation,
  OfferRecommendation,
  RankedCandidate,
  RecommendationOutcome,
  SignalsSummary,
} from '../../domain/entities/Recommendation.js';
import { isWindowDays, type WindowDays } from '../../domain/entities/Window.js';
import type { ContentSelector } from '../../domain/services/ContentSelector.js';
import { roundTo } from '../../domain/services/Numeric.js';
import { CONSENT_REQUIRED_MESSAGE, DISCLAIMER } from '../../domain/services/guardrails/Disclosure.js';
import { resolveOverrides, type OverrideDecision } from '../../domain/services/guardrails/OverrideResolver.js';
import {
  InvalidWindowError,
  NotFoundError,
  RecommendationError,
  RecommendationFailureError,
} from '../errors/RecommendationErrors.js';
import type { ContentGeneratorPort } from '../ports/ContentGeneratorPort.js';
import type { StoragePort } from '../ports/StoragePort.js';
import type { Draft, GuardrailService, ReviewContext, Reviewed } from './GuardrailService.js';
import type { PersonaService } from './PersonaService.js';
import type { SignalService, SignalSnapshot } from './SignalService.js';
import { withDeadline } from './withDeadline.js';

export const EDUCATION_LIMIT = 3;
export const OFFER_LIMIT = 3;

export interface RecommendationServiceOptions {
  timeoutMs: number;
  now: () => Date;
}

interface Split<T> {
  approved: RankedCandidate<T>[];
  others: RankedCandidate<T>[];
}

const splitByApproval = <T extends { id: string }>(
  ranked: RankedCandidate<T>[],
  overrides: OverrideDecision,
  lookup: (id: string) => RankedCandidate<T> | null,
): Split<T> => {
  const approved = ranked.filter((candidate) => overrides.approved.has(candidate.item.id));

  for (const id of overrides.approved.keys()) {
    if (!ranked.some((candidate) => candidate.item.id === id)) {
      const unranked = lookup(id);
      if (unranked) {
        approved.push(unranked);
      }
    }
  }

  return { approved, others: ranked.filter((candidate) => !overrides.approved.has(candidate.item.id)) };
};

export const buildSignalsSummary = (snapshot: SignalSnapshot): SignalsSummary => {
  const { credit, income, subscriptions, savings } = snapshot.signals;

  return {
    credit: {
      utilization: roundTo(credit.overallUtilization, 2),
      totalBalance: credit.totalBalance,
      totalLimit: credit.totalLimit,
      monthlyInterest: credit.monthlyInterest,
      flags: [...credit.flags],
    },
    income: {
      frequency: income.frequency,
      stability: income.stability,
      monthlyIncome: income.monthlyIncome,
      bufferMonths: income.bufferMonths,
    },
    subscriptions: {
      count: subscriptions.count,
      monthlyRecurringSpend: subscriptions.monthlyRecurringSpend,
      percentageOfSpending: subscriptions.percentageOfSpending,
    },
    savings: {
      totalBalance: savings.totalBalance,
      monthlyInflow: savings.monthlyInflow,
      emergencyFundMonths: savings.emergencyFundMonths,
      emergencyFundUnbounded: savings.emergencyFundUnbounded,
    },
    activeSignalTags: [...snapshot.activeSignalTags],
    extractorFailures: [...snapshot.failures],
  };
};

export class RecommendationService {
  constructor(
    private readonly storage: StoragePort,
    private readonly signalService: SignalService,
    private readonly personaService: PersonaService,
    private readonly guardrails: GuardrailService,
    private readonly generator: ContentGeneratorPort,
    private readonly selector: ContentSelector,
    private readonly options: RecommendationServiceOptions,
  ) {}

  async generateRecommendations(userId: string, windowDays: number): Promise<RecommendationOutcome> {
    if (!isWindowDays(windowDays)) {
      throw new InvalidWindowError(windowDays);
    }

    const progress = { stage: 'load_user' };

    try {
      return await withDeadline(
        this.run(userId, windowDays, progress),
        this.options.timeoutMs,
        'recommendation pipeline',
      );
    } catch (error) {
      if (error instanceof RecommendationError) {
        throw error;
      }

      console.error('❌ Recommendation pipeline failed:', { userId, windowDays, stage: progress.stage, error });
      throw new RecommendationFailureError();
    }
  }

  private async run(userId: string, windowDays: WindowDays, progress: { stage: string }): Promise<RecommendationOutcome> {
    const user = await this.storage.findUser(userId);
    if (!user) {
      throw new NotFoundError(userId);
    }

    progress.stage = 'consent';
    if (!this.guardrails.hasConsent(user, windowDays)) {
      return {
        status: 'consent_required',
        userId,
        windowDays,
        educationRecommendations: [],
        offerRecommendations: [],
        message: CONSENT_REQUIRED_MESSAGE,
      };
    }

    const now = this.options.now();

    progress.stage = 'signals';
    const snapshot = await this.signalService.computeSignals(userId, windowDays, now);
    const { signals, activeSignalTags } = snapshot;

    progress.stage = 'persona';
    const { assignment, classification } = await this.personaService.assign(userId, windowDays, signals, now);
    const { personaType } = assignment;

    progress.stage = 'selection';
    const rankedEducation = await this.generator.generateEducation({ personaType, activeSignalTags });
    const rankedOffers = this.selector.rankOffers(personaType, activeSignalTags);

    progress.stage = 'overrides';
    const overrides = resolveOverrides(await this.storage.loadOverrides(userId), userId);
    for (const id of overrides.approved.keys()) {
      if (!this.selector.hasItem(id)) {
        console.warn('⚠️ Approved recommendation is not in the catalog', { userId, windowDays, itemId: id });
      }
    }

    const context: ReviewContext = {
      userId,
      windowDays,
      eligibility: { signals, activeSignalTags, accounts: snapshot.accounts },
      overrides,
    };

    progress.stage = 'guardrails';
    const education = await this.collect(
      splitByApproval(rankedEducation, overrides, (id) =>
        this.selector.educationCandidate(id, personaType, activeSignalTags),
      ),
      EDUCATION_LIMIT,
      async (candidate): Promise<Draft<EducationItem>> => ({
        candidate,
        rationale: await this.generator.composeRationale({
          personaType,
          signals,
          activeSignalTags,
          subject: { kind: 'education', item: candidate.item },
        }),
      }),
      (draft) => this.guardrails.reviewEducation(draft, context),
    );

    const offers = await this.collect(
      splitByApproval(rankedOffers, overrides, (id) => this.selector.offerCandidate(id, personaType, activeSignalTags)),
      OFFER_LIMIT,
      async (candidate): Promise<Draft<PartnerOffer>> => ({
        candidate,
        rationale: await this.generator.composeRationale({
          personaType,
          signals,
          activeSignalTags,
          subject: { kind: 'offer', item: candidate.item },
        }),
      }),
      (draft) => this.guardrails.reviewOffer(draft, context),
    );

    progress.stage = 'assembly';
    const trace = (reviewed: Reviewed<EducationItem> | Reviewed<PartnerOffer>, index: number): DecisionTrace =>
      this.buildTrace(reviewed, index + 1, classification, snapshot);

    const educationRecommendations = education.map(
      (reviewed, index): EducationRecommendation => ({
        kind: 'education',
        id: reviewed.candidate.item.id,
        title: reviewed.candidate.item.title,
        content: reviewed.candidate.item,
        rationale: reviewed.rationale,
        personaType,
        confidence: assignment.confidence,
        relevanceScore: reviewed.candidate.relevance.score,
        relevanceTier: reviewed.candidate.relevance.tier,
        trace: trace(reviewed, index),
      }),
    );

    const offerRecommendations = offers.map(
      (reviewed, index): OfferRecommendation => ({
        kind: 'offer',
        id: reviewed.candidate.item.id,
        title: reviewed.candidate.item.title,
        offer: reviewed.candidate.item,
        rationale: reviewed.rationale,
        personaType,
        confidence: assignment.confidence,
        relevanceScore: reviewed.candidate.relevance.score,
        relevanceTier: reviewed.candidate.relevance.tier,
        trace: trace(reviewed, index),
      }),
    );

    console.log('✅ Recommendations generated', {
      userId,
      windowDays,
      persona: personaType,
      confidence: assignment.confidence,
      education: educationRecommendations.length,
      offers: offerRecommendations.length,
      extractorFailures: snapshot.failures.length,
    });

    return {
      status: 'ok',
      userId,
      windowDays,
      persona: assignment,
      educationRecommendations,
      offerRecommendations,
      signalsSummary: buildSignalsSummary(snapshot),
      disclaimer: DISCLAIMER,
      generatedAt: now.toISOString(),
    };
  }

  /**
   * Approved items lead the list, up to the limit. Remaining slots are filled
   * in rank order, so an item a guardrail drops is replaced by the next
   * relevant one rather than by anything with a zero score.
   */
  private async collect<T extends { id: string }>(
    split: Split<T>,
    limit: number,
    draft: (candidate: RankedCandidate<T>) => Promise<Draft<T>>,
    review: (draft: Draft<T>) => Reviewed<T>,
  ): Promise<Reviewed<T>[]> {
    const kept: Reviewed<T>[] = [];

    for (const candidate of split.approved) {
      if (kept.length >= limit) {
        break;
      }

      const reviewed = review(await draft(candidate));
      if (reviewed.kept) {
        kept.push(reviewed);
      }
    }

    const openSlots = Math.max(limit - kept.length, 0);
    let filled = 0;

    for (const candidate of split.others) {
      if (filled >= openSlots) {
        break;
      }

      const reviewed = review(await draft(candidate));
      if (reviewed.kept) {
        kept.push(reviewed);
        filled += 1;
      }
    }

    return kept;
  }

  private buildTrace(
    reviewed: Reviewed<EducationItem> | Reviewed<PartnerOffer>,
    rank: number,
    classification: PersonaClassification,
    snapshot: SignalSnapshot,
  ): DecisionTrace {
    return {
      persona: {
        type: classification.personaType,
        confidence: classification.confidence,
        criteria: classification.criteria,
        evaluated: classification.evaluated,
      },
      activeSignalTags: [...snapshot.activeSignalTags],
      relevance: reviewed.candidate.relevance,
      rank,
      guardrails: reviewed.outcomes,
      extractorFailures: [...snapshot.failures],
    };
  }
}
