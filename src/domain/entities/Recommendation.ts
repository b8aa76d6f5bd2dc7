import type { ExtractorFailure } from './BehaviorSignals.js';
import type { EducationItem, PartnerOffer } from './CatalogItem.js';
import type { PersonaAssignment, PersonaEvaluation, PersonaType } from './Persona.js';
import type { SignalTag } from './SignalTag.js';

export type RelevanceTier = 1 | 2 | 3 | 4 | 5;

export interface RelevanceTrace {
  personaMatch: boolean;
  matchedSignalTags: SignalTag[];
  points: number;
  score: number;
  tier: RelevanceTier;
}

export interface RankedCandidate<T> {
  item: T;
  catalogIndex: number;
  relevance: RelevanceTrace;
}

export interface RationaleCitation {
  signal: string;
  value: string;
}

export interface Rationale {
  text: string;
  citations: RationaleCitation[];
  keySignals: SignalTag[];
}

export type GuardrailStage = 'consent' | 'tone' | 'eligibility' | 'override';

export interface GuardrailOutcome {
  stage: GuardrailStage;
  outcome: 'passed' | 'suppressed' | 'forced';
  reasons: string[];
}

export interface DecisionTrace {
  persona: {
    type: PersonaType;
    confidence: number;
    criteria: string;
    evaluated: PersonaEvaluation[];
  };
  activeSignalTags: SignalTag[];
  relevance: RelevanceTrace;
  rank: number;
  guardrails: GuardrailOutcome[];
  extractorFailures: ExtractorFailure[];
}

interface RecommendationBase {
  id: string;
  title: string;
  rationale: Rationale;
  personaType: PersonaType;
  confidence: number;
  relevanceScore: number;
  relevanceTier: RelevanceTier;
  trace: DecisionTrace;
}

export interface EducationRecommendation extends RecommendationBase {
  kind: 'education';
  content: EducationItem;
}

export interface OfferRecommendation extends RecommendationBase {
  kind: 'offer';
  offer: PartnerOffer;
}

export type Recommendation = EducationRecommendation | OfferRecommendation;

export interface SignalsSummary {
  credit: {
    utilization: number;
    totalBalance: number;
    totalLimit: number;
    monthlyInterest: number;
    flags: string[];
  };
  income: {
    frequency: string;
    stability: string;
    monthlyIncome: number;
    bufferMonths: number;
  };
  subscriptions: {
    count: number;
    monthlyRecurringSpend: number;
    percentageOfSpending: number;
  };
  savings: {
    totalBalance: number;
    monthlyInflow: number;
    emergencyFundMonths: number;
    emergencyFundUnbounded: boolean;
  };
  activeSignalTags: SignalTag[];
  extractorFailures: ExtractorFailure[];
}

export interface RecommendationResult {
  status: 'ok';
  userId: string;
  windowDays: number;
  persona: PersonaAssignment;
  educationRecommendations: EducationRecommendation[];
  offerRecommendations: OfferRecommendation[];
  signalsSummary: SignalsSummary;
  disclaimer: string;
  generatedAt: string;
}

export interface ConsentRequiredResult {
  status: 'consent_required';
  userId: string;
  windowDays: number;
  educationRecommendations: [];
  offerRecommendations: [];
  message: string;
}

export type RecommendationOutcome = RecommendationResult | ConsentRequiredResult;
