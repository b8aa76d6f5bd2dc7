import type { PersonaType } from './Persona.js';
import type { SignalTag } from './SignalTag.js';

export interface EducationItem {
  id: string;
  title: string;
  summary: string;
  body: string;
  cta: string;
  source: string;
  personaTags: PersonaType[];
  signalTags: SignalTag[];
}

export interface EligibilityRules {
  minMonthlyIncome?: number;
  excludedAccountSubtypes?: string[];
  minUtilization?: number;
  maxUtilization?: number;
  requiredSignals?: SignalTag[];
}

export interface PartnerOffer {
  id: string;
  title: string;
  provider: string;
  offerType: string;
  summary: string;
  benefits: string[];
  cta: string;
  ctaUrl: string;
  disclaimer: string;
  apr?: number;
  personaTags: PersonaType[];
  signalTags: SignalTag[];
  eligibility: EligibilityRules;
}

export interface Catalog {
  education: readonly EducationItem[];
  offers: readonly PartnerOffer[];
}
