import { z } from 'zod';
import { PERSONA_TYPES } from '../../domain/entities/Persona.js';
import { SIGNAL_TAGS } from '../../domain/entities/SignalTag.js';

const PersonaTagsSchema = z.array(z.enum(PERSONA_TYPES)).min(1);
const SignalTagsSchema = z.array(z.enum(SIGNAL_TAGS)).default([]);

export const EducationItemSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  summary: z.string().min(1),
  body: z.string().min(1),
  cta: z.string().min(1),
  source: z.string().min(1),
  personaTags: PersonaTagsSchema,
  signalTags: SignalTagsSchema,
});

export const EligibilityRulesSchema = z.object({
  minMonthlyIncome: z.number().int().nonnegative().optional(),
  excludedAccountSubtypes: z.array(z.string()).optional(),
  minUtilization: z.number().min(0).max(100).optional(),
  maxUtilization: z.number().min(0).max(100).optional(),
  requiredSignals: z.array(z.enum(SIGNAL_TAGS)).optional(),
});

export const PartnerOfferSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  provider: z.string().min(1),
  offerType: z.string().min(1),
  summary: z.string().min(1),
  benefits: z.array(z.string()).default([]),
  cta: z.string().min(1),
  ctaUrl: z.string().url(),
  disclaimer: z.string().min(1),
  apr: z.number().nonnegative().optional(),
  personaTags: PersonaTagsSchema,
  signalTags: SignalTagsSchema,
  eligibility: EligibilityRulesSchema.default({}),
});

const uniqueIds = (items: { id: string }[]): boolean => new Set(items.map((item) => item.id)).size === items.length;

export const EducationCatalogSchema = z.array(EducationItemSchema).refine(uniqueIds, 'education ids must be unique');
export const OfferCatalogSchema = z.array(PartnerOfferSchema).refine(uniqueIds, 'offer ids must be unique');

export type EducationItemDTO = z.infer<typeof EducationItemSchema>;
export type PartnerOfferDTO = z.infer<typeof PartnerOfferSchema>;
