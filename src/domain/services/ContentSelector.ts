import type { Catalog, EducationItem, PartnerOffer } from '../entities/CatalogItem.js';
import type { PersonaType } from '../entities/Persona.js';
import type { RankedCandidate, RelevanceTier, RelevanceTrace } from '../entities/Recommendation.js';
import type { SignalTag } from '../entities/SignalTag.js';

// Scores are kept in integer points (100 = 1.0) so tier boundaries are exact.
const PERSONA_MATCH_POINTS = 50;
const SIGNAL_MATCH_POINTS = 10;
const MAX_SIGNAL_POINTS = 50;
const MAX_POINTS = 100;

export interface Taggable {
  personaTags: readonly PersonaType[];
  signalTags: readonly SignalTag[];
}

export const relevanceTierFor = (points: number): RelevanceTier => {
  if (points < 20) return 1;
  if (points < 40) return 2;
  if (points < 60) return 3;
  if (points < 80) return 4;
  return 5;
};

export const scoreItem = (item: Taggable, persona: PersonaType, activeTags: readonly SignalTag[]): RelevanceTrace => {
  const personaMatch = item.personaTags.includes(persona);
  const matchedSignalTags = item.signalTags.filter((tag) => activeTags.includes(tag));
  const signalPoints = Math.min(matchedSignalTags.length * SIGNAL_MATCH_POINTS, MAX_SIGNAL_POINTS);
  const points = Math.min((personaMatch ? PERSONA_MATCH_POINTS : 0) + signalPoints, MAX_POINTS);

  return {
    personaMatch,
    matchedSignalTags,
    points,
    score: points / MAX_POINTS,
    tier: relevanceTierFor(points),
  };
};

/** Drops zero scores; ties keep catalog order. */
export const rankItems = <T extends Taggable>(
  items: readonly T[],
  persona: PersonaType,
  activeTags: readonly SignalTag[],
): RankedCandidate<T>[] =>
  items
    .map((item, catalogIndex) => ({ item, catalogIndex, relevance: scoreItem(item, persona, activeTags) }))
    .filter((candidate) => candidate.relevance.points > 0)
    .sort((a, b) => b.relevance.points - a.relevance.points || a.catalogIndex - b.catalogIndex);

const candidateById = <T extends Taggable & { id: string }>(
  items: readonly T[],
  id: string,
  persona: PersonaType,
  activeTags: readonly SignalTag[],
): RankedCandidate<T> | null => {
  const catalogIndex = items.findIndex((item) => item.id === id);
  if (catalogIndex < 0) {
    return null;
  }

  const item = items[catalogIndex];
  return { item, catalogIndex, relevance: scoreItem(item, persona, activeTags) };
};

export class ContentSelector {
  constructor(private readonly catalog: Catalog) {}

  rankEducation(persona: PersonaType, activeTags: readonly SignalTag[]): RankedCandidate<EducationItem>[] {
    return rankItems(this.catalog.education, persona, activeTags);
  }

  rankOffers(persona: PersonaType, activeTags: readonly SignalTag[]): RankedCandidate<PartnerOffer>[] {
    return rankItems(this.catalog.offers, persona, activeTags);
  }

  /** Scores a single catalog entry regardless of relevance, for operator-approved items. */
  educationCandidate(
    id: string,
    persona: PersonaType,
    activeTags: readonly SignalTag[],
  ): RankedCandidate<EducationItem> | null {
    return candidateById(this.catalog.education, id, persona, activeTags);
  }

  offerCandidate(id: string, persona: PersonaType, activeTags: readonly SignalTag[]): RankedCandidate<PartnerOffer> | null {
    return candidateById(this.catalog.offers, id, persona, activeTags);
  }

  hasItem(id: string): boolean {
    return this.catalog.education.some((item) => item.id === id) || this.catalog.offers.some((offer) => offer.id === id);
  }
}
