import type { BehaviorSignals } from '../../domain/entities/BehaviorSignals.js';
import type { EducationItem } from '../../domain/entities/CatalogItem.js';
import type { PersonaType } from '../../domain/entities/Persona.js';
import type { RankedCandidate, Rationale } from '../../domain/entities/Recommendation.js';
import type { SignalTag } from '../../domain/entities/SignalTag.js';
import type { RationaleSubject } from '../../domain/services/RationaleComposer.js';

export interface EducationRequest {
  personaType: PersonaType;
  activeSignalTags: readonly SignalTag[];
}

export interface RationaleRequest {
  personaType: PersonaType;
  signals: BehaviorSignals;
  activeSignalTags: readonly SignalTag[];
  subject: RationaleSubject;
}

export interface ContentGeneratorPort {
  generateEducation(request: EducationRequest): Promise<RankedCandidate<EducationItem>[]>;
  composeRationale(request: RationaleRequest): Promise<Rationale>;
}
