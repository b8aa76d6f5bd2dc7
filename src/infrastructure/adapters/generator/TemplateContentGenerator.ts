import type {
  ContentGeneratorPort,
  EducationRequest,
  RationaleRequest,
} from '../../../application/ports/ContentGeneratorPort.js';
import type { EducationItem } from '../../../domain/entities/CatalogItem.js';
import type { RankedCandidate, Rationale } from '../../../domain/entities/Recommendation.js';
import type { ContentSelector } from '../../../domain/services/ContentSelector.js';
import { composeRationale } from '../../../domain/services/RationaleComposer.js';

export class TemplateContentGenerator implements ContentGeneratorPort {
  constructor(
    private readonly selector: ContentSelector,
    private readonly currency: string,
  ) {}

  async generateEducation(request: EducationRequest): Promise<RankedCandidate<EducationItem>[]> {
    return this.selector.rankEducation(request.personaType, request.activeSignalTags);
  }

  async composeRationale(request: RationaleRequest): Promise<Rationale> {
    return composeRationale({ ...request, currency: this.currency });
  }
}
