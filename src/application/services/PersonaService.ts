import type { BehaviorSignals } from '../../domain/entities/BehaviorSignals.js';
import type { PersonaAssignment, PersonaClassification } from '../../domain/entities/Persona.js';
import { classifyPersona } from '../../domain/services/PersonaClassifier.js';
import { NotFoundError } from '../errors/RecommendationErrors.js';
import type { StoragePort } from '../ports/StoragePort.js';

export class PersonaService {
  constructor(private readonly storage: StoragePort) {}

  async assign(
    userId: string,
    windowDays: number,
    signals: BehaviorSignals,
    assignedAt: Date,
  ): Promise<{ assignment: PersonaAssignment; classification: PersonaClassification }> {
    const classification = classifyPersona(signals);
    const assignment: PersonaAssignment = {
      userId,
      personaType: classification.personaType,
      confidence: classification.confidence,
      evidence: classification.evidence,
      windowDays,
      assignedAt: assignedAt.toISOString(),
    };

    try {
      await this.storage.savePersonaAssignment(assignment);
    } catch (error) {
      // History is best-effort; the assignment still drives this request.
      console.error('❌ Failed to persist persona assignment:', { userId, windowDays, stage: 'persona', error });
    }

    return { assignment, classification };
  }

  async history(userId: string, windowDays?: number): Promise<PersonaAssignment[]> {
    const user = await this.storage.findUser(userId);
    if (!user) {
      throw new NotFoundError(userId);
    }

    return this.storage.loadPersonaAssignments(userId, windowDays);
  }
}
