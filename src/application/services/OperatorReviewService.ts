import crypto from 'node:crypto';
import type { OperatorOverride } from '../../domain/entities/OperatorOverride.js';
import type { PersonaType } from '../../domain/entities/Persona.js';
import type { RecommendationOutcome, SignalsSummary } from '../../domain/entities/Recommendation.js';
import { DEFAULT_REVIEW_LIMIT } from '../dto/ReviewQueueDTO.js';
import { OverrideRequestSchema } from '../dto/OperatorOverrideDTO.js';
import { InvalidOverrideError, NotFoundError } from '../errors/RecommendationErrors.js';
import type { StoragePort } from '../ports/StoragePort.js';

export interface OperatorReviewOptions {
  now: () => Date;
  generateId?: () => string;
  knowsRecommendation: (id: string) => boolean;
}

export interface RecommendationGenerator {
  generateRecommendations(userId: string, windowDays: number): Promise<RecommendationOutcome>;
}

export interface ReviewQueueEntry {
  userId: string;
  userName: string;
  personaType: PersonaType;
  confidence: number;
  educationCount: number;
  offerCount: number;
  signalsSummary: SignalsSummary;
  generatedAt: string;
}

export const REVIEW_WINDOW_DAYS = 30;

export class OperatorReviewService {
  private readonly generateId: () => string;

  constructor(
    private readonly storage: StoragePort,
    private readonly recommendations: RecommendationGenerator,
    private readonly options: OperatorReviewOptions,
  ) {
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
  }

  async recordOverride(input: unknown): Promise<OperatorOverride> {
    const parsed = OverrideRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidOverrideError(parsed.error.issues.map((issue) => issue.message).join('; '));
    }

    const request = parsed.data;
    const user = await this.storage.findUser(request.userId);
    if (!user) {
      throw new NotFoundError(request.userId);
    }

    if (!this.options.knowsRecommendation(request.recommendationId)) {
      throw new InvalidOverrideError(`Unknown recommendation ${request.recommendationId}`);
    }

    const override: OperatorOverride = {
      id: this.generateId(),
      userId: request.userId,
      recommendationId: request.recommendationId,
      action: request.action,
      reason: request.reason,
      operatorId: request.operatorId,
      createdAt: this.options.now().toISOString(),
    };

    await this.storage.saveOverride(override);

    console.log(`🧑‍⚖️ Override recorded: ${override.action} ${override.recommendationId}`, {
      userId: override.userId,
      operatorId: override.operatorId,
    });

    return override;
  }

  async listOverrides(userId: string): Promise<OperatorOverride[]> {
    const user = await this.storage.findUser(userId);
    if (!user) {
      throw new NotFoundError(userId);
    }

    return this.storage.loadOverrides(userId);
  }

  /**
   * Most recently added consenting users with a fresh 30-day result each. A
   * user whose pipeline fails is left out of the queue and logged.
   */
  async reviewQueue(limit = DEFAULT_REVIEW_LIMIT): Promise<ReviewQueueEntry[]> {
    const users = (await this.storage.listUsers()).filter((user) => user.consentGranted).slice(0, limit);
    const entries: ReviewQueueEntry[] = [];

    for (const user of users) {
      let outcome: RecommendationOutcome;
      try {
        outcome = await this.recommendations.generateRecommendations(user.id, REVIEW_WINDOW_DAYS);
      } catch (error) {
        console.warn('⚠️ Skipping user in review queue', { userId: user.id, stage: 'review_queue', error });
        continue;
      }

      if (outcome.status !== 'ok') {
        continue;
      }

      entries.push({
        userId: user.id,
        userName: user.name,
        personaType: outcome.persona.personaType,
        confidence: outcome.persona.confidence,
        educationCount: outcome.educationRecommendations.length,
        offerCount: outcome.offerRecommendations.length,
        signalsSummary: outcome.signalsSummary,
        generatedAt: outcome.generatedAt,
      });
    }

    return entries;
  }
}
