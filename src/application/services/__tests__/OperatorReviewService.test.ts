import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FIXED_NOW } from '../../../__tests__/fixtures.js';
import { seedStorage } from '../../../infrastructure/adapters/storage/DemoSeed.js';
import { InMemoryStorageAdapter } from '../../../infrastructure/adapters/storage/InMemoryStorageAdapter.js';
import { AppContainer } from '../../../infrastructure/bootstrap/AppContainer.js';
import { loadConfig } from '../../../infrastructure/config/Config.js';
import { InvalidOverrideError, NotFoundError } from '../../errors/RecommendationErrors.js';
import { OperatorReviewService } from '../OperatorReviewService.js';

const KNOWN_ITEMS = new Set(['edu_credit_basics', 'offer_counseling']);

const setup = async () => {
  const storage = new InMemoryStorageAdapter();
  await storage.upsertUser({ id: 'user_1', name: 'Test User', consentGranted: true });
  let counter = 0;
  const recommendations = {
    generateRecommendations: async () => {
      throw new Error('not used');
    },
  };
  const service = new OperatorReviewService(storage, recommendations, {
    now: () => FIXED_NOW,
    generateId: () => `ovr_${++counter}`,
    knowsRecommendation: (id) => KNOWN_ITEMS.has(id),
  });
  return { storage, service };
};

describe('OperatorReviewService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('records an override with a trimmed reason', async () => {
    const { service } = await setup();

    const override = await service.recordOverride({
      userId: 'user_1',
      recommendationId: 'edu_credit_basics',
      action: 'flag',
      reason: '  Outdated figures  ',
      operatorId: 'op_1',
    });

    expect(override).toEqual({
      id: 'ovr_1',
      userId: 'user_1',
      recommendationId: 'edu_credit_basics',
      action: 'flag',
      reason: 'Outdated figures',
      operatorId: 'op_1',
      createdAt: '2025-06-30T12:00:00.000Z',
    });
    expect(await service.listOverrides('user_1')).toEqual([override]);
  });

  it('allows an approval without a reason', async () => {
    const { service } = await setup();

    const override = await service.recordOverride({
      userId: 'user_1',
      recommendationId: 'offer_counseling',
      action: 'approve',
      operatorId: 'op_1',
    });

    expect(override.reason).toBe('');
  });

  it('requires a reason to flag', async () => {
    const { service } = await setup();

    await expect(
      service.recordOverride({
        userId: 'user_1',
        recommendationId: 'edu_credit_basics',
        action: 'flag',
        reason: '   ',
        operatorId: 'op_1',
      }),
    ).rejects.toThrow(new InvalidOverrideError('A reason is required when flagging a recommendation'));
  });

  it('rejects unknown actions, users and recommendations', async () => {
    const { service, storage } = await setup();
    const saveOverride = vi.spyOn(storage, 'saveOverride');

    await expect(
      service.recordOverride({ userId: 'user_1', recommendationId: 'edu_credit_basics', action: 'delete', operatorId: 'op_1' }),
    ).rejects.toBeInstanceOf(InvalidOverrideError);
    await expect(
      service.recordOverride({ userId: 'ghost', recommendationId: 'edu_credit_basics', action: 'approve', operatorId: 'op_1' }),
    ).rejects.toBeInstanceOf(NotFoundError);
    await expect(
      service.recordOverride({ userId: 'user_1', recommendationId: 'edu_unknown', action: 'approve', operatorId: 'op_1' }),
    ).rejects.toThrow('Unknown recommendation edu_unknown');
    await expect(service.listOverrides('ghost')).rejects.toBeInstanceOf(NotFoundError);
    expect(saveOverride).not.toHaveBeenCalled();
  });

  describe('reviewQueue', () => {
    const seededContainer = async () => {
      const storage = new InMemoryStorageAdapter();
      await seedStorage(storage, undefined, FIXED_NOW);
      return new AppContainer({ config: loadConfig({}), storage, now: () => FIXED_NOW });
    };

    it('lists consenting users newest first with their current persona', async () => {
      const container = await seededContainer();

      const queue = await container.operatorReviewService.reviewQueue();

      expect(queue.map((entry) => entry.userId)).toEqual(['user_jonah', 'user_maya']);
      const maya = queue[1];
      expect(maya).toMatchObject({
        userName: 'Maya Chen',
        personaType: 'high_utilization',
        confidence: 0.97,
        educationCount: 3,
        generatedAt: '2025-06-30T12:00:00.000Z',
      });
      expect(maya.signalsSummary.credit.utilization).toBe(85.5);
    });

    it('honours the limit', async () => {
      const container = await seededContainer();

      const queue = await container.operatorReviewService.reviewQueue(1);

      expect(queue.map((entry) => entry.userId)).toEqual(['user_jonah']);
    });

    it('leaves out users whose recommendations fail', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const container = await seededContainer();
      const service = container.recommendationService;
      const generate = service.generateRecommendations.bind(service);
      vi.spyOn(service, 'generateRecommendations').mockImplementation(async (userId, windowDays) => {
        if (userId === 'user_jonah') {
          throw new Error('storage unavailable');
        }
        return generate(userId, windowDays);
      });

      const queue = await container.operatorReviewService.reviewQueue();

      expect(queue.map((entry) => entry.userId)).toEqual(['user_maya']);
    });
  });
});
