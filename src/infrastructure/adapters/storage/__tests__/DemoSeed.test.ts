import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FIXED_NOW } from '../../../../__tests__/fixtures.js';
import { AppContainer } from '../../../bootstrap/AppContainer.js';
import { loadConfig } from '../../../config/Config.js';
import { seedStorage } from '../DemoSeed.js';
import { InMemoryStorageAdapter } from '../InMemoryStorageAdapter.js';

describe('seedStorage', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const seeded = async () => {
    const storage = new InMemoryStorageAdapter();
    const users = await seedStorage(storage, undefined, FIXED_NOW);
    const container = new AppContainer({ config: loadConfig({}), storage, now: () => FIXED_NOW });
    return { users, storage, container };
  };

  it('dates transactions relative to the load time', async () => {
    const { users, storage } = await seeded();

    const transactions = await storage.loadTransactions('user_maya', { startDate: '2025-06-27', endDate: '2025-06-27' });

    expect(users).toBe(3);
    expect(transactions.map((txn) => txn.id)).toEqual(['txn_maya_pay_0']);
  });

  it('gives each demo user a distinct outcome', async () => {
    const { container } = await seeded();
    const service = container.recommendationService;

    const maya = await service.generateRecommendations('user_maya', 30);
    const jonah = await service.generateRecommendations('user_jonah', 90);
    const priya = await service.generateRecommendations('user_priya', 30);

    expect(maya.status === 'ok' && maya.persona).toMatchObject({ personaType: 'high_utilization', confidence: 0.97 });
    expect(maya.educationRecommendations).toHaveLength(3);
    expect(jonah.status === 'ok' && jonah.persona).toMatchObject({ personaType: 'savings_builder', confidence: 0.82 });
    expect(priya.status).toBe('consent_required');
  });
});
