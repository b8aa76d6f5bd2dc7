import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FIXED_NOW, createAccount, createCard, createEducationItem, createOffer, createTransaction } from '../../../__tests__/fixtures.js';
import type { Account } from '../../../domain/entities/Account.js';
import type { Catalog } from '../../../domain/entities/CatalogItem.js';
import type { RecommendationOutcome, RecommendationResult } from '../../../domain/entities/Recommendation.js';
import type { Transaction } from '../../../domain/entities/Transaction.js';
import { ContentSelector } from '../../../domain/services/ContentSelector.js';
import { TemplateContentGenerator } from '../../../infrastructure/adapters/generator/TemplateContentGenerator.js';
import { InMemoryStorageAdapter } from '../../../infrastructure/adapters/storage/InMemoryStorageAdapter.js';
import { AppContainer, type AppContainerOverrides } from '../../../infrastructure/bootstrap/AppContainer.js';
import { loadConfig } from '../../../infrastructure/config/Config.js';
import {
  InvalidWindowError,
  NotFoundError,
  RecommendationFailureError,
} from '../../errors/RecommendationErrors.js';
import type { ContentGeneratorPort } from '../../ports/ContentGeneratorPort.js';
import { defaultExtractors } from '../SignalService.js';

const catalog: Catalog = {
  education: [
    createEducationItem({
      id: 'edu_credit_basics',
      title: 'How utilization works',
      personaTags: ['high_utilization'],
      signalTags: ['high_utilization_80', 'high_utilization_50'],
    }),
    createEducationItem({
      id: 'edu_payoff_plan',
      title: 'Building a payoff plan',
      personaTags: ['high_utilization'],
      signalTags: ['interest_charges'],
    }),
    createEducationItem({
      id: 'edu_autopay',
      title: 'Setting up autopay',
      personaTags: ['high_utilization', 'balanced'],
      signalTags: ['overdue'],
    }),
    createEducationItem({
      id: 'edu_emergency_fund',
      title: 'Starting an emergency fund',
      personaTags: ['savings_builder', 'balanced'],
      signalTags: ['low_emergency_fund'],
    }),
    createEducationItem({ id: 'edu_budget_check', title: 'A monthly money check-in', personaTags: ['balanced'] }),
    createEducationItem({
      id: 'edu_subscription_audit',
      title: 'Reviewing subscriptions',
      personaTags: ['subscription_heavy'],
      signalTags: ['subscription_heavy'],
    }),
  ],
  offers: [
    createOffer({
      id: 'offer_counseling',
      title: 'Credit counseling session',
      offerType: 'counseling',
      personaTags: ['high_utilization'],
      signalTags: ['high_utilization_80'],
    }),
    createOffer({
      id: 'offer_balance_transfer',
      title: 'Balance transfer card',
      offerType: 'balance_transfer_card',
      apr: 19.99,
      personaTags: ['high_utilization'],
      signalTags: ['high_utilization_80'],
      eligibility: { minMonthlyIncome: 200000 },
    }),
    createOffer({
      id: 'offer_savings_account',
      title: 'High-yield savings account',
      personaTags: ['balanced', 'savings_builder'],
      signalTags: ['low_emergency_fund'],
    }),
    createOffer({
      id: 'offer_payday',
      title: 'Quick cash',
      offerType: 'payday_loan',
      apr: 390,
      personaTags: ['high_utilization'],
      signalTags: ['high_utilization_80'],
    }),
  ],
};

const highUtilizationCard = createCard({ balance: 8500, limit: 10000, apr: 24 });

const setup = async (
  options: {
    accounts?: Account[];
    transactions?: Transaction[];
    consentGranted?: boolean;
    env?: NodeJS.ProcessEnv;
  } & Omit<AppContainerOverrides, 'config' | 'storage' | 'catalog' | 'now'> = {},
) => {
  const { accounts = [createAccount()], transactions = [], consentGranted = true, env = {}, ...overrides } = options;
  const storage = new InMemoryStorageAdapter();
  await storage.upsertUser({ id: 'user_1', name: 'Test User', consentGranted });
  for (const account of accounts) {
    await storage.upsertAccount(account);
  }
  await storage.bulkUpsertTransactions(transactions);

  const container = new AppContainer({
    config: loadConfig(env),
    storage,
    catalog: { getCatalog: () => catalog },
    now: () => FIXED_NOW,
    ...overrides,
  });

  return { container, storage };
};

const expectOk = (outcome: RecommendationOutcome): RecommendationResult => {
  if (outcome.status !== 'ok') {
    throw new Error(`Expected recommendations, received ${outcome.status}`);
  }
  return outcome;
};

const ids = (items: ReadonlyArray<{ id: string }>): string[] => items.map((item) => item.id);

describe('RecommendationService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('recommends general content for a balanced user', async () => {
    const { container } = await setup();

    const result = expectOk(await container.recommendationService.generateRecommendations('user_1', 30));

    expect(result.persona.personaType).toBe('balanced');
    expect(result.persona.confidence).toBe(0.6);
    expect(ids(result.educationRecommendations)).toEqual(['edu_emergency_fund', 'edu_autopay', 'edu_budget_check']);
    expect(ids(result.offerRecommendations)).toEqual(['offer_savings_account']);
    expect(result.signalsSummary.activeSignalTags).toEqual(['low_emergency_fund']);
    expect(result.generatedAt).toBe('2025-06-30T12:00:00.000Z');
  });

  it('returns zeroed signals and general content for a user with no data', async () => {
    const storage = new InMemoryStorageAdapter();
    await storage.upsertUser({ id: 'user_1', name: 'Test User', consentGranted: true });
    const container = new AppContainer({ config: loadConfig({}), storage, now: () => FIXED_NOW });

    const result = expectOk(await container.recommendationService.generateRecommendations('user_1', 30));

    expect(result.persona).toMatchObject({ personaType: 'balanced', confidence: 0.6 });
    expect(result.signalsSummary).toEqual({
      credit: { utilization: 0, totalBalance: 0, totalLimit: 0, monthlyInterest: 0, flags: [] },
      income: { frequency: 'unknown', stability: 'unknown', monthlyIncome: 0, bufferMonths: 0 },
      subscriptions: { count: 0, monthlyRecurringSpend: 0, percentageOfSpending: 0 },
      savings: { totalBalance: 0, monthlyInflow: 0, emergencyFundMonths: 0, emergencyFundUnbounded: false },
      activeSignalTags: ['low_emergency_fund'],
      extractorFailures: [],
    });
    expect(ids(result.educationRecommendations)).toEqual([
      'edu_emergency_fund',
      'edu_autopay_due_dates',
      'edu_negotiating_bills',
    ]);
    expect(ids(result.offerRecommendations)).toEqual(['offer_high_yield_savings', 'offer_budgeting_app']);
  });

  it('ranks credit content first for high utilization and filters ineligible offers', async () => {
    const { container } = await setup({ accounts: [createAccount(), highUtilizationCard] });

    const result = expectOk(await container.recommendationService.generateRecommendations('user_1', 30));
    const [first] = result.educationRecommendations;

    expect(result.persona.personaType).toBe('high_utilization');
    expect(result.persona.confidence).toBe(0.96);
    expect(ids(result.educationRecommendations)).toEqual(['edu_credit_basics', 'edu_payoff_plan', 'edu_autopay']);
    expect(ids(result.offerRecommendations)).toEqual(['offer_counseling', 'offer_savings_account']);
    expect(first.relevanceScore).toBe(0.6);
    expect(first.relevanceTier).toBe(4);
    expect(first.trace.rank).toBe(1);
    expect(first.trace.relevance.points).toBe(60);
    expect(first.trace.relevance.matchedSignalTags).toEqual(['high_utilization_80']);
    expect(first.rationale.text).toContain('85.0%');
    expect(result.disclaimer).toContain('does not constitute financial advice');
  });

  it('backfills an item the tone check removes with the next relevant one', async () => {
    const selector = new ContentSelector(catalog);
    const template = new TemplateContentGenerator(selector, 'USD');
    const generator: ContentGeneratorPort = {
      generateEducation: (request) => template.generateEducation(request),
      composeRationale: async (request) => {
        const draft = await template.composeRationale(request);
        return request.subject.item.id === 'edu_payoff_plan'
          ? { ...draft, text: `You're overspending. ${draft.text}` }
          : draft;
      },
    };
    const { container } = await setup({ accounts: [createAccount(), highUtilizationCard], generator });

    const result = expectOk(await container.recommendationService.generateRecommendations('user_1', 30));

    expect(ids(result.educationRecommendations)).toEqual(['edu_credit_basics', 'edu_autopay', 'edu_emergency_fund']);
  });

  it('includes offers once the income requirement is met', async () => {
    const paycheck = (date: string) =>
      createTransaction({ date, amount: -200000, category: 'INCOME', merchantName: 'Acme Payroll' });
    const { container } = await setup({
      accounts: [createAccount(), highUtilizationCard],
      transactions: [paycheck('2025-06-06'), paycheck('2025-06-20')],
    });

    const result = expectOk(await container.recommendationService.generateRecommendations('user_1', 30));

    expect(result.signalsSummary.income.monthlyIncome).toBe(400000);
    expect(ids(result.offerRecommendations)).toEqual([
      'offer_counseling',
      'offer_balance_transfer',
      'offer_savings_account',
    ]);
    const [, transfer] = result.offerRecommendations;
    expect(transfer.trace.guardrails.map((outcome) => outcome.stage)).toEqual([
      'consent',
      'tone',
      'eligibility',
      'override',
    ]);
  });

  it('applies operator flags and approvals', async () => {
    const { container } = await setup({ accounts: [createAccount(), highUtilizationCard] });
    const review = container.operatorReviewService;
    await review.recordOverride({
      userId: 'user_1',
      recommendationId: 'edu_credit_basics',
      action: 'flag',
      reason: 'Duplicate of a recent message',
      operatorId: 'op_1',
    });
    await review.recordOverride({
      userId: 'user_1',
      recommendationId: 'edu_subscription_audit',
      action: 'approve',
      reason: 'Requested by user',
      operatorId: 'op_1',
    });

    const result = expectOk(await container.recommendationService.generateRecommendations('user_1', 30));
    const [approved] = result.educationRecommendations;

    expect(ids(result.educationRecommendations)).toEqual(['edu_subscription_audit', 'edu_payoff_plan', 'edu_autopay']);
    expect(approved.relevanceScore).toBe(0);
    expect(approved.trace.guardrails).toContainEqual({
      stage: 'override',
      outcome: 'forced',
      reasons: ['approve by op_1: Requested by user'],
    });
  });

  it('caps approved items at the list limit', async () => {
    const { container } = await setup({ accounts: [createAccount(), highUtilizationCard] });
    for (const recommendationId of ['edu_subscription_audit', 'edu_budget_check', 'edu_emergency_fund', 'edu_autopay']) {
      await container.operatorReviewService.recordOverride({
        userId: 'user_1',
        recommendationId,
        action: 'approve',
        operatorId: 'op_1',
      });
    }

    const result = expectOk(await container.recommendationService.generateRecommendations('user_1', 30));

    expect(ids(result.educationRecommendations)).toEqual(['edu_autopay', 'edu_emergency_fund', 'edu_subscription_audit']);
  });

  it('keeps an item that is both flagged and approved', async () => {
    const { container } = await setup({ accounts: [createAccount(), highUtilizationCard] });
    for (const action of ['flag', 'approve'] as const) {
      await container.operatorReviewService.recordOverride({
        userId: 'user_1',
        recommendationId: 'edu_credit_basics',
        action,
        reason: 'Reviewed',
        operatorId: 'op_1',
      });
    }

    const result = expectOk(await container.recommendationService.generateRecommendations('user_1', 30));

    expect(ids(result.educationRecommendations)).toEqual(['edu_credit_basics', 'edu_payoff_plan', 'edu_autopay']);
  });

  it('never lets an approval surface a predatory offer', async () => {
    const { container } = await setup({ accounts: [createAccount(), highUtilizationCard] });
    await container.operatorReviewService.recordOverride({
      userId: 'user_1',
      recommendationId: 'offer_payday',
      action: 'approve',
      operatorId: 'op_1',
    });

    const result = expectOk(await container.recommendationService.generateRecommendations('user_1', 30));

    expect(ids(result.offerRecommendations)).toEqual(['offer_counseling', 'offer_savings_account']);
  });

  it('returns consent_required without reading financial data', async () => {
    const { container, storage } = await setup({ accounts: [createAccount(), highUtilizationCard], consentGranted: false });
    const loadAccounts = vi.spyOn(storage, 'loadAccounts');

    const outcome = await container.recommendationService.generateRecommendations('user_1', 30);

    expect(outcome.status).toBe('consent_required');
    expect(outcome.educationRecommendations).toEqual([]);
    expect(outcome.offerRecommendations).toEqual([]);
    expect(loadAccounts).not.toHaveBeenCalled();
  });

  it('rejects unknown users and unsupported windows', async () => {
    const { container, storage } = await setup();
    const findUser = vi.spyOn(storage, 'findUser');

    await expect(container.recommendationService.generateRecommendations('user_1', 45)).rejects.toBeInstanceOf(
      InvalidWindowError,
    );
    expect(findUser).not.toHaveBeenCalled();

    await expect(container.recommendationService.generateRecommendations('ghost', 30)).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  it('produces the same result for the same inputs', async () => {
    const { container } = await setup({ accounts: [createAccount(), highUtilizationCard] });

    const first = await container.recommendationService.generateRecommendations('user_1', 90);
    const second = await container.recommendationService.generateRecommendations('user_1', 90);

    expect(second).toEqual(first);
  });

  it('continues with defaults when a signal extractor fails', async () => {
    const { container } = await setup({
      extractors: {
        ...defaultExtractors,
        income: () => {
          throw new Error('boom');
        },
      },
    });

    const result = expectOk(await container.recommendationService.generateRecommendations('user_1', 30));

    expect(result.signalsSummary.extractorFailures).toEqual([{ extractor: 'income', message: 'boom' }]);
    expect(result.educationRecommendations[0].trace.extractorFailures).toEqual([
      { extractor: 'income', message: 'boom' },
    ]);
  });

  it('reports a generic failure when storage fails mid-pipeline', async () => {
    const { container, storage } = await setup();
    vi.spyOn(storage, 'loadOverrides').mockRejectedValue(new Error('connection reset'));

    await expect(container.recommendationService.generateRecommendations('user_1', 30)).rejects.toThrow(
      new RecommendationFailureError(),
    );
  });

  it('gives up once the request deadline passes', async () => {
    const { container, storage } = await setup({ env: { REQUEST_TIMEOUT_MS: '20' } });
    vi.spyOn(storage, 'findUser').mockReturnValue(new Promise<null>(() => undefined));

    await expect(container.recommendationService.generateRecommendations('user_1', 30)).rejects.toBeInstanceOf(
      RecommendationFailureError,
    );
  });

  it('records each assignment in the persona history', async () => {
    const { container } = await setup({ accounts: [createAccount(), highUtilizationCard] });
    await container.recommendationService.generateRecommendations('user_1', 30);
    await container.recommendationService.generateRecommendations('user_1', 90);

    const history = await container.personaService.history('user_1', 90);

    expect(history).toHaveLength(1);
    expect(history[0]).toMatchObject({ personaType: 'high_utilization', windowDays: 90, confidence: 0.96 });
    await expect(container.personaService.history('ghost')).rejects.toBeInstanceOf(NotFoundError);
  });
});
