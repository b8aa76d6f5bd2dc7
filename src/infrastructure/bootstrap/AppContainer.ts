import type { CatalogPort } from '../../application/ports/CatalogPort.js';
import type { ContentGeneratorPort } from '../../application/ports/ContentGeneratorPort.js';
import type { StoragePort } from '../../application/ports/StoragePort.js';
import { GuardrailService } from '../../application/services/GuardrailService.js';
import { OperatorReviewService } from '../../application/services/OperatorReviewService.js';
import { PersonaService } from '../../application/services/PersonaService.js';
import { RecommendationService } from '../../application/services/RecommendationService.js';
import { SignalService, type SignalExtractors } from '../../application/services/SignalService.js';
import { UserService } from '../../application/services/UserService.js';
import { ContentSelector } from '../../domain/services/ContentSelector.js';
import { JsonCatalogAdapter } from '../adapters/catalog/JsonCatalogAdapter.js';
import { LlmContentGenerator, type CompletionTransport } from '../adapters/generator/LlmContentGenerator.js';
import { TemplateContentGenerator } from '../adapters/generator/TemplateContentGenerator.js';
import { InMemoryStorageAdapter } from '../adapters/storage/InMemoryStorageAdapter.js';
import { loadConfig, type AppConfig } from '../config/Config.js';
import { createOpenRouterCompletion } from '../http/OpenRouterCompletion.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  storage?: StoragePort;
  catalog?: CatalogPort;
  generator?: ContentGeneratorPort;
  completion?: CompletionTransport;
  extractors?: SignalExtractors;
  now?: () => Date;
}

export class AppContainer {
  readonly config: AppConfig;
  private readonly llmLive: boolean;

  readonly storage: StoragePort;
  readonly catalog: CatalogPort;
  readonly selector: ContentSelector;
  readonly generator: ContentGeneratorPort;
  readonly signalService: SignalService;
  readonly personaService: PersonaService;
  readonly guardrails: GuardrailService;
  readonly recommendationService: RecommendationService;
  readonly operatorReviewService: OperatorReviewService;
  readonly userService: UserService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    const now = overrides.now ?? (() => new Date());

    this.storage = overrides.storage ?? new InMemoryStorageAdapter();
    this.catalog = overrides.catalog ?? new JsonCatalogAdapter(this.config.catalog.directory);
    this.selector = new ContentSelector(this.catalog.getCatalog());

    if (overrides.generator) {
      this.generator = overrides.generator;
      this.llmLive = overrides.generator instanceof LlmContentGenerator ? overrides.generator.isLive() : false;
    } else {
      const template = new TemplateContentGenerator(this.selector, this.config.app.baseCurrency);

      if (this.config.generator.mode === 'llm') {
        const adapter = new LlmContentGenerator(template, overrides.completion ?? this.openRouterCompletion());
        this.generator = adapter;
        this.llmLive = adapter.isLive();
      } else {
        this.generator = template;
        this.llmLive = false;
      }
    }

    this.signalService = new SignalService(this.storage, overrides.extractors);
    this.personaService = new PersonaService(this.storage);
    this.guardrails = new GuardrailService();
    this.recommendationService = new RecommendationService(
      this.storage,
      this.signalService,
      this.personaService,
      this.guardrails,
      this.generator,
      this.selector,
      { timeoutMs: this.config.app.requestTimeoutMs, now },
    );
    this.userService = new UserService(this.storage);
    this.operatorReviewService = new OperatorReviewService(this.storage, this.recommendationService, {
      now,
      knowsRecommendation: (id) => this.selector.hasItem(id),
    });
  }

  hasLiveLlm(): boolean {
    return this.llmLive;
  }

  private openRouterCompletion(): CompletionTransport | undefined {
    const { apiKey, model } = this.config.generator.openRouter;

    if (!apiKey) {
      console.warn('⚠️ CONTENT_GENERATOR=llm but OPENROUTER_API_KEY is not set; using template rationales');
      return undefined;
    }

    return createOpenRouterCompletion({ apiKey, model, timeoutMs: this.config.app.requestTimeoutMs });
  }
}
