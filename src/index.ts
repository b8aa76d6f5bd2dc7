export { AppContainer, type AppContainerOverrides } from './infrastructure/bootstrap/AppContainer.js';
export { loadConfig, type AppConfig } from './infrastructure/config/Config.js';
export { InMemoryStorageAdapter } from './infrastructure/adapters/storage/InMemoryStorageAdapter.js';
export { JsonCatalogAdapter, loadCatalog } from './infrastructure/adapters/catalog/JsonCatalogAdapter.js';
export { TemplateContentGenerator } from './infrastructure/adapters/generator/TemplateContentGenerator.js';
export { LlmContentGenerator, type CompletionTransport } from './infrastructure/adapters/generator/LlmContentGenerator.js';
export { RecommendationService } from './application/services/RecommendationService.js';
export { OperatorReviewService, type ReviewQueueEntry } from './application/services/OperatorReviewService.js';
export { UserService } from './application/services/UserService.js';
export { parseWindowDays } from './application/dto/WindowDTO.js';
export * from './application/errors/RecommendationErrors.js';
export type { StoragePort } from './application/ports/StoragePort.js';
export type { CatalogPort } from './application/ports/CatalogPort.js';
export type { ContentGeneratorPort } from './application/ports/ContentGeneratorPort.js';
export type * from './domain/entities/Recommendation.js';
export type { PersonaAssignment, PersonaType } from './domain/entities/Persona.js';
export type { BehaviorSignals } from './domain/entities/BehaviorSignals.js';
export { classifyPersona } from './domain/services/PersonaClassifier.js';
