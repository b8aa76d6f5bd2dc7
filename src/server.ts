import cors from 'cors';
import express, { type Response } from 'express';
import { parseReviewLimit } from './application/dto/ReviewQueueDTO.js';
import { parseWindowDays } from './application/dto/WindowDTO.js';
import { RecommendationError } from './application/errors/RecommendationErrors.js';
import { seedStorage } from './infrastructure/adapters/storage/DemoSeed.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

export const createApp = (container: AppContainer): express.Express => {
  const app = express();

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '256kb' }));

  const sendError = (res: Response, error: unknown) => {
    if (error instanceof RecommendationError) {
      const status = error.code === 'not_found' ? 404 : error.code === 'internal_failure' ? 500 : 400;
      return res.status(status).json({ error: error.message, code: error.code });
    }

    console.error('Unhandled request error:', error);
    return res.status(500).json({ error: 'Internal server error', code: 'internal_failure' });
  };

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Behavior Insights API',
      version: '0.1.0',
      generator: container.config.generator.mode,
      llmConfigured: container.hasLiveLlm(),
      baseCurrency: container.config.app.baseCurrency,
    });
  });

  app.get('/api/insights/:userId', async (req, res) => {
    try {
      const windowDays = parseWindowDays(req.query.window);
      const result = await container.recommendationService.generateRecommendations(req.params.userId, windowDays);
      res.json(result);
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/users/:userId/personas', async (req, res) => {
    try {
      const windowDays = req.query.window === undefined ? undefined : parseWindowDays(req.query.window);
      const history = await container.personaService.history(req.params.userId, windowDays);
      res.json({ userId: req.params.userId, assignments: history });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/users/:userId/consent', async (req, res) => {
    try {
      const user = await container.userService.updateConsent(req.params.userId, req.body);
      res.json(user);
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/operator/review', async (req, res) => {
    try {
      const pendingReviews = await container.operatorReviewService.reviewQueue(parseReviewLimit(req.query.limit));
      res.json({ pendingReviews, totalCount: pendingReviews.length });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/operator/overrides/:userId', async (req, res) => {
    try {
      const overrides = await container.operatorReviewService.listOverrides(req.params.userId);
      res.json({ userId: req.params.userId, overrides });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/operator/overrides', async (req, res) => {
    try {
      const override = await container.operatorReviewService.recordOverride(req.body);
      res.status(201).json(override);
    } catch (error) {
      sendError(res, error);
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  return app;
};

const start = async () => {
  const container = new AppContainer();

  if (container.config.app.demoSeed) {
    await seedStorage(container.storage);
  }

  const port = container.config.app.port;
  createApp(container).listen(port, () => {
    console.log(`🚀 Behavior Insights API listening on http://localhost:${port}`);
  });
};

start().catch((error: unknown) => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});
