import { Router } from 'express';
import type { AnalysisErrorHandler } from '../detection/ErrorHandler.js';
import type { AnalysisLogger } from '../utils/logger/analysisLogger.js';

export interface HealthRouterOptions {
  errorHandler: AnalysisErrorHandler;
  logger: AnalysisLogger;
}

export function createHealthRouter({ errorHandler, logger }: HealthRouterOptions): Router {
  const router = Router();

  router.get('/health', (req, res) => {
    const healthy = errorHandler.isHealthy();
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      errors: errorHandler.getErrorStats().errorCounts,
    });
  });

  router.get('/stats', (req, res) => {
    res.status(200).json(logger.getAnalytics());
  });

  return router;
}
