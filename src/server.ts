import 'dotenv/config';
import helmet from 'helmet';
import express, { type ErrorRequestHandler, type Express } from 'express';
import { getConfigurationManager, type ConfigurationManager } from './detection/ConfigurationManager.js';
import { analysisErrorHandler, type AnalysisErrorHandler } from './detection/ErrorHandler.js';
import { VisitorAnalysisPipeline } from './detection/VisitorAnalysisPipeline.js';
import type { AnalysisFailureResponse, DetectionConfig } from './detection/types/index.js';
import { getAnalysisLogger, type AnalysisLogger } from './utils/logger/analysisLogger.js';
import { correlationId, getCorrelationId } from './middleware/correlationId.js';
import { createAnalyzeRouter } from './routes/analyze.js';
import { createHealthRouter } from './routes/health.js';
import { isTest } from './utils/isTest.js';

export interface AppOptions {
  configManager?: ConfigurationManager;
  logger?: AnalysisLogger;
  errorHandler?: AnalysisErrorHandler;
  pipeline?: VisitorAnalysisPipeline;
}

/**
 * Builds the Express app. Rule and health-threshold changes published by the
 * configuration manager apply to later requests; the body limit is fixed at
 * creation.
 */
export function createApp(options: AppOptions = {}): Express {
  const configManager = options.configManager ?? getConfigurationManager();
  const config = configManager.getConfig();
  const logger = options.logger ?? getAnalysisLogger(config.logging.dataDir);
  const errorHandler = options.errorHandler ?? analysisErrorHandler;

  const pipeline = options.pipeline ?? new VisitorAnalysisPipeline({ rules: config.rules, errorHandler });
  errorHandler.setFailureThreshold(config.health.failureThreshold);

  configManager.on('configChanged', (updated: DetectionConfig) => {
    pipeline.updateRules(updated.rules);
    errorHandler.setFailureThreshold(updated.health.failureThreshold);
  });

  const app = express();

  app.use(helmet());
  app.use(correlationId);

  app.use((req, res, next) => {
    const start = process.hrtime.bigint();
    res.on('finish', () => {
      if (isTest) return;
      const duration = Number(process.hrtime.bigint() - start) / 1_000_000;
      console.log(`${req.method} ${req.path} ${res.statusCode} - ${duration.toFixed(2)} ms`);
    });
    next();
  });

  app.use('/api', createHealthRouter({ errorHandler, logger }));
  app.use(createAnalyzeRouter({ pipeline, logger, errorHandler, bodyLimit: config.server.bodyLimit }));

  // Fallback for all other routes
  app.use((req, res) => {
    res.status(404).json({ success: false, error: 'Not found', correlationId: getCorrelationId(res) });
  });

  app.use(createErrorResponder(errorHandler));

  return app;
}

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 600 ? err.status : 500;
  }
  return 500;
}

/**
 * Last-resort handler: client errors raised by middleware (such as an
 * oversized body) keep their status, anything else counts as an analysis
 * failure. Both are answered with the JSON failure body.
 */
function createErrorResponder(errorHandler: AnalysisErrorHandler): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const correlationId = getCorrelationId(res);
    const status = statusOf(err);
    let message: string;
    if (status >= 500) {
      message = errorHandler.handleAnalysisFailure(err, correlationId).message;
    } else {
      message = err instanceof Error ? err.message : 'Bad request';
    }

    const body: AnalysisFailureResponse = { success: false, error: message, correlationId };
    res.status(status).json(body);
  };
}
