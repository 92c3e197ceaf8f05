import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Express } from 'express';
import { createApp } from '../../src/server';
import { ConfigurationManager } from '../../src/detection/ConfigurationManager';
import { AnalysisErrorHandler } from '../../src/detection/ErrorHandler';
import type { VisitorAnalysisPipeline } from '../../src/detection/VisitorAnalysisPipeline';
import { AnalysisLogger } from '../../src/utils/logger/analysisLogger';

export interface TestApp {
  app: Express;
  configManager: ConfigurationManager;
  errorHandler: AnalysisErrorHandler;
  logger: AnalysisLogger;
  /** Closes the logger and removes its directory */
  cleanup: () => Promise<void>;
}

/**
 * Builds an app with its own configuration, error counters and log directory
 */
export function createTestApp(env: NodeJS.ProcessEnv = {}, pipeline?: VisitorAnalysisPipeline): TestApp {
  const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'verdict-app-'));
  const configManager = new ConfigurationManager(env);
  const errorHandler = new AnalysisErrorHandler();
  const logger = new AnalysisLogger(dataDir);

  const app = createApp({ configManager, errorHandler, logger, pipeline });

  return {
    app,
    configManager,
    errorHandler,
    logger,
    cleanup: async () => {
      configManager.destroy();
      await logger.close();
      fs.rmSync(dataDir, { recursive: true, force: true });
    },
  };
}
