import express, { Router, type NextFunction, type Request, type Response } from 'express';
import { createHeaderSnapshot, resolveClientIp } from '../detection/RequestContextBuilder.js';
import { extractFingerprint } from '../detection/payload.js';
import type { VisitorAnalysisPipeline } from '../detection/VisitorAnalysisPipeline.js';
import type { AnalysisErrorHandler } from '../detection/ErrorHandler.js';
import type { AnalysisFailureResponse, AnalysisSuccessResponse } from '../detection/types/index.js';
import type { AnalysisLogger } from '../utils/logger/analysisLogger.js';
import { fromExpressRequest } from '../utils/transportInput.js';
import { getCorrelationId } from '../middleware/correlationId.js';

export interface AnalyzeRouterOptions {
  pipeline: VisitorAnalysisPipeline;
  logger: AnalysisLogger;
  errorHandler: AnalysisErrorHandler;
  /** Maximum JSON body size */
  bodyLimit: string;
}

/**
 * Requests whose JSON body failed to parse
 */
const unparsableBodies = new WeakSet<Request>();

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Malformed JSON is analyzed with an empty fingerprint instead of rejected
 */
function tolerateUnparsableBody(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (!isBodyParseError(err)) {
    next(err);
    return;
  }
  unparsableBodies.add(req);
  req.body = undefined;
  next();
}

export function createAnalyzeRouter(options: AnalyzeRouterOptions): Router {
  const { pipeline, logger, errorHandler } = options;
  const router = Router();

  router.post(
    '/analyze',
    express.json({ limit: options.bodyLimit }),
    tolerateUnparsableBody,
    (req: Request, res: Response) => {
      const start = process.hrtime.bigint();
      const correlationId = getCorrelationId(res);

      try {
        const ip = resolveClientIp(createHeaderSnapshot(req.headers), req.socket.remoteAddress);
        const context = logger.createCorrelationContext(req, ip, correlationId);

        logger.logAnalysisStart(context, req);

        const extraction = unparsableBodies.has(req)
          ? { ...extractFingerprint(undefined), malformedReason: 'Request body is not valid JSON' }
          : extractFingerprint(req.body);

        if (extraction.malformedReason) {
          errorHandler.handleMalformedPayload(extraction.malformedReason, context.correlationId);
          logger.logMalformedPayload(context, extraction.malformedReason, req);
        }

        const outcome = pipeline.evaluate(fromExpressRequest(req), extraction.fingerprint, {
          correlationId: context.correlationId,
        });

        if (!outcome.ok) {
          logger.logAnalysisError(context, outcome.error, req);
          const body: AnalysisFailureResponse = {
            success: false,
            error: outcome.error.message,
            correlationId: context.correlationId,
          };
          res.status(500).json(body);
          return;
        }

        const processingTime = Number(process.hrtime.bigint() - start) / 1_000_000;
        logger.logAnalysisComplete(context, outcome.report, processingTime, req);

        const { riskAssessment } = outcome.report;
        res.setHeader('X-Risk-Score', String(riskAssessment.totalScore));
        res.setHeader('X-Risk-Level', riskAssessment.riskLevel);

        const body: AnalysisSuccessResponse = { success: true, results: outcome.report };
        res.status(200).json(body);
      } catch (error) {
        // failures outside the pipeline, e.g. the analysis log being unwritable
        const failure = errorHandler.handleAnalysisFailure(error, correlationId);
        if (res.headersSent) {
          return;
        }
        const body: AnalysisFailureResponse = { success: false, error: failure.message, correlationId };
        res.status(500).json(body);
      }
    },
  );

  return router;
}
