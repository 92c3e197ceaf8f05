import type { DetectionRules, Fingerprint, TransportInput, VisitorReport } from './types/index.js';
import { DEFAULT_DETECTION_CONFIG } from './types/index.js';
import { buildRequestContext } from './RequestContextBuilder.js';
import { createEvidenceAnalyzers, runEvidenceAnalyzers, type EvidenceAnalyzerSet } from './analyzers/index.js';
import { checkConsistency } from './ConsistencyChecker.js';
import { RiskScoringEngine } from './RiskScoringEngine.js';
import { AnalysisError, AnalysisErrorHandler, analysisErrorHandler } from './ErrorHandler.js';

export interface PipelineOptions {
    /** Rule snapshot the analyzers are built from */
    rules?: DetectionRules;
    /** Replaces the analyzers built from `rules` */
    analyzers?: EvidenceAnalyzerSet;
    scoringEngine?: RiskScoringEngine;
    errorHandler?: AnalysisErrorHandler;
}

export interface EvaluateOptions {
    /** Clock reading echoed as the report timestamp */
    now?: Date;
    /** Attached to failure logs */
    correlationId?: string;
}

/**
 * Either a complete report or the error that prevented one
 */
export type PipelineOutcome =
    | { ok: true; report: VisitorReport }
    | { ok: false; error: AnalysisError };

/**
 * Runs context building, evidence analysis, consistency checks and scoring
 * for one visit. A throw anywhere yields a failure outcome, never a partial
 * report.
 */
export class VisitorAnalysisPipeline {
    private analyzers: EvidenceAnalyzerSet;
    private readonly scoringEngine: RiskScoringEngine;
    private readonly errorHandler: AnalysisErrorHandler;

    constructor(options: PipelineOptions = {}) {
        this.analyzers = options.analyzers ?? createEvidenceAnalyzers(options.rules ?? DEFAULT_DETECTION_CONFIG.rules);
        this.scoringEngine = options.scoringEngine ?? new RiskScoringEngine();
        this.errorHandler = options.errorHandler ?? analysisErrorHandler;
    }

    /**
     * Swap in analyzers built from a new rule snapshot
     */
    updateRules(rules: DetectionRules): void {
        this.analyzers = createEvidenceAnalyzers(rules);
    }

    evaluate(transport: TransportInput, fingerprint: Readonly<Fingerprint>, options: EvaluateOptions = {}): PipelineOutcome {
        try {
            const context = buildRequestContext(transport, fingerprint, options.now);
            const findings = runEvidenceAnalyzers(context, this.analyzers);
            const consistency = checkConsistency(context);
            const riskAssessment = this.scoringEngine.assess(findings, consistency);

            return {
                ok: true,
                report: {
                    timestamp: context.receivedAt,
                    ipAddress: context.clientIp,
                    basicInfo: {
                        ipAddress: context.clientIp,
                        method: context.method,
                        path: context.path,
                        protocol: context.protocol,
                        port: context.port ?? 'Unknown',
                        isSecure: context.isSecure,
                    },
                    findings,
                    consistency,
                    riskAssessment,
                },
            };
        } catch (error) {
            return { ok: false, error: this.errorHandler.handleAnalysisFailure(error, options.correlationId) };
        }
    }
}
