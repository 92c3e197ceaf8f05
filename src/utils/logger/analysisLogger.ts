import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import type { IncomingHttpHeaders } from 'http';
import type { Request } from 'express';
import type { RiskAssessment, RiskLevel, VisitorReport } from '../../detection/types/index.js';
import { ensureDirExistence } from '../ensureDirExistence.js';
import { isTest } from '../isTest.js';

/**
 * Correlation ID for request tracing
 */
export interface CorrelationContext {
    correlationId: string;
    requestId: string;
    ip: string;
    userAgent: string;
    timestamp: number;
}

/**
 * Structured log entry for analysis events
 */
export interface AnalysisLogEntry {
    correlationId: string;
    requestId: string;
    timestamp: number;
    level: 'info' | 'warn' | 'error';
    event: string;
    ip: string;
    userAgent: string;
    path: string;
    method: string;
    riskAssessment?: RiskAssessment;
    processingTime?: number;
    error?: string;
    metadata?: Record<string, unknown>;
}

/**
 * Running totals exposed by the stats endpoint
 */
export interface AnalysisAnalytics {
    totalRequests: number;
    completedAnalyses: number;
    failedAnalyses: number;
    malformedPayloads: number;
    /** Visits whose assessment revoked the genuine flag */
    nonGenuineVisits: number;
    riskLevelCounts: Record<RiskLevel, number>;
    /** Mean over completed analyses, in milliseconds */
    averageProcessingTime: number;
}

/**
 * Minimal request shape the logger reads
 */
export type LoggedRequest = Pick<Request, 'path' | 'method' | 'headers'>;

const SENSITIVE_HEADERS = ['authorization', 'cookie', 'x-api-key', 'x-auth-token', 'x-access-token'];

/**
 * JSON-lines logger for visitor analysis with in-memory analytics
 */
export class AnalysisLogger {
    private readonly logFile: string;
    private readonly logStream: fs.WriteStream;
    private analytics: AnalysisAnalytics;

    constructor(dataDir?: string) {
        // Use test data directory when in test mode
        const dir = dataDir
            ? path.resolve(process.cwd(), dataDir)
            : path.resolve(process.cwd(), isTest ? 'test/data' : 'data');
        this.logFile = path.join(dir, 'analysis.log');

        ensureDirExistence(this.logFile);
        this.logStream = fs.createWriteStream(this.logFile, { flags: 'a' });
        this.analytics = this.initializeAnalytics();
    }

    /**
     * Create correlation context for request tracing
     */
    createCorrelationContext(req: LoggedRequest, ip: string, correlationId: string = randomUUID()): CorrelationContext {
        const userAgent = req.headers['user-agent'];
        return {
            correlationId,
            requestId: randomUUID(),
            ip,
            userAgent: userAgent || 'unknown',
            timestamp: Date.now(),
        };
    }

    /**
     * Log analysis start
     */
    logAnalysisStart(context: CorrelationContext, req: LoggedRequest): void {
        this.writeLogEntry({
            ...this.baseEntry(context, req),
            timestamp: context.timestamp,
            level: 'info',
            event: 'ANALYSIS_START',
            metadata: {
                headers: this.sanitizeHeaders(req.headers),
            },
        });
        this.analytics.totalRequests++;
    }

    /**
     * Log a completed analysis with its verdict
     */
    logAnalysisComplete(
        context: CorrelationContext,
        report: VisitorReport,
        processingTime: number,
        req: LoggedRequest,
    ): void {
        const { riskAssessment } = report;
        const flagged = riskAssessment.visitorQuality === 'bad' || riskAssessment.visitorQuality === 'suspicious';

        this.writeLogEntry({
            ...this.baseEntry(context, req),
            level: flagged ? 'warn' : 'info',
            event: flagged ? 'SUSPICIOUS_VISIT' : 'VISIT_ANALYZED',
            riskAssessment,
            processingTime,
            metadata: {
                redFlagCount: riskAssessment.redFlags.length,
                consistencyFailures: report.consistency.failed,
            },
        });

        const completed = this.analytics.completedAnalyses;
        this.analytics.averageProcessingTime =
            (this.analytics.averageProcessingTime * completed + processingTime) / (completed + 1);
        this.analytics.completedAnalyses++;
        this.analytics.riskLevelCounts[riskAssessment.riskLevel]++;
        if (!riskAssessment.isGenuine) {
            this.analytics.nonGenuineVisits++;
        }
    }

    /**
     * Log a body that was replaced by an empty fingerprint
     */
    logMalformedPayload(context: CorrelationContext, reason: string, req: LoggedRequest): void {
        this.writeLogEntry({
            ...this.baseEntry(context, req),
            level: 'warn',
            event: 'MALFORMED_PAYLOAD',
            error: reason,
        });
        this.analytics.malformedPayloads++;
    }

    /**
     * Log analysis failure
     */
    logAnalysisError(context: CorrelationContext, error: Error, req: LoggedRequest): void {
        this.writeLogEntry({
            ...this.baseEntry(context, req),
            level: 'error',
            event: 'ANALYSIS_ERROR',
            error: error.message,
            metadata: {
                stack: error.stack,
                errorName: error.name,
            },
        });
        this.analytics.failedAnalyses++;
    }

    /**
     * Get current analytics data
     */
    getAnalytics(): AnalysisAnalytics {
        return {
            ...this.analytics,
            riskLevelCounts: { ...this.analytics.riskLevelCounts },
        };
    }

    /**
     * Reset analytics (useful for testing)
     */
    resetAnalytics(): void {
        this.analytics = this.initializeAnalytics();
    }

    getLogFile(): string {
        return this.logFile;
    }

    /**
     * Close logger and flush the stream
     */
    close(): Promise<void> {
        return new Promise(resolve => {
            this.logStream.end(() => resolve());
        });
    }

    private baseEntry(context: CorrelationContext, req: LoggedRequest) {
        return {
            correlationId: context.correlationId,
            requestId: context.requestId,
            timestamp: Date.now(),
            ip: context.ip,
            userAgent: context.userAgent,
            path: req.path || 'unknown',
            method: req.method || 'unknown',
        };
    }

    /**
     * Write structured log entry
     */
    private writeLogEntry(entry: AnalysisLogEntry): void {
        this.logStream.write(JSON.stringify(entry) + '\n');

        // Also write to console in development
        if (process.env.NODE_ENV !== 'production' && !isTest) {
            const level = entry.level.toUpperCase();
            console.log(`[${new Date(entry.timestamp).toISOString()}] [${level}] ${entry.event} - ${entry.ip} - ${entry.correlationId}`);
        }
    }

    private initializeAnalytics(): AnalysisAnalytics {
        return {
            totalRequests: 0,
            completedAnalyses: 0,
            failedAnalyses: 0,
            malformedPayloads: 0,
            nonGenuineVisits: 0,
            riskLevelCounts: { minimal: 0, low: 0, medium: 0, high: 0, critical: 0 },
            averageProcessingTime: 0,
        };
    }

    /**
     * Sanitize headers for logging (remove sensitive information)
     */
    sanitizeHeaders(headers: IncomingHttpHeaders): IncomingHttpHeaders {
        const sanitized = { ...headers };

        for (const header of SENSITIVE_HEADERS) {
            if (sanitized[header]) {
                sanitized[header] = '[REDACTED]';
            }
        }

        return sanitized;
    }
}

// Singleton instance
let analysisLogger: AnalysisLogger | null = null;

/**
 * Get singleton analysis logger instance; the directory only applies to the first call
 */
export function getAnalysisLogger(dataDir?: string): AnalysisLogger {
    if (!analysisLogger) {
        // tests never write into the configured data directory
        const logger = new AnalysisLogger(isTest ? undefined : dataDir);
        analysisLogger = logger;

        // Graceful shutdown handling
        process.once('SIGINT', () => void logger.close());
        process.once('SIGTERM', () => void logger.close());
    }
    return analysisLogger;
}
