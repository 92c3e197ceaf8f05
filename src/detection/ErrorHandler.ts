/**
 * Error types raised around visitor analysis
 */
export enum AnalysisErrorType {
    /** Request body or fingerprint was not a JSON object; analysis continues with an empty fingerprint */
    MALFORMED_PAYLOAD = 'MALFORMED_PAYLOAD',
    /** Something threw inside the pipeline; no partial result is returned */
    ANALYSIS_FAILURE = 'ANALYSIS_FAILURE',
    /** Configuration failed validation at load or update */
    CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

/**
 * Error carrying its taxonomy type and the original cause
 */
export class AnalysisError extends Error {
    constructor(
        public readonly type: AnalysisErrorType,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'AnalysisError';
    }
}

/**
 * Central error bookkeeping for the analysis service
 */
export class AnalysisErrorHandler {
    private readonly errorCounts: Map<AnalysisErrorType, number> = new Map();
    private readonly lastErrors: Map<AnalysisErrorType, number> = new Map();
    private failureThreshold: number;

    constructor(failureThreshold: number = 100) {
        this.failureThreshold = failureThreshold;
    }

    /**
     * Record a payload that had to be replaced by an empty fingerprint
     */
    handleMalformedPayload(reason: string, correlationId?: string): void {
        this.recordError(AnalysisErrorType.MALFORMED_PAYLOAD);
        console.warn(`[analysis] malformed payload${correlationId ? ` (${correlationId})` : ''}: ${reason}`);
    }

    /**
     * Record a pipeline failure and wrap it for the caller
     */
    handleAnalysisFailure(error: unknown, correlationId?: string): AnalysisError {
        this.recordError(AnalysisErrorType.ANALYSIS_FAILURE);

        const wrapped = error instanceof AnalysisError
            ? error
            : new AnalysisError(
                AnalysisErrorType.ANALYSIS_FAILURE,
                error instanceof Error ? error.message : 'Analysis failed',
                { cause: error },
            );

        const stack = error instanceof Error ? error.stack : String(error);
        console.error(`[analysis] failure${correlationId ? ` (${correlationId})` : ''}:`, stack);
        return wrapped;
    }

    /**
     * Record a configuration validation failure
     */
    handleConfigurationError(error: Error): void {
        this.recordError(AnalysisErrorType.CONFIGURATION_ERROR);
        console.error('[config] invalid configuration:', error.message);
    }

    /**
     * Record error occurrence for monitoring
     */
    private recordError(errorType: AnalysisErrorType): void {
        const currentCount = this.errorCounts.get(errorType) || 0;
        this.errorCounts.set(errorType, currentCount + 1);
        this.lastErrors.set(errorType, Date.now());
    }

    /**
     * Get error statistics
     */
    getErrorStats(): {
        errorCounts: Record<string, number>;
        lastErrors: Record<string, number>;
    } {
        return {
            errorCounts: Object.fromEntries(this.errorCounts),
            lastErrors: Object.fromEntries(this.lastErrors),
        };
    }

    /**
     * Reset error statistics
     */
    resetErrorStats(): void {
        this.errorCounts.clear();
        this.lastErrors.clear();
    }

    setFailureThreshold(threshold: number): void {
        this.failureThreshold = threshold;
    }

    /**
     * Healthy while analysis failures stay at or below the threshold
     */
    isHealthy(): boolean {
        const failures = this.errorCounts.get(AnalysisErrorType.ANALYSIS_FAILURE) || 0;
        return failures <= this.failureThreshold;
    }
}

// Export singleton instance
export const analysisErrorHandler = new AnalysisErrorHandler();
