import type { Findings } from './Findings.js';

export type CheckStatus = 'passed' | 'failed' | 'warning';

/**
 * Outcome of a single cross-signal consistency check
 */
export interface ConsistencyCheck {
    check: string;
    status: CheckStatus;
    details: string;
}

/**
 * Ordered check results and their per-status counters
 */
export interface ConsistencyTally {
    checks: ConsistencyCheck[];
    passed: number;
    failed: number;
    warnings: number;
}

export type RiskLevel = 'minimal' | 'low' | 'medium' | 'high' | 'critical';

export type VisitorQuality = 'good' | 'acceptable' | 'suspicious' | 'bad';

/**
 * Score contribution of one weight-table signal
 */
export interface ScoreContribution {
    signal: string;
    score: number;
}

/**
 * Final verdict for a visit
 */
export interface RiskAssessment {
    /** Weighted sum of the matching signals, capped at maxScore */
    totalScore: number;
    maxScore: number;
    riskLevel: RiskLevel;
    visitorQuality: VisitorQuality;
    /** Starts true; any revoking signal turns it false for good */
    isGenuine: boolean;
    /** min(100, totalScore + 5 per red flag) */
    confidence: number;
    redFlags: string[];
    greenFlags: string[];
    /** Signals that matched a tier, in weight-table order */
    breakdown: ScoreContribution[];
}

export interface BasicInfo {
    ipAddress: string;
    method: string;
    path: string;
    protocol: string;
    port: number | 'Unknown';
    isSecure: boolean;
}

/**
 * Everything produced for one visit
 */
export interface VisitorReport {
    timestamp: string;
    ipAddress: string;
    basicInfo: BasicInfo;
    findings: Findings;
    consistency: ConsistencyTally;
    riskAssessment: RiskAssessment;
}

export interface AnalysisSuccessResponse {
    success: true;
    results: VisitorReport;
}

export interface AnalysisFailureResponse {
    success: false;
    error: string;
    correlationId: string;
}

export type AnalysisResponse = AnalysisSuccessResponse | AnalysisFailureResponse;
