import type {
    ConsistencyTally,
    Findings,
    RiskAssessment,
    RiskLevel,
    ScoreContribution,
    VisitorQuality,
} from './types/index.js';
import { RISK_WEIGHT_TABLE, type ScoringInput, type WeightRule } from './riskWeights.js';

export const MAX_RISK_SCORE = 100;
const RED_FLAG_CONFIDENCE_BONUS = 5;

/**
 * Score thresholds, highest first
 */
const RISK_BANDS: ReadonlyArray<{ min: number; riskLevel: RiskLevel; visitorQuality: VisitorQuality }> = [
    { min: 70, riskLevel: 'critical', visitorQuality: 'bad' },
    { min: 50, riskLevel: 'high', visitorQuality: 'bad' },
    { min: 30, riskLevel: 'medium', visitorQuality: 'suspicious' },
    { min: 15, riskLevel: 'low', visitorQuality: 'acceptable' },
];

/**
 * Maps a capped score onto its risk level and visitor quality
 */
export function classifyScore(score: number): { riskLevel: RiskLevel; visitorQuality: VisitorQuality } {
    const band = RISK_BANDS.find(candidate => score >= candidate.min);
    return band
        ? { riskLevel: band.riskLevel, visitorQuality: band.visitorQuality }
        : { riskLevel: 'minimal', visitorQuality: 'good' };
}

/**
 * Folds findings and consistency results into a single risk assessment
 * using an ordered weight table
 */
export class RiskScoringEngine {
    private readonly table: readonly WeightRule[];

    constructor(table: readonly WeightRule[] = RISK_WEIGHT_TABLE) {
        this.table = this.validateTable(table);
    }

    /**
     * Produces the verdict. Deterministic: the same inputs always give the
     * same assessment, flags included.
     */
    assess(findings: Findings, consistency: ConsistencyTally): RiskAssessment {
        const input: ScoringInput = { findings, consistency };

        let rawScore = 0;
        let isGenuine = true;
        const redFlags: string[] = [];
        const greenFlags: string[] = [];
        const breakdown: ScoreContribution[] = [];

        for (const rule of this.table) {
            const tier = rule.tiers.find(candidate => candidate.when(input));
            if (!tier) {
                continue;
            }

            rawScore += tier.score;
            breakdown.push({ signal: rule.signal, score: tier.score });

            if (tier.redFlag !== undefined) {
                redFlags.push(typeof tier.redFlag === 'function' ? tier.redFlag(input) : tier.redFlag);
            }
            if (tier.greenFlag !== undefined) {
                greenFlags.push(tier.greenFlag);
            }
            if (tier.revokesGenuine) {
                isGenuine = false;
            }
        }

        const totalScore = Math.min(rawScore, MAX_RISK_SCORE);
        const { riskLevel, visitorQuality } = classifyScore(totalScore);

        return {
            totalScore,
            maxScore: MAX_RISK_SCORE,
            riskLevel,
            visitorQuality,
            isGenuine,
            confidence: Math.min(MAX_RISK_SCORE, totalScore + redFlags.length * RED_FLAG_CONFIDENCE_BONUS),
            redFlags,
            greenFlags,
            breakdown,
        };
    }

    /**
     * Signals in evaluation order
     */
    getSignals(): string[] {
        return this.table.map(rule => rule.signal);
    }

    /**
     * Validate the weight table
     */
    private validateTable(table: readonly WeightRule[]): readonly WeightRule[] {
        if (table.length === 0) {
            throw new Error('Weight table must contain at least one rule');
        }

        const seen = new Set<string>();
        for (const rule of table) {
            if (!rule.signal) {
                throw new Error('Every weight rule needs a signal name');
            }
            if (seen.has(rule.signal)) {
                throw new Error(`Duplicate weight rule: ${rule.signal}`);
            }
            seen.add(rule.signal);

            if (rule.tiers.length === 0) {
                throw new Error(`Weight rule ${rule.signal} has no tiers`);
            }
            if (rule.tiers.some(tier => !Number.isFinite(tier.score) || tier.score < 0)) {
                throw new Error(`Weight rule ${rule.signal} has a negative or non-finite score`);
            }
        }

        return table;
    }
}
