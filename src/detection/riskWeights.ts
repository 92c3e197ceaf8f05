import type { ConsistencyTally, Findings } from './types/index.js';

/**
 * Everything the weight table is evaluated against
 */
export interface ScoringInput {
    findings: Findings;
    consistency: ConsistencyTally;
}

/**
 * One graded outcome of a signal. The first tier whose predicate matches is
 * applied; later tiers of the same signal are ignored.
 */
export interface WeightTier {
    /** Predicate selecting this tier */
    when: (input: ScoringInput) => boolean;
    /** Points added to the total */
    score: number;
    /** Red flag text, or a builder for flags that quote the evidence */
    redFlag?: string | ((input: ScoringInput) => string);
    greenFlag?: string;
    /** Marks the visit as not genuine */
    revokesGenuine?: boolean;
}

/**
 * A named signal and its tiers, best-match first
 */
export interface WeightRule {
    signal: string;
    tiers: WeightTier[];
}

/**
 * The verdict weights, evaluated in order. Advanced behaviour is counted both
 * through human likelihood and through the direct mouse and click rules.
 */
export const RISK_WEIGHT_TABLE: readonly WeightRule[] = [
    {
        signal: 'headerQuality',
        tiers: [
            { when: ({ findings }) => findings.headers.quality === 'bad', score: 25, redFlag: 'Poor header quality' },
            { when: ({ findings }) => findings.headers.quality === 'suspicious', score: 15, redFlag: 'Suspicious headers' },
            { when: () => true, score: 0, greenFlag: 'Good header quality' },
        ],
    },
    {
        signal: 'userAgentQuality',
        tiers: [
            { when: ({ findings }) => findings.userAgent.quality === 'bad', score: 20, redFlag: 'Bad User-Agent' },
            { when: ({ findings }) => findings.userAgent.quality === 'suspicious', score: 10, redFlag: 'Suspicious User-Agent' },
            { when: () => true, score: 0, greenFlag: 'Valid User-Agent' },
        ],
    },
    {
        signal: 'fingerprintQuality',
        tiers: [
            {
                when: ({ findings }) => findings.fingerprint.quality === 'bad',
                score: 30,
                redFlag: 'Manipulated fingerprint',
                revokesGenuine: true,
            },
            { when: ({ findings }) => findings.fingerprint.quality === 'suspicious', score: 15, redFlag: 'Suspicious fingerprint' },
            { when: () => true, score: 0, greenFlag: 'Natural fingerprint' },
        ],
    },
    {
        signal: 'proxyRisk',
        tiers: [
            { when: ({ findings }) => findings.proxy.riskLevel === 'high', score: 20, redFlag: 'Proxy/VPN detected' },
            { when: ({ findings }) => findings.proxy.riskLevel === 'medium', score: 10, redFlag: 'Possible proxy/VPN' },
        ],
    },
    {
        signal: 'automation',
        tiers: [
            {
                when: ({ findings }) =>
                    findings.automation.confidence === 'very_high' || findings.automation.confidence === 'high',
                score: 25,
                redFlag: 'Automation detected',
                revokesGenuine: true,
            },
            { when: ({ findings }) => findings.automation.confidence === 'medium', score: 10, redFlag: 'Possible automation' },
        ],
    },
    {
        signal: 'consistencyFailures',
        tiers: [
            { when: ({ consistency }) => consistency.failed > 2, score: 15, redFlag: 'Multiple consistency failures' },
            { when: ({ consistency }) => consistency.failed > 0, score: 5 },
        ],
    },
    {
        signal: 'threatLevel',
        tiers: [
            {
                when: ({ findings }) => findings.threats.threatLevel === 'critical',
                score: 50,
                redFlag: 'Critical threat detected',
                revokesGenuine: true,
            },
            { when: ({ findings }) => findings.threats.threatLevel === 'high', score: 30, redFlag: 'High threat level' },
        ],
    },
    {
        signal: 'humanLikelihood',
        tiers: [
            {
                when: ({ findings }) => findings.advancedBehavioral.humanLikelihood === 'low',
                score: 20,
                redFlag: 'Bot-like behavior patterns',
            },
            {
                when: ({ findings }) => findings.advancedBehavioral.humanLikelihood === 'high',
                score: 0,
                greenFlag: 'Human-like behavior patterns',
            },
        ],
    },
    {
        signal: 'mouseBehavior',
        tiers: [
            {
                when: ({ findings }) => Boolean(findings.advancedBehavioral.mouse?.botIndicator),
                score: 10,
                redFlag: ({ findings }) => `Mouse: ${findings.advancedBehavioral.mouse?.botIndicator ?? ''}`,
            },
            {
                when: ({ findings }) => findings.advancedBehavioral.mouse?.hasHumanCurves === true,
                score: 0,
                greenFlag: 'Natural mouse movement curves',
            },
        ],
    },
    {
        signal: 'clickBehavior',
        tiers: [
            {
                when: ({ findings }) => Boolean(findings.advancedBehavioral.click?.botIndicator),
                score: 10,
                redFlag: ({ findings }) => `Click: ${findings.advancedBehavioral.click?.botIndicator ?? ''}`,
            },
        ],
    },
    {
        signal: 'virtualMachine',
        tiers: [
            { when: ({ findings }) => findings.virtualization.isLikelyVm, score: 15, redFlag: 'Running in virtual machine' },
        ],
    },
    {
        signal: 'timing',
        tiers: [
            {
                when: ({ findings }) => findings.timing.suspicionLevel === 'high',
                score: 15,
                redFlag: ({ findings }) => `Timing: ${findings.timing.reason ?? 'Too fast'}`,
            },
        ],
    },
    {
        signal: 'extensions',
        tiers: [
            {
                when: ({ findings }) => findings.extensions.privacyConcerned,
                score: 0,
                greenFlag: 'Privacy-aware (ad blocker detected)',
            },
        ],
    },
];
