import type { DetectionRules, Indicator, RequestContext, ScannerSignature, ThreatFinding, ThreatLevel } from '../types/index.js';
import { DEFAULT_DETECTION_CONFIG } from '../types/index.js';
import type { EvidenceAnalyzer } from './EvidenceAnalyzer.js';

/**
 * Flags known attack tooling and probing of sensitive resources
 */
export class ThreatAnalyzer implements EvidenceAnalyzer<'threats'> {
    readonly domain = 'threats';

    private readonly scannerSignatures: ScannerSignature[];
    private readonly sensitivePaths: string[];
    private readonly allowedMethods: Set<string>;

    constructor(rules: DetectionRules = DEFAULT_DETECTION_CONFIG.rules) {
        this.scannerSignatures = rules.scannerSignatures;
        this.sensitivePaths = rules.sensitivePaths.map(path => path.toLowerCase());
        this.allowedMethods = new Set(rules.allowedMethods.map(method => method.toUpperCase()));
    }

    analyze(context: RequestContext): ThreatFinding {
        const userAgent = context.userAgent.toLowerCase();
        const threatsDetected: Indicator[] = [];
        const riskFactors: Indicator[] = [];

        for (const signature of this.scannerSignatures) {
            if (userAgent.includes(signature.pattern.toLowerCase())) {
                threatsDetected.push({ message: signature.description, property: 'User-Agent', value: context.userAgent });
            }
        }

        const path = context.path.toLowerCase();
        if (this.sensitivePaths.some(fragment => path.includes(fragment))) {
            riskFactors.push({ message: `Accessing suspicious path: ${context.path}`, property: 'path', value: context.path });
        }

        if (!this.allowedMethods.has(context.method)) {
            riskFactors.push({ message: `Unusual HTTP method: ${context.method}`, property: 'method', value: context.method });
        }

        return {
            domain: 'threats',
            threatLevel: this.grade(threatsDetected.length, riskFactors.length),
            threatsDetected,
            riskFactors,
        };
    }

    private grade(threatCount: number, factorCount: number): ThreatLevel {
        if (threatCount > 0) {
            return 'critical';
        }
        if (factorCount > 2) {
            return 'high';
        }
        if (factorCount > 0) {
            return 'medium';
        }
        return 'none';
    }
}
