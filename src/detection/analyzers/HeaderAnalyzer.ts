import type { DetectionRules, HeaderFinding, Indicator, QualityLabel, RequestContext } from '../types/index.js';
import { DEFAULT_DETECTION_CONFIG } from '../types/index.js';
import type { EvidenceAnalyzer } from './EvidenceAnalyzer.js';
import { FORWARDING_HEADERS } from './ProxyAnalyzer.js';

/**
 * Grades the request headers against what a mainstream browser sends
 */
export class HeaderAnalyzer implements EvidenceAnalyzer<'headers'> {
    readonly domain = 'headers';

    private static readonly MIN_HEADER_COUNT = 5;

    private readonly standardHeaders: string[];
    private readonly automationSignatures: string[];

    constructor(rules: DetectionRules = DEFAULT_DETECTION_CONFIG.rules) {
        this.standardHeaders = rules.standardHeaders;
        this.automationSignatures = rules.automationHeaderSignatures;
    }

    /**
     * Produces the header finding for a request
     */
    analyze(context: RequestContext): HeaderFinding {
        const { headers } = context;

        const missingStandardHeaders = this.standardHeaders.filter(name => !headers.has(name));

        const proxyHeaders: Record<string, string> = {};
        for (const name of FORWARDING_HEADERS) {
            const value = headers.get(name);
            if (value) {
                proxyHeaders[name] = value;
            }
        }

        const suspiciousPatterns = this.findSuspiciousPatterns(context);

        return {
            domain: 'headers',
            quality: this.grade(suspiciousPatterns.length, missingStandardHeaders.length),
            totalHeaders: headers.size,
            missingStandardHeaders,
            proxyHeaders,
            suspiciousPatterns,
        };
    }

    private findSuspiciousPatterns(context: RequestContext): Indicator[] {
        const { headers } = context;
        const patterns: Indicator[] = [];

        if (headers.size < HeaderAnalyzer.MIN_HEADER_COUNT) {
            patterns.push({ message: 'Too few headers (possible bot)', value: String(headers.size) });
        }

        const accept = headers.get('accept');
        if (accept === '*/*') {
            patterns.push({ message: 'Generic Accept header (typical of bots)', property: 'Accept', value: accept });
        } else if (!accept) {
            patterns.push({ message: 'Missing Accept header', property: 'Accept', value: 'null' });
        }

        if (!headers.get('accept-language')) {
            patterns.push({ message: 'Missing Accept-Language header', property: 'Accept-Language', value: 'null' });
        }

        for (const signature of this.automationSignatures) {
            const needle = signature.toLowerCase();
            for (const [name, value] of headers.entries()) {
                if (value.toLowerCase().includes(needle)) {
                    patterns.push({ message: `Automation signature: ${signature}`, property: name, value });
                }
            }
        }

        return patterns;
    }

    private grade(patternCount: number, missingCount: number): QualityLabel {
        if (patternCount > 2 || missingCount > 3) {
            return 'bad';
        }
        if (patternCount > 0 || missingCount > 1) {
            return 'suspicious';
        }
        return 'good';
    }
}
