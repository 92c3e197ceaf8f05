import type { DetectionRules, Indicator, QualityLabel, RequestContext, UserAgentFinding } from '../types/index.js';
import { DEFAULT_DETECTION_CONFIG } from '../types/index.js';
import type { EvidenceAnalyzer } from './EvidenceAnalyzer.js';

/**
 * Grades the User-Agent string on its own merits
 */
export class UserAgentAnalyzer implements EvidenceAnalyzer<'userAgent'> {
    readonly domain = 'userAgent';

    private static readonly MIN_LENGTH = 50;
    private static readonly MAX_LENGTH = 500;
    private static readonly MAX_VERSION_SEPARATORS = 10;

    private readonly botKeywords: string[];
    private readonly browserTokens: string[];

    constructor(rules: DetectionRules = DEFAULT_DETECTION_CONFIG.rules) {
        this.botKeywords = rules.botKeywords.map(keyword => keyword.toLowerCase());
        this.browserTokens = rules.browserTokens.map(token => token.toLowerCase());
    }

    analyze(context: RequestContext): UserAgentFinding {
        const { userAgent } = context;

        if (!userAgent) {
            return {
                domain: 'userAgent',
                quality: 'bad',
                rawUserAgent: '',
                parsed: null,
                suspiciousPatterns: [{ message: 'Missing User-Agent', property: 'User-Agent', value: 'null' }],
            };
        }

        const lower = userAgent.toLowerCase();
        const suspiciousPatterns: Indicator[] = [];

        for (const keyword of this.botKeywords) {
            if (lower.includes(keyword)) {
                suspiciousPatterns.push({ message: `Bot keyword detected: ${keyword}`, value: userAgent });
            }
        }

        if (userAgent.length < UserAgentAnalyzer.MIN_LENGTH) {
            suspiciousPatterns.push({ message: 'User-Agent too short', value: String(userAgent.length) });
        } else if (userAgent.length > UserAgentAnalyzer.MAX_LENGTH) {
            suspiciousPatterns.push({ message: 'User-Agent abnormally long', value: String(userAgent.length) });
        }

        if (!this.browserTokens.some(token => lower.includes(token))) {
            suspiciousPatterns.push({ message: 'Missing common browser identifiers', value: userAgent });
        }

        const separators = userAgent.split('/').length - 1;
        if (separators > UserAgentAnalyzer.MAX_VERSION_SEPARATORS) {
            suspiciousPatterns.push({ message: 'Excessive version strings', value: String(separators) });
        }

        return {
            domain: 'userAgent',
            quality: this.grade(context.parsedUserAgent.isBot, suspiciousPatterns.length),
            rawUserAgent: userAgent,
            parsed: context.parsedUserAgent,
            suspiciousPatterns,
        };
    }

    private grade(isBot: boolean, patternCount: number): QualityLabel {
        if (isBot || patternCount > 2) {
            return 'bad';
        }
        if (patternCount > 0) {
            return 'suspicious';
        }
        return 'good';
    }
}
