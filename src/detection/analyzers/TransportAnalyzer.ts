import type { RequestContext, TransportFinding } from '../types/index.js';
import type { EvidenceAnalyzer } from './EvidenceAnalyzer.js';

const UNKNOWN = 'Unknown';

/**
 * Reports the negotiated transport properties; carries no grade
 */
export class TransportAnalyzer implements EvidenceAnalyzer<'transport'> {
    readonly domain = 'transport';

    analyze(context: RequestContext): TransportFinding {
        const finding: TransportFinding = {
            domain: 'transport',
            protocol: context.protocol || UNKNOWN,
            isSecure: context.isSecure,
            cipherSuite: context.cipherSuite || UNKNOWN,
            tlsVersion: context.tlsVersion || UNKNOWN,
        };

        if (context.fingerprint.tlsFingerprint !== undefined) {
            finding.clientFingerprint = context.fingerprint.tlsFingerprint;
        }

        return finding;
    }
}
