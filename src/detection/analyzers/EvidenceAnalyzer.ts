import type { EvidenceDomain, Findings, RequestContext } from '../types/index.js';

/**
 * A stateless analyzer that turns one request context into the finding for
 * a single evidence domain
 */
export interface EvidenceAnalyzer<D extends EvidenceDomain = EvidenceDomain> {
    /** Domain whose finding this analyzer produces */
    readonly domain: D;
    /** Derives the finding; must not mutate the context */
    analyze(context: RequestContext): Findings[D];
}
