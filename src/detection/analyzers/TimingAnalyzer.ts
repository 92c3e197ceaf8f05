import type { RequestContext, TimingFinding } from '../types/index.js';
import type { EvidenceAnalyzer } from './EvidenceAnalyzer.js';

/**
 * Flags interactions that happen faster than a person can react
 */
export class TimingAnalyzer implements EvidenceAnalyzer<'timing'> {
    readonly domain = 'timing';

    private static readonly MIN_FIRST_CLICK_MS = 100;
    private static readonly MIN_FIRST_INTERACTION_MS = 50;

    analyze(context: RequestContext): TimingFinding {
        const timing = context.fingerprint.advancedTiming;
        const finding: TimingFinding = {
            domain: 'timing',
            pageLoadTime: timing?.pageLoadTime ?? 0,
            timeToFirstInteraction: timing?.timeToFirstInteraction,
            timeToFirstClick: timing?.timeToFirstClick,
            timeToFirstScroll: timing?.timeToFirstScroll,
            suspicionLevel: 'none',
        };

        // zero means "not measured"
        const firstClick = timing?.timeToFirstClick;
        const firstInteraction = timing?.timeToFirstInteraction;

        if (firstClick && firstClick < TimingAnalyzer.MIN_FIRST_CLICK_MS) {
            finding.suspicionLevel = 'high';
            finding.reason = 'Clicked too fast (< 100ms)';
        } else if (firstInteraction && firstInteraction < TimingAnalyzer.MIN_FIRST_INTERACTION_MS) {
            finding.suspicionLevel = 'high';
            finding.reason = 'Interacted too fast';
        }

        return finding;
    }
}
