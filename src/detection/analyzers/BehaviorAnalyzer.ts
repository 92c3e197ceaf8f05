import type {
    AdvancedBehavioralFinding,
    BehavioralFinding,
    BehavioralScore,
    ClickBehaviorSummary,
    HumanLikelihood,
    KeyboardBehaviorSummary,
    MouseBehaviorSummary,
    RequestContext,
    ScrollBehaviorSummary,
} from '../types/index.js';
import type {
    ClickBehaviorData,
    KeyboardBehaviorData,
    MouseBehaviorData,
    ScrollBehaviorData,
} from '../types/Fingerprint.js';
import type { EvidenceAnalyzer } from './EvidenceAnalyzer.js';

/**
 * Scores the coarse interaction flags collected by the page
 */
export class BehaviorAnalyzer implements EvidenceAnalyzer<'behavioral'> {
    readonly domain = 'behavioral';

    analyze(context: RequestContext): BehavioralFinding {
        const fp = context.fingerprint;

        // touch support is reported but does not count towards the score
        const positiveSignals = [fp.hasMouseMovement, fp.hasKeyboardInput, fp.hasPageFocus, fp.hasScroll]
            .filter(Boolean).length;

        return {
            domain: 'behavioral',
            mouseMovement: fp.hasMouseMovement,
            keyboardInput: fp.hasKeyboardInput,
            touchSupport: fp.touchSupport,
            pageFocus: fp.hasPageFocus,
            scrollBehavior: fp.hasScroll,
            behavioralScore: this.score(positiveSignals),
        };
    }

    private score(positiveSignals: number): BehavioralScore {
        if (positiveSignals >= 3) {
            return 'human_likely';
        }
        if (positiveSignals >= 2) {
            return 'uncertain';
        }
        return 'bot_likely';
    }
}

/**
 * Weighs detailed mouse, click, scroll and keyboard statistics
 */
export class AdvancedBehaviorAnalyzer implements EvidenceAnalyzer<'advancedBehavioral'> {
    readonly domain = 'advancedBehavioral';

    private static readonly MAX_HUMAN_VELOCITY = 3000;
    private static readonly HUMAN_CLICK_VARIANCE = 100;
    private static readonly BOT_CLICK_VARIANCE = 50;

    analyze(context: RequestContext): AdvancedBehavioralFinding {
        const fp = context.fingerprint;

        const mouse = fp.mouseBehavior && this.summarizeMouse(fp.mouseBehavior);
        const click = fp.clickBehavior && this.summarizeClicks(fp.clickBehavior);
        const scroll = fp.scrollBehavior && this.summarizeScroll(fp.scrollBehavior);
        const keyboard = fp.keyboardBehavior && this.summarizeKeyboard(fp.keyboardBehavior);

        let human = 0;
        let bot = 0;

        if (mouse?.hasHumanCurves) human += 2;
        if (mouse?.botIndicator) bot += 2;
        if (click && click.rhythmVariance > AdvancedBehaviorAnalyzer.HUMAN_CLICK_VARIANCE) human += 1;
        if (click?.botIndicator) bot += 2;

        let humanLikelihood: HumanLikelihood = 'medium';
        if (human > bot) {
            humanLikelihood = 'high';
        } else if (bot > human) {
            humanLikelihood = 'low';
        }

        return {
            domain: 'advancedBehavioral',
            mouse,
            click,
            scroll,
            keyboard,
            humanLikelihood,
        };
    }

    private summarizeMouse(data: MouseBehaviorData): MouseBehaviorSummary {
        const averageVelocity = data.averageVelocity ?? 0;
        const summary: MouseBehaviorSummary = {
            totalMovements: data.totalMovements ?? 0,
            averageVelocity,
            maxVelocity: data.maxVelocity ?? 0,
            averageAcceleration: data.averageAcceleration ?? 0,
            hasHumanCurves: data.hasHumanCurves,
            quality: data.hasHumanCurves ? 'good' : 'suspicious',
        };

        if (averageVelocity > AdvancedBehaviorAnalyzer.MAX_HUMAN_VELOCITY) {
            summary.botIndicator = 'Abnormally high velocity';
        } else if (averageVelocity === 0) {
            summary.botIndicator = 'No mouse movement';
        }

        return summary;
    }

    private summarizeClicks(data: ClickBehaviorData): ClickBehaviorSummary {
        const rhythmVariance = data.clickRhythmVariance ?? 0;
        const summary: ClickBehaviorSummary = {
            totalClicks: data.totalClicks ?? 0,
            averageInterval: data.averageClickInterval ?? 0,
            rhythmVariance,
            quality: rhythmVariance > AdvancedBehaviorAnalyzer.HUMAN_CLICK_VARIANCE ? 'good' : 'suspicious',
        };

        if (rhythmVariance < AdvancedBehaviorAnalyzer.BOT_CLICK_VARIANCE) {
            summary.botIndicator = 'Too consistent (bot-like)';
        }

        return summary;
    }

    private summarizeScroll(data: ScrollBehaviorData): ScrollBehaviorSummary {
        return {
            totalScrolls: data.totalScrolls ?? 0,
            averageVelocity: data.averageScrollVelocity ?? 0,
            hasScrolled: data.hasScrolled,
        };
    }

    private summarizeKeyboard(data: KeyboardBehaviorData): KeyboardBehaviorSummary {
        const typingRhythm = data.typingRhythm ?? 0;
        return {
            averageDwellTime: data.averageDwellTime ?? 0,
            averageFlightTime: data.averageFlightTime ?? 0,
            typingRhythm,
            quality: typingRhythm > 0 ? 'good' : 'unknown',
        };
    }
}
