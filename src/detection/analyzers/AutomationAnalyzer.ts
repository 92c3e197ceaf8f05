import type { AutomationFinding, AutomationGlobal, ConfidenceLabel, Indicator, RequestContext } from '../types/index.js';
import type { EvidenceAnalyzer } from './EvidenceAnalyzer.js';

/**
 * Automation framework each window global is attributed to
 */
const GLOBAL_TOOLS: ReadonlyArray<readonly [AutomationGlobal, string]> = [
    ['__webdriver', 'Selenium'],
    ['__driver', 'WebDriver'],
    ['__selenium', 'Selenium'],
    ['__nightmare', 'Nightmare.js'],
    ['__phantomas', 'PhantomJS'],
    ['callPhantom', 'PhantomJS'],
    ['_phantom', 'PhantomJS'],
    ['domAutomation', 'Chrome Extension'],
    ['domAutomationController', 'Chrome Automation'],
];

/**
 * Detects browser automation frameworks and the tools behind them
 */
export class AutomationAnalyzer implements EvidenceAnalyzer<'automation'> {
    readonly domain = 'automation';

    analyze(context: RequestContext): AutomationFinding {
        const fp = context.fingerprint;
        const indicators: Indicator[] = [];
        const automationTypes: string[] = [];

        if (fp.webdriver) {
            indicators.push({ message: 'Navigator.webdriver = true', property: 'navigator.webdriver', value: 'true' });
            automationTypes.push('Selenium/WebDriver');
        }

        for (const [name, tool] of GLOBAL_TOOLS) {
            if (!fp.automationGlobals[name]) {
                continue;
            }
            indicators.push({ message: 'Automation property detected', property: `window.${name}`, value: 'true', tool });
            if (!automationTypes.includes(tool)) {
                automationTypes.push(tool);
            }
        }

        if (fp.chrome && !fp.chromeRuntime) {
            indicators.push({
                message: 'Chrome detected but chrome.runtime missing',
                property: 'window.chrome.runtime',
                value: 'undefined (suspicious)',
            });
        }

        if (fp.permissionsQueryUnavailable) {
            indicators.push({
                message: 'Permissions API blocked (common in automation)',
                property: 'navigator.permissions.query',
                value: 'unavailable',
            });
        }

        if (fp.notificationPermission === 'denied') {
            indicators.push({
                message: 'Notifications denied (automation default)',
                property: 'Notification.permission',
                value: 'denied',
            });
        }

        return {
            domain: 'automation',
            confidence: this.grade(indicators.length),
            automationTypes,
            indicators,
        };
    }

    private grade(indicatorCount: number): ConfidenceLabel {
        if (indicatorCount > 3) return 'very_high';
        if (indicatorCount > 1) return 'high';
        if (indicatorCount > 0) return 'medium';
        return 'low';
    }
}
