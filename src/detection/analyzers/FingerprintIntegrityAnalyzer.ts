import type { AutomationGlobal, FingerprintFinding, Indicator, QualityLabel, RequestContext } from '../types/index.js';
import type { EvidenceAnalyzer } from './EvidenceAnalyzer.js';

/**
 * Window globals counted as manipulation of the fingerprint itself
 */
const ARTIFACT_GLOBALS: AutomationGlobal[] = [
    '__nightmare',
    '__phantomas',
    'callPhantom',
    '_phantom',
    '__selenium',
    '__webdriver',
    '__driver',
];

/**
 * Looks for signs that the client fingerprint was tampered with or is incomplete
 */
export class FingerprintIntegrityAnalyzer implements EvidenceAnalyzer<'fingerprint'> {
    readonly domain = 'fingerprint';

    private static readonly MIN_SCREEN_WIDTH = 800;
    private static readonly MIN_SCREEN_HEIGHT = 600;

    analyze(context: RequestContext): FingerprintFinding {
        const fp = context.fingerprint;

        if (fp.isEmpty) {
            return {
                domain: 'fingerprint',
                quality: 'bad',
                manipulationIndicators: [],
                inconsistencies: [{ message: 'No fingerprint data received', value: 'null' }],
            };
        }

        const manipulationIndicators: Indicator[] = [];
        const inconsistencies: Indicator[] = [];

        if (fp.webdriver) {
            manipulationIndicators.push({
                message: 'WebDriver detected (Selenium/Automation)',
                property: 'navigator.webdriver',
                value: 'true',
            });
        }

        if (fp.headless) {
            manipulationIndicators.push({ message: 'Headless browser detected', property: 'headless', value: 'true' });
        }

        const plugins = fp.plugins ?? 0;
        if (plugins === 0) {
            inconsistencies.push({
                message: 'No browser plugins (unusual for real browsers)',
                property: 'navigator.plugins.length',
                value: String(plugins),
            });
        }

        if (!fp.languages || fp.languages.length === 0) {
            inconsistencies.push({
                message: 'No languages detected',
                property: 'navigator.languages',
                value: JSON.stringify(fp.languages ?? []),
            });
        }

        if (!fp.canvas || fp.canvas === 'blocked') {
            manipulationIndicators.push({
                message: 'Canvas fingerprinting blocked or unavailable',
                property: 'canvas',
                value: fp.canvas || 'null',
            });
        }

        if (!fp.webglVendor || !fp.webglRenderer) {
            inconsistencies.push({
                message: 'WebGL information missing',
                property: 'webgl_vendor/renderer',
                value: `${fp.webglVendor || 'null'} / ${fp.webglRenderer || 'null'}`,
            });
        }

        const screenIssue = this.checkScreen(fp.screenWidth ?? 0, fp.screenHeight ?? 0);
        if (screenIssue) {
            inconsistencies.push(screenIssue);
        }

        if (!fp.timezone) {
            inconsistencies.push({ message: 'Timezone not detected', property: 'timezone', value: 'null' });
        }

        for (const name of ARTIFACT_GLOBALS) {
            if (fp.automationGlobals[name]) {
                manipulationIndicators.push({
                    message: 'Automation artifact detected',
                    property: `window.${name}`,
                    value: 'true',
                });
            }
        }

        return {
            domain: 'fingerprint',
            quality: this.grade(manipulationIndicators.length, inconsistencies.length),
            manipulationIndicators,
            inconsistencies,
        };
    }

    private checkScreen(width: number, height: number): Indicator | undefined {
        const property = 'screen.width x screen.height';
        const value = `${width} x ${height}`;

        if (width === 0 || height === 0) {
            return { message: 'Invalid screen dimensions', property, value };
        }
        if (width < FingerprintIntegrityAnalyzer.MIN_SCREEN_WIDTH || height < FingerprintIntegrityAnalyzer.MIN_SCREEN_HEIGHT) {
            return { message: 'Unusual screen resolution (too small)', property, value };
        }
        return undefined;
    }

    private grade(manipulationCount: number, inconsistencyCount: number): QualityLabel {
        if (manipulationCount > 0) {
            return 'bad';
        }
        if (inconsistencyCount > 3) {
            return 'suspicious';
        }
        if (inconsistencyCount > 0) {
            return 'acceptable';
        }
        return 'good';
    }
}
