import type { ExtensionsFinding, RequestContext, VirtualizationFinding } from '../types/index.js';
import type { EvidenceAnalyzer } from './EvidenceAnalyzer.js';

const LIKELY_VM = new Set(['high', 'medium']);

/**
 * Summarizes the client's own virtual-machine probe
 */
export class VirtualizationAnalyzer implements EvidenceAnalyzer<'virtualization'> {
    readonly domain = 'virtualization';

    analyze(context: RequestContext): VirtualizationFinding {
        const vm = context.fingerprint.vmDetection;
        const indicators = vm?.indicators ?? {};
        const vmLikelihood = vm?.likelihood ?? 'unknown';

        return {
            domain: 'virtualization',
            vmLikelihood,
            indicators,
            totalIndicators: Object.values(indicators).filter(Boolean).length,
            isLikelyVm: LIKELY_VM.has(vmLikelihood),
        };
    }
}

/**
 * Summarizes detected browser extensions
 */
export class ExtensionsAnalyzer implements EvidenceAnalyzer<'extensions'> {
    readonly domain = 'extensions';

    analyze(context: RequestContext): ExtensionsFinding {
        const extensions = context.fingerprint.browserExtensions;
        const flags = extensions?.flags ?? {};
        const adblockDetected = flags.adblock_detected === true;

        return {
            domain: 'extensions',
            totalDetected: extensions?.totalDetected ?? 0,
            adblockDetected,
            devtoolsDetected: flags.react_devtools === true || flags.vue_devtools === true,
            extensions: flags,
            privacyConcerned: adblockDetected || flags.privacy_badger === true,
        };
    }
}
