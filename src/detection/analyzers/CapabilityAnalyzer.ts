import type {
    ClientHintsFinding,
    MediaCapabilityFinding,
    RequestContext,
    SpeechSynthesisFinding,
} from '../types/index.js';
import type { EvidenceAnalyzer } from './EvidenceAnalyzer.js';

/**
 * Describes the CSS media features the client matched
 */
export class MediaCapabilityAnalyzer implements EvidenceAnalyzer<'mediaCapabilities'> {
    readonly domain = 'mediaCapabilities';

    analyze(context: RequestContext): MediaCapabilityFinding {
        const { fingerprint } = context;
        const features = fingerprint.cssMediaQueries ?? {};

        let pointerType: MediaCapabilityFinding['pointerType'] = 'none';
        if (features.pointer_fine) {
            pointerType = 'fine';
        } else if (features.pointer_coarse) {
            pointerType = 'coarse';
        }

        let colorGamut: MediaCapabilityFinding['colorGamut'] = 'unknown';
        if (features.color_gamut_p3) {
            colorGamut = 'p3';
        } else if (features.color_gamut_srgb) {
            colorGamut = 'srgb';
        }

        return {
            domain: 'mediaCapabilities',
            totalFeatures: fingerprint.cssMediaQueriesCount ?? 0,
            pointerType,
            hoverCapable: features.hover_hover === true,
            colorGamut,
            prefersDarkMode: features.prefers_color_scheme_dark === true,
            reducedMotion: features.prefers_reduced_motion === true,
            features,
        };
    }
}

/**
 * Describes the speech-synthesis voices the client exposes
 */
export class SpeechSynthesisAnalyzer implements EvidenceAnalyzer<'speechSynthesis'> {
    readonly domain = 'speechSynthesis';

    private static readonly HIGH_UNIQUENESS_VOICES = 10;

    analyze(context: RequestContext): SpeechSynthesisFinding {
        const fp = context.fingerprint;

        if (!fp.speechSynthesisSupport) {
            return { domain: 'speechSynthesis', supported: false };
        }

        const voicesCount = fp.speechVoicesCount ?? 0;
        return {
            domain: 'speechSynthesis',
            supported: true,
            voicesCount,
            voiceHash: fp.speechVoiceHash ?? '',
            hasVoices: voicesCount > 0,
            uniqueness: voicesCount > SpeechSynthesisAnalyzer.HIGH_UNIQUENESS_VOICES ? 'high' : 'low',
        };
    }
}

/**
 * Describes the User-Agent Client Hints the client reported
 */
export class ClientHintsAnalyzer implements EvidenceAnalyzer<'clientHints'> {
    readonly domain = 'clientHints';

    analyze(context: RequestContext): ClientHintsFinding {
        const { clientHints, clientHintsHighEntropy } = context.fingerprint;

        if (!clientHints) {
            return { domain: 'clientHints', supported: false };
        }

        const highEntropy = clientHintsHighEntropy ?? {};
        return {
            domain: 'clientHints',
            supported: true,
            mobile: clientHints.mobile,
            platform: clientHints.platform ?? 'unknown',
            brands: clientHints.brands,
            highEntropy,
            architecture: typeof highEntropy.architecture === 'string' ? highEntropy.architecture : undefined,
            bitness: typeof highEntropy.bitness === 'string' ? highEntropy.bitness : undefined,
        };
    }
}
