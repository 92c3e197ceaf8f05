/**
 * Ordered quality grade, best first
 */
export type QualityLabel = 'good' | 'acceptable' | 'suspicious' | 'bad';

/**
 * Ordered confidence grade for automation evidence
 */
export type ConfidenceLabel = 'low' | 'medium' | 'high' | 'very_high';

export type ProxyRiskLevel = 'none' | 'low' | 'medium' | 'high';

export type ThreatLevel = 'none' | 'medium' | 'high' | 'critical';

export type BehavioralScore = 'human_likely' | 'uncertain' | 'bot_likely';

export type HumanLikelihood = 'low' | 'medium' | 'high';

/**
 * A single piece of evidence behind a finding
 */
export interface Indicator {
    /** Human-readable description */
    message: string;
    /** Header or fingerprint property the evidence came from */
    property?: string;
    /** Observed value, rendered as text */
    value: string;
    /** Automation tool the evidence is attributed to */
    tool?: string;
}

export interface ParsedUserAgent {
    browser: string;
    browserVersion: string;
    os: string;
    osVersion: string;
    device: string;
    isMobile: boolean;
    isTablet: boolean;
    isPc: boolean;
    isBot: boolean;
}

export interface HeaderFinding {
    domain: 'headers';
    quality: QualityLabel;
    totalHeaders: number;
    missingStandardHeaders: string[];
    /** Forwarding headers that carried a value, keyed by canonical name */
    proxyHeaders: Record<string, string>;
    suspiciousPatterns: Indicator[];
}

export interface UserAgentFinding {
    domain: 'userAgent';
    quality: QualityLabel;
    rawUserAgent: string;
    /** Null when no user agent was sent */
    parsed: ParsedUserAgent | null;
    suspiciousPatterns: Indicator[];
}

export interface FingerprintFinding {
    domain: 'fingerprint';
    quality: QualityLabel;
    manipulationIndicators: Indicator[];
    inconsistencies: Indicator[];
}

export interface ProxyFinding {
    domain: 'proxy';
    riskLevel: ProxyRiskLevel;
    isProxyLikely: boolean;
    proxyHeadersFound: string[];
    indicators: Indicator[];
}

export interface AutomationFinding {
    domain: 'automation';
    confidence: ConfidenceLabel;
    automationTypes: string[];
    indicators: Indicator[];
}

export interface ThreatFinding {
    domain: 'threats';
    threatLevel: ThreatLevel;
    threatsDetected: Indicator[];
    riskFactors: Indicator[];
}

export interface TransportFinding {
    domain: 'transport';
    protocol: string;
    isSecure: boolean;
    cipherSuite: string;
    tlsVersion: string;
    /** Client-supplied transport fingerprint, passed through unchanged */
    clientFingerprint?: unknown;
}

export interface BehavioralFinding {
    domain: 'behavioral';
    mouseMovement: boolean;
    keyboardInput: boolean;
    touchSupport: boolean;
    pageFocus: boolean;
    scrollBehavior: boolean;
    behavioralScore: BehavioralScore;
}

export interface MouseBehaviorSummary {
    totalMovements: number;
    averageVelocity: number;
    maxVelocity: number;
    averageAcceleration: number;
    hasHumanCurves: boolean;
    quality: 'good' | 'suspicious';
    botIndicator?: string;
}

export interface ClickBehaviorSummary {
    totalClicks: number;
    averageInterval: number;
    rhythmVariance: number;
    quality: 'good' | 'suspicious';
    botIndicator?: string;
}

export interface ScrollBehaviorSummary {
    totalScrolls: number;
    averageVelocity: number;
    hasScrolled: boolean;
}

export interface KeyboardBehaviorSummary {
    averageDwellTime: number;
    averageFlightTime: number;
    typingRhythm: number;
    quality: 'good' | 'unknown';
}

export interface AdvancedBehavioralFinding {
    domain: 'advancedBehavioral';
    mouse?: MouseBehaviorSummary;
    click?: ClickBehaviorSummary;
    scroll?: ScrollBehaviorSummary;
    keyboard?: KeyboardBehaviorSummary;
    humanLikelihood: HumanLikelihood;
}

export interface VirtualizationFinding {
    domain: 'virtualization';
    vmLikelihood: string;
    indicators: Record<string, boolean>;
    totalIndicators: number;
    isLikelyVm: boolean;
}

export interface ExtensionsFinding {
    domain: 'extensions';
    totalDetected: number;
    adblockDetected: boolean;
    devtoolsDetected: boolean;
    extensions: Record<string, boolean>;
    privacyConcerned: boolean;
}

export interface TimingFinding {
    domain: 'timing';
    pageLoadTime: number;
    timeToFirstInteraction?: number;
    timeToFirstClick?: number;
    timeToFirstScroll?: number;
    suspicionLevel: 'none' | 'high';
    reason?: string;
}

export interface MediaCapabilityFinding {
    domain: 'mediaCapabilities';
    totalFeatures: number;
    pointerType: 'fine' | 'coarse' | 'none';
    hoverCapable: boolean;
    colorGamut: 'p3' | 'srgb' | 'unknown';
    prefersDarkMode: boolean;
    reducedMotion: boolean;
    features: Record<string, boolean>;
}

export interface SpeechSynthesisFinding {
    domain: 'speechSynthesis';
    supported: boolean;
    voicesCount?: number;
    voiceHash?: string;
    hasVoices?: boolean;
    uniqueness?: 'high' | 'low';
}

export interface ClientHintsFinding {
    domain: 'clientHints';
    supported: boolean;
    mobile?: boolean;
    platform?: string;
    brands?: unknown[];
    highEntropy?: Record<string, unknown>;
    architecture?: string;
    bitness?: string;
}

/**
 * One finding per evidence domain
 */
export interface Findings {
    headers: HeaderFinding;
    userAgent: UserAgentFinding;
    fingerprint: FingerprintFinding;
    proxy: ProxyFinding;
    automation: AutomationFinding;
    threats: ThreatFinding;
    transport: TransportFinding;
    behavioral: BehavioralFinding;
    advancedBehavioral: AdvancedBehavioralFinding;
    virtualization: VirtualizationFinding;
    extensions: ExtensionsFinding;
    timing: TimingFinding;
    mediaCapabilities: MediaCapabilityFinding;
    speechSynthesis: SpeechSynthesisFinding;
    clientHints: ClientHintsFinding;
}

export type EvidenceDomain = keyof Findings;
