import type { DetectionRules, EvidenceDomain, Findings, RequestContext } from '../types/index.js';
import { DEFAULT_DETECTION_CONFIG } from '../types/index.js';
import type { EvidenceAnalyzer } from './EvidenceAnalyzer.js';
import { HeaderAnalyzer } from './HeaderAnalyzer.js';
import { UserAgentAnalyzer } from './UserAgentAnalyzer.js';
import { FingerprintIntegrityAnalyzer } from './FingerprintIntegrityAnalyzer.js';
import { ProxyAnalyzer } from './ProxyAnalyzer.js';
import { AutomationAnalyzer } from './AutomationAnalyzer.js';
import { ThreatAnalyzer } from './ThreatAnalyzer.js';
import { TransportAnalyzer } from './TransportAnalyzer.js';
import { AdvancedBehaviorAnalyzer, BehaviorAnalyzer } from './BehaviorAnalyzer.js';
import { ExtensionsAnalyzer, VirtualizationAnalyzer } from './EnvironmentAnalyzer.js';
import { TimingAnalyzer } from './TimingAnalyzer.js';
import { ClientHintsAnalyzer, MediaCapabilityAnalyzer, SpeechSynthesisAnalyzer } from './CapabilityAnalyzer.js';

export type { EvidenceAnalyzer } from './EvidenceAnalyzer.js';
export { HeaderAnalyzer } from './HeaderAnalyzer.js';
export { UserAgentAnalyzer } from './UserAgentAnalyzer.js';
export { FingerprintIntegrityAnalyzer } from './FingerprintIntegrityAnalyzer.js';
export { FORWARDING_HEADERS, ProxyAnalyzer } from './ProxyAnalyzer.js';
export { AutomationAnalyzer } from './AutomationAnalyzer.js';
export { ThreatAnalyzer } from './ThreatAnalyzer.js';
export { TransportAnalyzer } from './TransportAnalyzer.js';
export { AdvancedBehaviorAnalyzer, BehaviorAnalyzer } from './BehaviorAnalyzer.js';
export { ExtensionsAnalyzer, VirtualizationAnalyzer } from './EnvironmentAnalyzer.js';
export { TimingAnalyzer } from './TimingAnalyzer.js';
export { ClientHintsAnalyzer, MediaCapabilityAnalyzer, SpeechSynthesisAnalyzer } from './CapabilityAnalyzer.js';

/**
 * One analyzer per evidence domain
 */
export type EvidenceAnalyzerSet = { [D in EvidenceDomain]: EvidenceAnalyzer<D> };

/**
 * Creates the full analyzer set for a rule snapshot
 */
export function createEvidenceAnalyzers(rules: DetectionRules = DEFAULT_DETECTION_CONFIG.rules): EvidenceAnalyzerSet {
    return {
        headers: new HeaderAnalyzer(rules),
        userAgent: new UserAgentAnalyzer(rules),
        fingerprint: new FingerprintIntegrityAnalyzer(),
        proxy: new ProxyAnalyzer(),
        automation: new AutomationAnalyzer(),
        threats: new ThreatAnalyzer(rules),
        transport: new TransportAnalyzer(),
        behavioral: new BehaviorAnalyzer(),
        advancedBehavioral: new AdvancedBehaviorAnalyzer(),
        virtualization: new VirtualizationAnalyzer(),
        extensions: new ExtensionsAnalyzer(),
        timing: new TimingAnalyzer(),
        mediaCapabilities: new MediaCapabilityAnalyzer(),
        speechSynthesis: new SpeechSynthesisAnalyzer(),
        clientHints: new ClientHintsAnalyzer(),
    };
}

/**
 * Runs every analyzer against the same context. Analyzers are independent,
 * so the order here only fixes the key order of the result.
 */
export function runEvidenceAnalyzers(context: RequestContext, analyzers: EvidenceAnalyzerSet): Findings {
    return {
        headers: analyzers.headers.analyze(context),
        userAgent: analyzers.userAgent.analyze(context),
        fingerprint: analyzers.fingerprint.analyze(context),
        proxy: analyzers.proxy.analyze(context),
        automation: analyzers.automation.analyze(context),
        threats: analyzers.threats.analyze(context),
        transport: analyzers.transport.analyze(context),
        behavioral: analyzers.behavioral.analyze(context),
        advancedBehavioral: analyzers.advancedBehavioral.analyze(context),
        virtualization: analyzers.virtualization.analyze(context),
        extensions: analyzers.extensions.analyze(context),
        timing: analyzers.timing.analyze(context),
        mediaCapabilities: analyzers.mediaCapabilities.analyze(context),
        speechSynthesis: analyzers.speechSynthesis.analyze(context),
        clientHints: analyzers.clientHints.analyze(context),
    };
}
