import type { Indicator, ProxyFinding, ProxyRiskLevel, RequestContext } from '../types/index.js';
import type { EvidenceAnalyzer } from './EvidenceAnalyzer.js';

/**
 * Headers a proxy or CDN adds when it forwards a request
 */
export const FORWARDING_HEADERS = [
    'X-Forwarded-For',
    'X-Real-IP',
    'Via',
    'Forwarded',
    'X-Proxy-ID',
    'CF-Connecting-IP',
    'X-Forwarded-Proto',
];

/**
 * Detects proxy, VPN and anonymizer usage from forwarding headers, the
 * pre-computed IP classification and WebRTC leaks
 */
export class ProxyAnalyzer implements EvidenceAnalyzer<'proxy'> {
    readonly domain = 'proxy';

    analyze(context: RequestContext): ProxyFinding {
        const { headers, fingerprint, clientIp } = context;
        const indicators: Indicator[] = [];
        const proxyHeadersFound: string[] = [];
        let isProxyLikely = false;

        for (const name of FORWARDING_HEADERS) {
            if (headers.has(name)) {
                proxyHeadersFound.push(name);
                indicators.push({ message: 'Proxy header present', property: name, value: headers.get(name) ?? '' });
            }
        }

        const forwardedFor = headers.get('x-forwarded-for') ?? '';
        if (forwardedFor.includes(',')) {
            const hops = forwardedFor.split(',').length;
            indicators.push({
                message: 'Multiple IPs in proxy chain',
                property: 'X-Forwarded-For',
                value: `${hops} IPs: ${forwardedFor}`,
            });
            isProxyLikely = true;
        }

        if (headers.has('via')) {
            indicators.push({
                message: 'Via header indicates explicit proxy',
                property: 'Via',
                value: headers.get('via') ?? '',
            });
            isProxyLikely = true;
        }

        const { ipInfo } = fingerprint;
        if (ipInfo) {
            const value = `IP: ${clientIp}`;
            if (ipInfo.isDatacenter) {
                indicators.push({ message: 'IP from datacenter (hosting provider)', property: 'ip_info.is_datacenter', value });
            }
            if (ipInfo.isVpn) {
                indicators.push({ message: 'VPN detected', property: 'ip_info.is_vpn', value });
            }
            if (ipInfo.isProxy) {
                indicators.push({ message: 'Proxy detected', property: 'ip_info.is_proxy', value });
            }
            if (ipInfo.isTor) {
                indicators.push({ message: 'Tor exit node detected', property: 'ip_info.is_tor', value });
            }
        }

        const webrtcIps = fingerprint.webrtcIps ?? [];
        if (webrtcIps.length > 0 && !webrtcIps.includes(clientIp)) {
            indicators.push({
                message: 'WebRTC IP mismatch (possible VPN/proxy leak)',
                property: 'webrtc_ips',
                value: `Request IP: ${clientIp}, WebRTC IPs: ${webrtcIps.join(', ')}`,
            });
        }

        return {
            domain: 'proxy',
            riskLevel: this.grade(indicators.length, isProxyLikely),
            isProxyLikely,
            proxyHeadersFound,
            indicators,
        };
    }

    private grade(indicatorCount: number, isProxyLikely: boolean): ProxyRiskLevel {
        if (indicatorCount > 3 || isProxyLikely) {
            return 'high';
        }
        if (indicatorCount > 1) {
            return 'medium';
        }
        if (indicatorCount > 0) {
            return 'low';
        }
        return 'none';
    }
}
