import type { Fingerprint, HeaderSnapshot, RequestContext, TransportInput } from './types/index.js';
import { parseUserAgent } from './userAgent.js';

/**
 * Normalizes a raw header object: lower-cased names, arrays joined with ", "
 */
function normalizeHeaders(headers: TransportInput['headers']): Array<[string, string]> {
    const normalized: Array<[string, string]> = [];

    for (const [key, value] of Object.entries(headers)) {
        if (typeof value === 'string') {
            normalized.push([key.toLowerCase(), value]);
        } else if (Array.isArray(value)) {
            normalized.push([key.toLowerCase(), value.join(', ')]);
        }
    }

    return normalized;
}

/**
 * Creates an immutable, case-insensitive header snapshot
 */
export function createHeaderSnapshot(headers: TransportInput['headers']): HeaderSnapshot {
    const entries = normalizeHeaders(headers);
    const byName = new Map<string, string>();

    for (const [name, value] of entries) {
        // first occurrence wins when two keys differ only in case
        if (!byName.has(name)) {
            byName.set(name, value);
        }
    }

    const frozen = Object.freeze(
        Array.from(byName.entries()).map(([name, value]) => Object.freeze([name, value] as const)),
    );

    return Object.freeze({
        size: byName.size,
        get: (name: string) => byName.get(name.toLowerCase()),
        has: (name: string) => byName.has(name.toLowerCase()),
        entries: () => frozen,
    });
}

/**
 * Resolves the client address: leftmost X-Forwarded-For value, then
 * X-Real-IP, then the transport peer. The forwarded values are trusted as-is
 * and can be spoofed by any client that talks to the service directly.
 */
export function resolveClientIp(headers: HeaderSnapshot, peerAddress?: string): string {
    const forwardedFor = headers.get('x-forwarded-for');
    if (forwardedFor) {
        return forwardedFor.split(',')[0].trim();
    }

    const realIp = headers.get('x-real-ip');
    if (realIp) {
        return realIp;
    }

    return peerAddress || 'unknown';
}

/**
 * Builds the per-request context every analyzer reads from
 */
export function buildRequestContext(
    transport: TransportInput,
    fingerprint: Readonly<Fingerprint>,
    now: Date = new Date(),
): RequestContext {
    const headers = createHeaderSnapshot(transport.headers);
    const userAgent = headers.get('user-agent') ?? '';

    return Object.freeze({
        clientIp: resolveClientIp(headers, transport.peerAddress),
        headers,
        userAgent,
        parsedUserAgent: Object.freeze(parseUserAgent(userAgent)),
        fingerprint,
        method: transport.method.toUpperCase(),
        path: transport.path,
        protocol: transport.protocol,
        port: transport.port,
        isSecure: transport.isSecure,
        cipherSuite: transport.cipherSuite,
        tlsVersion: transport.tlsVersion,
        receivedAt: now.toISOString(),
    });
}
