import type { IncomingHttpHeaders } from 'http';
import type { Fingerprint } from './Fingerprint.js';
import type { ParsedUserAgent } from './Findings.js';

/**
 * What the transport layer hands to the pipeline for one request
 */
export interface TransportInput {
    /** Raw header object as Node exposes it */
    headers: IncomingHttpHeaders | Record<string, string | string[] | undefined>;
    /** Address of the connected peer */
    peerAddress?: string;
    method: string;
    path: string;
    /** e.g. HTTP/1.1 */
    protocol: string;
    port?: number;
    isSecure: boolean;
    /** Negotiated cipher name, TLS sockets only */
    cipherSuite?: string;
    /** Negotiated protocol version, TLS sockets only */
    tlsVersion?: string;
}

/**
 * Case-insensitive, read-only view of the request headers
 */
export interface HeaderSnapshot {
    readonly size: number;
    get(name: string): string | undefined;
    has(name: string): boolean;
    /** Lower-cased names with their verbatim values, in arrival order */
    entries(): ReadonlyArray<readonly [string, string]>;
}

/**
 * Immutable per-request input shared by every analyzer
 */
export interface RequestContext {
    readonly clientIp: string;
    readonly headers: HeaderSnapshot;
    readonly userAgent: string;
    readonly parsedUserAgent: ParsedUserAgent;
    readonly fingerprint: Readonly<Fingerprint>;
    readonly method: string;
    readonly path: string;
    readonly protocol: string;
    readonly port?: number;
    readonly isSecure: boolean;
    readonly cipherSuite?: string;
    readonly tlsVersion?: string;
    /** ISO timestamp, echoed in the report only */
    readonly receivedAt: string;
}
