import { EMPTY_FINGERPRINT, isPlainObject, parseFingerprint, type Fingerprint } from './types/Fingerprint.js';

export interface FingerprintExtraction {
    fingerprint: Readonly<Fingerprint>;
    /** Why the payload was replaced by an empty fingerprint, when it was */
    malformedReason?: string;
}

/**
 * Pulls the fingerprint out of a request body of the form `{ fingerprint }`.
 * A missing body or missing fingerprint is an ordinary empty fingerprint; a
 * body or fingerprint of the wrong shape is reported as malformed.
 */
export function extractFingerprint(body: unknown): FingerprintExtraction {
    if (body === undefined || body === null) {
        return { fingerprint: EMPTY_FINGERPRINT };
    }
    if (!isPlainObject(body)) {
        return { fingerprint: EMPTY_FINGERPRINT, malformedReason: 'Request body is not a JSON object' };
    }

    const raw = body.fingerprint;
    if (raw === undefined || raw === null) {
        return { fingerprint: EMPTY_FINGERPRINT };
    }
    if (!isPlainObject(raw)) {
        return { fingerprint: EMPTY_FINGERPRINT, malformedReason: 'Fingerprint is not a JSON object' };
    }

    return { fingerprint: parseFingerprint(raw) };
}
