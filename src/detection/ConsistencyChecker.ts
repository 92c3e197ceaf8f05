import type { ConsistencyCheck, ConsistencyTally, RequestContext } from './types/index.js';

const MIN_TIMEZONE_OFFSET = -720;
const MAX_TIMEZONE_OFFSET = 840;
const MAX_PLAUSIBLE_CORES = 32;

function checkOs(platform: string, uaOs: string): ConsistencyCheck {
    const fpPlatform = platform.toLowerCase();
    const os = uaOs.toLowerCase();

    if (fpPlatform.includes('win') && !os.includes('windows')) {
        return {
            check: 'OS Consistency',
            status: 'failed',
            details: `Platform says ${fpPlatform} but UA says ${os}`,
        };
    }
    if (fpPlatform.includes('mac') && !os.includes('mac')) {
        return {
            check: 'OS Consistency',
            status: 'failed',
            details: `Platform mismatch: ${fpPlatform} vs ${os}`,
        };
    }
    return { check: 'OS Consistency', status: 'passed', details: 'OS matches between UA and fingerprint' };
}

function checkLanguage(language: string, acceptLanguage: string): ConsistencyCheck {
    const primary = language.split('-')[0].toLowerCase();

    if (!acceptLanguage.toLowerCase().includes(primary)) {
        return {
            check: 'Language Consistency',
            status: 'warning',
            details: `Language mismatch: FP=${language}, Header=${acceptLanguage}`,
        };
    }
    return { check: 'Language Consistency', status: 'passed', details: 'Languages match' };
}

function checkTimezone(offset: number): ConsistencyCheck {
    if (offset < MIN_TIMEZONE_OFFSET || offset > MAX_TIMEZONE_OFFSET) {
        return { check: 'Timezone Validation', status: 'failed', details: `Invalid timezone offset: ${offset}` };
    }
    return { check: 'Timezone Validation', status: 'passed', details: 'Valid timezone offset' };
}

function checkHardware(cores: number): ConsistencyCheck {
    if (cores === 0) {
        return { check: 'Hardware Concurrency', status: 'failed', details: 'No CPU cores reported' };
    }
    if (cores > MAX_PLAUSIBLE_CORES) {
        return { check: 'Hardware Concurrency', status: 'warning', details: `Unusual core count: ${cores}` };
    }
    return { check: 'Hardware Concurrency', status: 'passed', details: `${cores} cores detected` };
}

/**
 * Cross-checks the fingerprint against the headers and the parsed user agent.
 * Checks whose inputs are absent are skipped; the hardware check always runs.
 */
export function checkConsistency(context: RequestContext): ConsistencyTally {
    const { fingerprint, headers, parsedUserAgent } = context;
    const checks: ConsistencyCheck[] = [];

    if (fingerprint.platform) {
        checks.push(checkOs(fingerprint.platform, parsedUserAgent.os));
    }

    const acceptLanguage = headers.get('accept-language') ?? '';
    if (fingerprint.language && acceptLanguage) {
        checks.push(checkLanguage(fingerprint.language, acceptLanguage));
    }

    if (fingerprint.timezoneOffset !== undefined) {
        checks.push(checkTimezone(fingerprint.timezoneOffset));
    }

    checks.push(checkHardware(fingerprint.hardwareConcurrency ?? 0));

    return {
        checks,
        passed: checks.filter(c => c.status === 'passed').length,
        failed: checks.filter(c => c.status === 'failed').length,
        warnings: checks.filter(c => c.status === 'warning').length,
    };
}
