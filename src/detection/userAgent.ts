import UAParser from 'ua-parser-js';
import { isbot } from 'isbot';
import type { ParsedUserAgent } from './types/index.js';

const DESKTOP_OS_FAMILIES = new Set([
    'Windows',
    'Mac OS',
    'macOS',
    'Linux',
    'Ubuntu',
    'Debian',
    'Fedora',
    'Chromium OS',
    'Chrome OS',
]);

/**
 * Parses a user-agent string into browser, OS and device attributes.
 * Unknown families come back as "Other" and unknown versions as "".
 */
export function parseUserAgent(userAgent: string): ParsedUserAgent {
    const result = new UAParser(userAgent).getResult();

    const os = result.os.name ?? 'Other';
    const isMobile = result.device.type === 'mobile';
    const isTablet = result.device.type === 'tablet';
    const isBot = userAgent.length > 0 && isbot(userAgent);

    return {
        browser: result.browser.name ?? 'Other',
        browserVersion: result.browser.version ?? '',
        os,
        osVersion: result.os.version ?? '',
        device: result.device.model ?? 'Other',
        isMobile,
        isTablet,
        isPc: !isMobile && !isTablet && !isBot && DESKTOP_OS_FAMILIES.has(os),
        isBot,
    };
}
