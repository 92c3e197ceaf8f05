import { buildRequestContext } from '../../src/detection/RequestContextBuilder';
import { parseFingerprint } from '../../src/detection/types/Fingerprint';
import type { RequestContext, TransportInput } from '../../src/detection/types/index';

export const CHROME_WINDOWS_UA =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const SAFARI_MAC_UA =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15';

export const FIXED_NOW = new Date('2024-05-01T12:00:00.000Z');

/**
 * Headers a desktop Chrome sends on a top-level navigation
 */
export const BROWSER_HEADERS: Record<string, string> = {
  Host: 'shop.example.test',
  'User-Agent': CHROME_WINDOWS_UA,
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9',
  'Accept-Language': 'en-US,en;q=0.9',
  'Accept-Encoding': 'gzip, deflate, br',
  Connection: 'keep-alive',
  'Upgrade-Insecure-Requests': '1',
};

/**
 * Fingerprint of an ordinary desktop visitor; scores zero against BROWSER_HEADERS
 */
export const HUMAN_FINGERPRINT: Record<string, unknown> = {
  plugins: 5,
  languages: ['en-US', 'en'],
  language: 'en-US',
  canvas: 'c4nv4s-hash',
  webgl_vendor: 'Example Vendor',
  webgl_renderer: 'Example Renderer',
  screen_width: 1920,
  screen_height: 1080,
  timezone: 'Europe/Berlin',
  timezone_offset: -60,
  platform: 'Win32',
  hardware_concurrency: 8,
  chrome: true,
  chrome_runtime: true,
  has_mouse_movement: true,
  has_keyboard_input: true,
  has_scroll: true,
};

export function makeTransport(overrides: Partial<TransportInput> = {}): TransportInput {
  return {
    headers: { ...BROWSER_HEADERS },
    peerAddress: '203.0.113.10',
    method: 'POST',
    path: '/analyze',
    protocol: 'HTTP/1.1',
    port: 3000,
    isSecure: false,
    ...overrides,
  };
}

export interface ContextOptions {
  headers?: Record<string, string>;
  fingerprint?: Record<string, unknown>;
  transport?: Partial<TransportInput>;
}

/**
 * Builds a context from browser defaults, overriding only what a test cares about
 */
export function makeContext(options: ContextOptions = {}): RequestContext {
  const transport = makeTransport({
    ...options.transport,
    headers: options.headers ?? { ...BROWSER_HEADERS },
  });
  return buildRequestContext(transport, parseFingerprint(options.fingerprint ?? HUMAN_FINGERPRINT), FIXED_NOW);
}
