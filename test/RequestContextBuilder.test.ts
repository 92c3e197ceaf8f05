import {
  buildRequestContext,
  createHeaderSnapshot,
  resolveClientIp,
} from '../src/detection/RequestContextBuilder';
import { parseFingerprint } from '../src/detection/types/Fingerprint';
import { CHROME_WINDOWS_UA, FIXED_NOW, makeTransport } from './helpers/fixtures';

describe('RequestContextBuilder', () => {
  describe('createHeaderSnapshot', () => {
    it('should look headers up case-insensitively', () => {
      const headers = createHeaderSnapshot({ 'User-Agent': 'agent', ACCEPT: '*/*' });

      expect(headers.get('user-agent')).toBe('agent');
      expect(headers.get('Accept')).toBe('*/*');
      expect(headers.has('USER-AGENT')).toBe(true);
      expect(headers.size).toBe(2);
    });

    it('should join multi-valued headers and skip undefined values', () => {
      const headers = createHeaderSnapshot({
        'x-forwarded-for': ['1.2.3.4', '5.6.7.8'],
        'x-missing': undefined,
      });

      expect(headers.get('x-forwarded-for')).toBe('1.2.3.4, 5.6.7.8');
      expect(headers.has('x-missing')).toBe(false);
      expect(headers.entries()).toEqual([['x-forwarded-for', '1.2.3.4, 5.6.7.8']]);
    });

    it('should keep values verbatim', () => {
      const headers = createHeaderSnapshot({ Accept: '  Text/HTML ' });
      expect(headers.get('accept')).toBe('  Text/HTML ');
    });
  });

  describe('resolveClientIp', () => {
    it('should prefer the first X-Forwarded-For entry, trimmed', () => {
      const headers = createHeaderSnapshot({
        'X-Forwarded-For': ' 1.2.3.4 , 5.6.7.8',
        'X-Real-IP': '9.9.9.9',
      });
      expect(resolveClientIp(headers, '10.0.0.1')).toBe('1.2.3.4');
    });

    it('should fall back to X-Real-IP, then the peer, then unknown', () => {
      expect(resolveClientIp(createHeaderSnapshot({ 'X-Real-IP': '9.9.9.9' }), '10.0.0.1')).toBe('9.9.9.9');
      expect(resolveClientIp(createHeaderSnapshot({}), '10.0.0.1')).toBe('10.0.0.1');
      expect(resolveClientIp(createHeaderSnapshot({}), undefined)).toBe('unknown');
    });
  });

  describe('buildRequestContext', () => {
    it('should assemble an immutable context', () => {
      const fingerprint = parseFingerprint({ platform: 'Win32' });
      const context = buildRequestContext(
        makeTransport({ method: 'post', headers: { 'User-Agent': CHROME_WINDOWS_UA } }),
        fingerprint,
        FIXED_NOW,
      );

      expect(context.clientIp).toBe('203.0.113.10');
      expect(context.method).toBe('POST');
      expect(context.userAgent).toBe(CHROME_WINDOWS_UA);
      expect(context.receivedAt).toBe('2024-05-01T12:00:00.000Z');
      expect(context.fingerprint.platform).toBe('Win32');
      expect(Object.isFrozen(context)).toBe(true);
      expect(context.fingerprint).toBe(fingerprint);
      expect(Object.isFrozen(fingerprint)).toBe(false);
    });

    it('should parse the user agent', () => {
      const context = buildRequestContext(
        makeTransport({ headers: { 'User-Agent': CHROME_WINDOWS_UA } }),
        parseFingerprint({}),
      );

      expect(context.parsedUserAgent).toEqual(
        expect.objectContaining({
          browser: 'Chrome',
          os: 'Windows',
          isMobile: false,
          isTablet: false,
          isPc: true,
          isBot: false,
        }),
      );
    });

    it('should use an empty user agent when the header is absent', () => {
      const context = buildRequestContext(makeTransport({ headers: {} }), parseFingerprint({}));

      expect(context.userAgent).toBe('');
      expect(context.parsedUserAgent.browser).toBe('Other');
      expect(context.parsedUserAgent.isPc).toBe(false);
    });
  });
});
