import { EMPTY_FINGERPRINT, isTruthy, parseFingerprint } from '../src/detection/types/Fingerprint';
import { extractFingerprint } from '../src/detection/payload';

describe('parseFingerprint', () => {
  it('should mark a payload without keys as empty', () => {
    const fp = parseFingerprint({});

    expect(fp.isEmpty).toBe(true);
    expect(fp.webdriver).toBe(false);
    expect(fp.hasPageFocus).toBe(true);
    expect(fp.plugins).toBeUndefined();
    expect(fp.automationGlobals.__selenium).toBe(false);
  });

  it('should treat non-object payloads as empty', () => {
    expect(parseFingerprint('fingerprint').isEmpty).toBe(true);
    expect(parseFingerprint([{ webdriver: true }]).isEmpty).toBe(true);
    expect(parseFingerprint(null).isEmpty).toBe(true);
    expect(parseFingerprint([{ webdriver: true }]).webdriver).toBe(false);
  });

  it('should accept numeric strings and drop unusable numbers', () => {
    const fp = parseFingerprint({ plugins: '3', screen_width: true, screen_height: 'tall' });

    expect(fp.isEmpty).toBe(false);
    expect(fp.plugins).toBe(3);
    expect(fp.screenWidth).toBeUndefined();
    expect(fp.screenHeight).toBeUndefined();
  });

  it('should use truthiness for flags, with empty containers counting as false', () => {
    const fp = parseFingerprint({ webdriver: 'yes', headless: 0, chrome: [], chrome_runtime: {}, __nightmare: 1 });

    expect(fp.webdriver).toBe(true);
    expect(fp.headless).toBe(false);
    expect(fp.chrome).toBe(false);
    expect(fp.chromeRuntime).toBe(false);
    expect(fp.automationGlobals.__nightmare).toBe(true);
  });

  it('should default page focus to true only when the key is absent', () => {
    expect(parseFingerprint({ plugins: 1 }).hasPageFocus).toBe(true);
    expect(parseFingerprint({ has_page_focus: false }).hasPageFocus).toBe(false);
    expect(parseFingerprint({ has_page_focus: null }).hasPageFocus).toBe(false);
  });

  it('should drop wrong-typed lists and keep string entries of WebRTC addresses', () => {
    const fp = parseFingerprint({ languages: 'en-US', webrtc_ips: ['192.0.2.1', 7] });

    expect(fp.languages).toBeUndefined();
    expect(fp.webrtcIps).toEqual(['192.0.2.1']);
  });

  it('should render a numeric canvas value as text', () => {
    expect(parseFingerprint({ canvas: 12345 }).canvas).toBe('12345');
  });

  it('should only build nested sections from non-empty objects', () => {
    const fp = parseFingerprint({
      mouse_behavior: { average_velocity: '120.5', total_movements: 40 },
      click_behavior: {},
      scroll_behavior: 'lots',
    });

    expect(fp.mouseBehavior).toEqual({
      totalMovements: 40,
      averageVelocity: 120.5,
      maxVelocity: undefined,
      averageAcceleration: undefined,
      hasHumanCurves: false,
    });
    expect(fp.clickBehavior).toBeUndefined();
    expect(fp.scrollBehavior).toBeUndefined();
  });

  it('should split virtual machine probes into likelihood and boolean indicators', () => {
    const fp = parseFingerprint({
      vm_detection: { vm_likelihood: 'high', gpu_virtual: true, low_memory: false, renderer: 'SwiftShader' },
    });

    expect(fp.vmDetection).toEqual({
      likelihood: 'high',
      indicators: { gpu_virtual: true, low_memory: false },
    });
  });

  it('should pass a truthy TLS fingerprint through unchanged', () => {
    expect(parseFingerprint({ tls_fingerprint: { ja3: 'abc' } }).tlsFingerprint).toEqual({ ja3: 'abc' });
    expect(parseFingerprint({ tls_fingerprint: '' }).tlsFingerprint).toBeUndefined();
  });

  it('should expose a frozen empty fingerprint', () => {
    expect(Object.isFrozen(EMPTY_FINGERPRINT)).toBe(true);
    expect(EMPTY_FINGERPRINT.isEmpty).toBe(true);
  });
});

describe('isTruthy', () => {
  it('should follow JavaScript truthiness except for empty containers', () => {
    expect(isTruthy('x')).toBe(true);
    expect(isTruthy(0)).toBe(false);
    expect(isTruthy([])).toBe(false);
    expect(isTruthy({})).toBe(false);
    expect(isTruthy([0])).toBe(true);
  });
});

describe('extractFingerprint', () => {
  it('should return an empty fingerprint for a missing body or fingerprint', () => {
    expect(extractFingerprint(undefined)).toEqual({ fingerprint: expect.objectContaining({ isEmpty: true }) });
    expect(extractFingerprint({})).toEqual({ fingerprint: expect.objectContaining({ isEmpty: true }) });
  });

  it('should share the frozen empty fingerprint', () => {
    expect(extractFingerprint(null).fingerprint).toBe(EMPTY_FINGERPRINT);
    expect(extractFingerprint('text').fingerprint).toBe(EMPTY_FINGERPRINT);
  });

  it('should report bodies that are not objects', () => {
    const result = extractFingerprint([1, 2]);

    expect(result.malformedReason).toBe('Request body is not a JSON object');
    expect(result.fingerprint.isEmpty).toBe(true);
  });

  it('should report a fingerprint that is not an object', () => {
    const result = extractFingerprint({ fingerprint: 'abc' });

    expect(result.malformedReason).toBe('Fingerprint is not a JSON object');
    expect(result.fingerprint.isEmpty).toBe(true);
  });

  it('should parse a well-formed fingerprint', () => {
    const result = extractFingerprint({ fingerprint: { webdriver: true } });

    expect(result.malformedReason).toBeUndefined();
    expect(result.fingerprint.webdriver).toBe(true);
    expect(result.fingerprint.isEmpty).toBe(false);
  });
});
