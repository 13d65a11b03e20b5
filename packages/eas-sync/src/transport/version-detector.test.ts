/**
 * Tests for the Version Detector
 */

import { ConnectionContext } from './connection-context';
import { VersionDetector, majorVersionOf, selectProtocolVersion } from './version-detector';

// Mock fetch globally
const mockFetch = jest.fn();
global.fetch = mockFetch;

const optionsResponse = (status: number, headers: Record<string, string> = {}): Response =>
  new Response(null, { status, headers });

describe('selectProtocolVersion', () => {
  it('should pick the best supported version', () => {
    expect(selectProtocolVersion('2.5,12.0,12.1,14.0,14.1')).toBe('14.1');
    expect(selectProtocolVersion('2.5, 12.0, 12.1')).toBe('12.1');
  });

  it('should return the highest advertised version when none is supported', () => {
    expect(selectProtocolVersion('2.0,2.5')).toBe('2.5');
    expect(selectProtocolVersion('16.0,16.1')).toBe('16.1');
  });

  it('should return null for an empty header', () => {
    expect(selectProtocolVersion(null)).toBeNull();
    expect(selectProtocolVersion(' , ')).toBeNull();
  });
});

describe('majorVersionOf', () => {
  it('should read the major component', () => {
    expect(majorVersionOf('14.1')).toBe(14);
    expect(majorVersionOf('2.5')).toBe(2);
    expect(majorVersionOf(null)).toBe(12);
    expect(majorVersionOf('abc')).toBe(0);
  });
});

describe('VersionDetector', () => {
  let context: ConnectionContext;
  let detector: VersionDetector;

  beforeEach(() => {
    mockFetch.mockReset();
    context = new ConnectionContext({
      serverUrl: 'https://mail.example.com',
      username: 'jdoe',
      password: 'test-secret',
      domain: '',
      deviceId: 'device0001',
    });
    detector = new VersionDetector(context);
  });

  it('should detect the version from the OPTIONS headers', async () => {
    mockFetch.mockResolvedValueOnce(
      optionsResponse(200, { 'MS-ASProtocolVersions': '2.5,12.0,12.1,14.0,14.1' })
    );

    expect(await detector.detect()).toEqual({ ok: true, data: '14.1' });
    expect(detector.isDetected()).toBe(true);
    expect(detector.majorVersion()).toBe(14);
    expect(detector.isExchange2007()).toBe(false);
    expect(context.protocolVersion).toBe('14.1');

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://mail.example.com/Microsoft-Server-ActiveSync');
    expect(init.method).toBe('OPTIONS');
    expect(init).not.toHaveProperty('dispatcher');
  });

  it('should send the OPTIONS request through the connection dispatcher', async () => {
    const trusting = new ConnectionContext({
      serverUrl: 'https://mail.example.com',
      username: 'jdoe',
      password: 'test-secret',
      domain: '',
      deviceId: 'device0001',
      acceptAllCertificates: true,
    });
    mockFetch.mockResolvedValueOnce(optionsResponse(200, { 'MS-ASProtocolVersions': '14.1' }));

    await new VersionDetector(trusting).detect();

    expect(mockFetch.mock.calls[0][1].dispatcher).toBe(trusting.fetchOptions.dispatcher);
  });

  it('should cache the detected version', async () => {
    mockFetch.mockResolvedValueOnce(optionsResponse(200, { 'MS-ASProtocolVersions': '12.0,12.1' }));

    await detector.detect();
    const second = await detector.detect();

    expect(second).toEqual({ ok: true, data: '12.1' });
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(detector.isExchange2007()).toBe(true);
  });

  it('should fall back to 12.0 on network errors', async () => {
    mockFetch.mockRejectedValueOnce(new Error('ENOTFOUND'));

    expect(await detector.detect()).toEqual({ ok: true, data: '12.0' });
    expect(detector.isDetected()).toBe(true);
  });

  it('should fall back to 12.0 without a version header', async () => {
    mockFetch.mockResolvedValueOnce(optionsResponse(200));
    expect(await detector.detect()).toEqual({ ok: true, data: '12.0' });
  });

  it('should fall back to 12.0 on server errors', async () => {
    mockFetch.mockResolvedValueOnce(optionsResponse(503));
    expect(await detector.detect()).toEqual({ ok: true, data: '12.0' });
  });

  it('should fall back to 12.0 when only NTLM is offered', async () => {
    mockFetch.mockResolvedValueOnce(optionsResponse(401, { 'WWW-Authenticate': 'Negotiate, NTLM' }));
    expect(await detector.detect()).toEqual({ ok: true, data: '12.0' });
  });

  it('should report rejected Basic credentials', async () => {
    mockFetch.mockResolvedValueOnce(optionsResponse(401, { 'WWW-Authenticate': 'Basic realm="mail"' }));

    const result = await detector.detect();

    expect(result).toMatchObject({ ok: false, error: { code: 'AUTH_FAILED', category: 'AUTH' } });
    expect(detector.isDetected()).toBe(false);
  });

  it('should report the fallback version before detection', () => {
    expect(detector.getVersion()).toBe('12.0');
    expect(detector.isDetected()).toBe(false);
  });
});
