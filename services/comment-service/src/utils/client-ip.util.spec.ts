import { extractClientIp, isLoopback, isPrivateOrLoopback, normalizeIp } from './client-ip.util';

describe('client ip helpers', () => {
  it('unwraps IPv4-mapped addresses', () => {
    expect(normalizeIp('::ffff:203.0.113.5')).toBe('203.0.113.5');
    expect(normalizeIp(' 2001:db8::1 ')).toBe('2001:db8::1');
  });

  it('classifies private and loopback ranges', () => {
    expect(isPrivateOrLoopback('10.1.2.3')).toBe(true);
    expect(isPrivateOrLoopback('172.20.0.1')).toBe(true);
    expect(isPrivateOrLoopback('192.168.1.1')).toBe(true);
    expect(isPrivateOrLoopback('::1')).toBe(true);
    expect(isPrivateOrLoopback('fd00::1')).toBe(true);
    expect(isPrivateOrLoopback('203.0.113.5')).toBe(false);
  });

  it('recognises loopback addresses', () => {
    expect(isLoopback('127.0.0.1')).toBe(true);
    expect(isLoopback('::ffff:127.0.0.1')).toBe(true);
    expect(isLoopback('localhost')).toBe(true);
    expect(isLoopback('8.8.8.8')).toBe(false);
  });
});

describe('extractClientIp', () => {
  it('takes the first forwarded address when it is public', () => {
    expect(extractClientIp({ 'x-forwarded-for': '203.0.113.5, 10.0.0.1' }, '10.0.0.2')).toBe('203.0.113.5');
  });

  it('skips private proxy addresses and falls through the header list', () => {
    expect(extractClientIp({ 'x-forwarded-for': '10.0.0.1', 'x-real-ip': '198.51.100.20' }, '10.0.0.2')).toBe(
      '198.51.100.20',
    );
  });

  it('ignores malformed header values', () => {
    expect(extractClientIp({ 'x-forwarded-for': 'not-an-ip' }, '::ffff:198.51.100.7')).toBe('198.51.100.7');
  });

  it('falls back to the socket address, then to unknown', () => {
    expect(extractClientIp({}, '127.0.0.1')).toBe('127.0.0.1');
    expect(extractClientIp({})).toBe('unknown');
  });
});
