import Redis from 'ioredis';
import RedisMock from 'ioredis-mock';
import { buildTestConfig } from '../../test/test-config';
import { CacheService } from '../cache/cache.service';
import { LocationClientService } from './location-client.service';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('LocationClientService', () => {
  let redis: Redis;
  let client: LocationClientService;
  let fetchSpy: jest.SpyInstance;

  beforeEach(async () => {
    redis = new RedisMock();
    await redis.flushall();
    const config = buildTestConfig();
    client = new LocationClientService(new CacheService(redis, config), config);
    fetchSpy = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('resolves loopback and unknown addresses locally without a lookup', async () => {
    expect(await client.resolve('127.0.0.1')).toBe('local');
    expect(await client.resolve('::1')).toBe('local');
    expect(await client.resolve('unknown')).toBe('local');
    expect(await client.resolve('')).toBe('local');
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('joins country, region and city and queries by ip', async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse({ success: true, info: { country: 'Japan', region: 'Tokyo', city: 'Shibuya' } }),
    );

    expect(await client.resolve('203.0.113.5')).toBe('Japan Tokyo Shibuya');

    const [url] = fetchSpy.mock.calls[0];
    expect(String(url)).toBe('http://location.test/api/IP?ip=203.0.113.5');
  });

  it('drops placeholder and repeated parts', async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse({ success: true, info: { country: '中国', region: '北京', city: '北京' } }),
    );
    expect(await client.resolve('203.0.113.6')).toBe('中国 北京');

    fetchSpy.mockResolvedValueOnce(jsonResponse({ success: true, info: { country: 'France', region: '未知', city: '' } }));
    expect(await client.resolve('203.0.113.7')).toBe('France');
  });

  it('serves repeated lookups from cache', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ success: true, info: { country: 'Japan', region: '', city: '' } }));

    await client.resolve('203.0.113.5');
    expect(await client.resolve('203.0.113.5')).toBe('Japan');
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('retries failures and gives up with unknown, which is not cached', async () => {
    fetchSpy
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce(jsonResponse({}, 503))
      .mockResolvedValueOnce(jsonResponse({ success: false }));

    expect(await client.resolve('203.0.113.8')).toBe('unknown');
    expect(fetchSpy).toHaveBeenCalledTimes(3);
    expect(await redis.exists('test:location:203.0.113.8')).toBe(0);
  });

  it('releases the body of a failed response before retrying', async () => {
    const failed = jsonResponse({ error: 'busy' }, 503);
    const body = failed.body;
    if (!body) {
      throw new Error('expected a response body');
    }
    const cancel = jest.spyOn(body, 'cancel');

    fetchSpy
      .mockResolvedValueOnce(failed)
      .mockResolvedValueOnce(jsonResponse({ success: true, info: { country: 'Chile' } }));

    expect(await client.resolve('203.0.113.10')).toBe('Chile');
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('succeeds on a later attempt', async () => {
    fetchSpy
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce(jsonResponse({ success: true, info: { country: 'Brazil' } }));

    expect(await client.resolve('203.0.113.9')).toBe('Brazil');
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });
});
