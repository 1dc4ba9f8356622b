import { Inject, Injectable, Logger } from '@nestjs/common';
import { CacheService } from '../cache/cache.service';
import { AppConfig, appConfig } from '../config/app.config';
import { UNKNOWN_IP, isLoopback } from '../utils/client-ip.util';

export const LOCAL_LOCATION = 'local';
export const UNKNOWN_LOCATION = 'unknown';

// Placeholder the geolocation provider puts in fields it cannot resolve.
const PROVIDER_UNKNOWN = '未知';

/**
 * Resolves an IP to a free-text location through the geolocation API.
 * Never throws: any failure resolves to "unknown".
 */
@Injectable()
export class LocationClientService {
  private readonly logger = new Logger(LocationClientService.name);
  private readonly settings: AppConfig['location'];

  constructor(
    private readonly cacheService: CacheService,
    @Inject(appConfig.KEY) config: AppConfig,
  ) {
    this.settings = config.location;
  }

  async resolve(ip: string | null | undefined): Promise<string> {
    const address = ip?.trim() ?? '';
    if (!address || address === UNKNOWN_IP || isLoopback(address)) {
      return LOCAL_LOCATION;
    }

    const cacheKey = `location:${address}`;
    const cached = await this.cacheService.get<string>(cacheKey);
    if (cached) {
      return cached;
    }

    const location = await this.fetchLocation(address);

    if (location !== UNKNOWN_LOCATION) {
      await this.cacheService.set(cacheKey, location, { ttl: this.settings.cacheTtl });
    }

    return location;
  }

  private async fetchLocation(ip: string): Promise<string> {
    const url = new URL(this.settings.apiUrl);
    url.searchParams.set('ip', ip);
    const attempts = Math.max(1, this.settings.attempts);

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const response = await fetch(url, { signal: AbortSignal.timeout(this.settings.timeoutMs) });

        if (response.ok) {
          const body: unknown = await response.json();
          return this.parseLocation(body);
        }

        await response.body?.cancel();
        this.logger.warn(`Location lookup failed with status ${response.status} (attempt ${attempt}/${attempts})`);
      } catch (error) {
        this.logger.warn(
          `Location lookup error (attempt ${attempt}/${attempts}): ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    return UNKNOWN_LOCATION;
  }

  /**
   * Expects `{ success: true, info: { country, region, city } }`.
   */
  private parseLocation(body: unknown): string {
    if (typeof body !== 'object' || body === null || !('success' in body) || body.success !== true) {
      return UNKNOWN_LOCATION;
    }
    if (!('info' in body) || typeof body.info !== 'object' || body.info === null) {
      return UNKNOWN_LOCATION;
    }

    const info: Record<string, unknown> = { ...body.info };
    const parts: string[] = [];
    for (const part of [info.country, info.region, info.city]) {
      const value = typeof part === 'string' ? part.trim() : '';
      if (!value || value === PROVIDER_UNKNOWN || value === parts[parts.length - 1]) {
        continue;
      }
      parts.push(value);
    }

    return parts.length > 0 ? parts.join(' ') : UNKNOWN_LOCATION;
  }
}
