/**
 * Provider Registry
 *
 * Holds the configured providers and runs one search against each of
 * them in registration order. Results are concatenated as returned;
 * nothing is deduplicated across providers.
 */

import { getProviderConfig, type ProviderConfig } from '../config';
import { createLogger, generateRequestId, type Logger } from '../logger';
import { UnsupportedSearchError } from './errors';
import { EztvProvider } from './eztv';
import { L337xProvider } from './l337x';
import type { TorrentProvider, TorrentResult } from './types';
import { YtsProvider } from './yts';

const logger = createLogger('ProviderRegistry');

export interface ProviderFailure {
  provider: string;
  message: string;
}

export interface AggregatedSearch {
  results: TorrentResult[];
  /** Providers whose search rejected, excluding unsupported media kinds */
  failures: ProviderFailure[];
}

export class ProviderRegistry {
  private readonly providers = new Map<string, TorrentProvider>();

  constructor(providers: TorrentProvider[] = []) {
    providers.forEach((provider) => this.register(provider));
  }

  /**
   * Add a provider
   *
   * @throws Error if a provider with the same name is already registered
   */
  register(provider: TorrentProvider): void {
    if (this.providers.has(provider.name)) {
      throw new Error(`Provider already registered: ${provider.name}`);
    }
    this.providers.set(provider.name, provider);
  }

  get(name: string): TorrentProvider | undefined {
    return this.providers.get(name);
  }

  get names(): string[] {
    return Array.from(this.providers.keys());
  }

  searchMovie(title: string, year: number): Promise<AggregatedSearch> {
    return this.aggregate('movie search', { title, year }, (provider) => provider.searchMovie(title, year));
  }

  searchSeries(title: string, season: number, episode: number): Promise<AggregatedSearch> {
    return this.aggregate('series search', { title, season, episode }, (provider) =>
      provider.searchSeries(title, season, episode)
    );
  }

  private async aggregate(
    operation: string,
    query: Record<string, unknown>,
    search: (provider: TorrentProvider) => Promise<TorrentResult[]>
  ): Promise<AggregatedSearch> {
    const log = logger.child({ requestId: generateRequestId() });
    const aggregated: AggregatedSearch = { results: [], failures: [] };

    for (const provider of this.providers.values()) {
      const results = await this.runProvider(log, provider, operation, query, search, aggregated.failures);
      aggregated.results.push(...results);
    }

    log.info(`Completed ${operation}`, {
      ...query,
      results: aggregated.results.length,
      failures: aggregated.failures.length,
    });
    return aggregated;
  }

  private async runProvider(
    log: Logger,
    provider: TorrentProvider,
    operation: string,
    query: Record<string, unknown>,
    search: (provider: TorrentProvider) => Promise<TorrentResult[]>,
    failures: ProviderFailure[]
  ): Promise<TorrentResult[]> {
    const endOperation = log.startOperation(`${provider.name} ${operation}`, query);
    try {
      const results = await search(provider);
      endOperation();
      return results;
    } catch (error) {
      if (error instanceof UnsupportedSearchError) {
        log.debug(`Skipping ${provider.name}`, { reason: error.message });
        return [];
      }
      log.error(`${provider.name} ${operation} failed`, error, query);
      const message = error instanceof Error ? error.message : String(error);
      failures.push({ provider: provider.name, message });
      return [];
    }
  }
}

/**
 * Registry with the bundled providers: YTS, EZTV, then 1337x
 */
export function createDefaultRegistry(config: ProviderConfig = getProviderConfig()): ProviderRegistry {
  const shared = { userAgent: config.userAgent, timeoutMs: config.timeoutMs };
  return new ProviderRegistry([
    new YtsProvider({ ...shared, baseUrl: config.baseUrls.yts }),
    new EztvProvider({ ...shared, baseUrl: config.baseUrls.eztv }),
    new L337xProvider({ ...shared, baseUrl: config.baseUrls.l337x }),
  ]);
}
