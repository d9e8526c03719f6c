import type { BunnyClient } from './client.js';
import type { ResolvedZone } from './codec.js';
import { apexCandidates, nameBaseOf, searchTerm } from './domain.js';
import { BunnyError } from './errors.js';
import type { Logger } from './logger.js';

export interface ZoneResolver {
  /**
   * Find the zone owning `domain` (trailing dot already stripped).
   * Resolutions are cached per exact `domain` for the resolver's lifetime.
   */
  resolve(domain: string, signal?: AbortSignal): Promise<ResolvedZone>;
}

/**
 * Bunny can only search zones by substring, and a subdomain is not a zone of
 * its own unless it was registered as one. The resolver searches once with
 * the registrable part of the domain, then walks the candidate apexes from
 * most to least specific so that a zone for `sub.example.com` wins over one
 * for `example.com`.
 */
export function createZoneResolver(
  client: BunnyClient,
  logger: Logger
): ZoneResolver {
  // In-flight lookups are cached too, so concurrent callers share one request.
  // The entry remembers whose signal the request runs under.
  interface CacheEntry {
    zone: Promise<ResolvedZone>;
    signal: AbortSignal | undefined;
  }
  const cache = new Map<string, CacheEntry>();

  async function lookup(
    domain: string,
    signal: AbortSignal | undefined
  ): Promise<ResolvedZone> {
    const zones = await client.searchZones(searchTerm(domain), signal);

    for (const candidate of apexCandidates(domain)) {
      const wanted = candidate.toLowerCase();
      const zone = zones.find((z) => z.domain.toLowerCase() === wanted);
      if (zone) {
        const resolved = { ...zone, nameBase: nameBaseOf(domain, zone.domain) };
        logger.debug(
          { domain, zoneId: resolved.id, nameBase: resolved.nameBase },
          'zone resolved'
        );
        return resolved;
      }
    }

    throw new BunnyError('NotFound', `Bunny: no zone found for domain "${domain}"`);
  }

  function start(
    domain: string,
    signal: AbortSignal | undefined
  ): Promise<ResolvedZone> {
    const entry: CacheEntry = {
      signal,
      zone: lookup(domain, signal).catch((err: unknown) => {
        if (cache.get(domain) === entry) cache.delete(domain);
        throw err;
      }),
    };
    cache.set(domain, entry);
    return entry.zone;
  }

  function resolve(
    domain: string,
    signal?: AbortSignal
  ): Promise<ResolvedZone> {
    if (!domain) {
      return Promise.reject(
        new BunnyError('InvalidArgument', 'Bunny: domain is required')
      );
    }

    const cached = cache.get(domain);
    if (!cached) {
      return start(domain, signal);
    }

    logger.debug({ domain }, 'zone cache hit');
    return cached.zone.catch((err: unknown) => {
      // Another caller cancelled the shared lookup: look up again under our own signal.
      if (cached.signal?.aborted && !signal?.aborted) {
        logger.debug({ domain }, 'shared zone lookup aborted, retrying');
        return resolve(domain, signal);
      }
      throw err;
    });
  }

  return { resolve };
}
