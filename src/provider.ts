import type { DnsRecord, Zone } from './types.js';

/** Per-call options accepted by every provider method */
export interface CallOptions {
  /** Aborts the in-flight request; records already changed stay changed */
  signal?: AbortSignal;
}

/**
 * Interface for a DNS provider adapter.
 *
 * `domain` may be fully qualified (trailing dot). Record names are relative
 * to `domain`, with `@` for the apex.
 */
export interface DnsProvider {
  /** Get all DNS records of the zone that owns `domain` */
  getRecords(domain: string, options?: CallOptions): Promise<DnsRecord[]>;
  /** Create records; returns them as the provider stored them */
  appendRecords(
    domain: string,
    records: DnsRecord[],
    options?: CallOptions
  ): Promise<DnsRecord[]>;
  /** Create or update records matched by name and type */
  setRecords(
    domain: string,
    records: DnsRecord[],
    options?: CallOptions
  ): Promise<DnsRecord[]>;
  /** Delete records matched by name and type; absent records are ignored */
  deleteRecords(
    domain: string,
    records: DnsRecord[],
    options?: CallOptions
  ): Promise<DnsRecord[]>;
  /** List all zones accessible with the provider's credentials */
  listZones(options?: CallOptions): Promise<Zone[]>;
}
