import { createBunnyClient } from '../client.js';
import { resolveOptions, type BunnyOptions } from '../config.js';
import { unFqdn } from '../domain.js';
import { withApplied } from '../errors.js';
import { createChildLogger, createLogger } from '../logger.js';
import type { CallOptions, DnsProvider } from '../provider.js';
import { createReconciler } from '../reconcile.js';
import { createRecordRepository } from '../repository.js';
import { recordData, type DnsRecord, type Zone } from '../types.js';
import { createZoneResolver } from '../zone-resolver.js';

export type { BunnyOptions };

export type BunnyProvider = DnsProvider;

function describeRecords(records: DnsRecord[]) {
  return records.map((r) => `${r.name} ${r.ttl} ${r.type} ${recordData(r)}`);
}

/**
 * Create a Bunny.net DNS provider adapter.
 *
 * Uses the Bunny API with native `fetch` (Node 20+). The zone owning a
 * requested domain is looked up on first use and remembered for the lifetime
 * of the adapter; subdomains without a zone of their own are handled as
 * prefixed names inside their parent zone.
 */
export function bunny(options: BunnyOptions): BunnyProvider {
  const config = resolveOptions(options);
  const logger = config.logger ?? createLogger(config.debug);

  const client = createBunnyClient({
    accessKey: config.accessKey,
    baseUrl: config.baseUrl,
    logger: createChildLogger(logger, { module: 'client' }),
  });
  const zones = createZoneResolver(
    client,
    createChildLogger(logger, { module: 'zone-resolver' })
  );
  const repository = createRecordRepository(client);
  const reconciler = createReconciler(
    repository,
    createChildLogger(logger, { module: 'reconcile' })
  );

  return {
    async getRecords(domain: string, opts: CallOptions = {}) {
      const zone = await zones.resolve(unFqdn(domain), opts.signal);
      const records = await repository.list(zone, opts.signal);
      logger.debug(
        { domain, records: describeRecords(records) },
        'getRecords'
      );
      return records;
    },

    async appendRecords(
      domain: string,
      records: DnsRecord[],
      opts: CallOptions = {}
    ) {
      logger.debug(
        { domain, records: describeRecords(records) },
        'appendRecords'
      );
      const zone = await zones.resolve(unFqdn(domain), opts.signal);

      const appended: DnsRecord[] = [];
      for (const record of records) {
        try {
          appended.push(await repository.create(zone, record, opts.signal));
        } catch (err) {
          throw withApplied(err, appended);
        }
      }
      return appended;
    },

    async setRecords(
      domain: string,
      records: DnsRecord[],
      opts: CallOptions = {}
    ) {
      logger.debug({ domain, records: describeRecords(records) }, 'setRecords');
      const zone = await zones.resolve(unFqdn(domain), opts.signal);

      const set: DnsRecord[] = [];
      for (const record of records) {
        try {
          set.push(await reconciler.createOrUpdate(zone, record, opts.signal));
        } catch (err) {
          throw withApplied(err, set);
        }
      }
      return set;
    },

    async deleteRecords(
      domain: string,
      records: DnsRecord[],
      opts: CallOptions = {}
    ) {
      logger.debug(
        { domain, records: describeRecords(records) },
        'deleteRecords'
      );
      const zone = await zones.resolve(unFqdn(domain), opts.signal);

      const deleted: DnsRecord[] = [];
      for (const record of records) {
        try {
          await reconciler.deleteByContent(zone, record, opts.signal);
        } catch (err) {
          throw withApplied(err, deleted);
        }
        deleted.push(record);
      }
      return deleted;
    },

    async listZones(opts: CallOptions = {}): Promise<Zone[]> {
      const bunnyZones = await client.listZones(opts.signal);
      return bunnyZones.map((z) => ({ name: z.domain }));
    },
  };
}
