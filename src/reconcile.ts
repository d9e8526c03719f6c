import type { BunnyRecord, BunnyRecordInput } from './client.js';
import { toBunnyRecord, type ResolvedZone } from './codec.js';
import { BunnyError } from './errors.js';
import type { Logger } from './logger.js';
import type { RecordRepository } from './repository.js';
import type { DnsRecord } from './types.js';

export interface Reconciler {
  /** Create the record, or update the single record with its name and type */
  createOrUpdate(
    zone: ResolvedZone,
    record: DnsRecord,
    signal?: AbortSignal
  ): Promise<DnsRecord>;
  /** Delete the record with the same name and type; no-op when absent */
  deleteByContent(
    zone: ResolvedZone,
    record: DnsRecord,
    signal?: AbortSignal
  ): Promise<void>;
}

/** Records are identified by encoded name and type, never by Bunny ID */
function sameNameAndType(wanted: BunnyRecordInput) {
  return (r: BunnyRecord) => r.Name === wanted.Name && r.Type === wanted.Type;
}

export function createReconciler(
  repository: RecordRepository,
  logger: Logger
): Reconciler {
  return {
    async createOrUpdate(zone, record, signal) {
      const existing = await repository.listBunnyRecords(zone, signal);
      const wanted = toBunnyRecord(zone, record);
      const matches = existing.filter(sameNameAndType(wanted));
      const [match, ...rest] = matches;

      if (!match) {
        logger.debug({ name: wanted.Name, type: record.type }, 'creating record');
        return repository.create(zone, record, signal);
      }

      if (rest.length > 0) {
        throw new BunnyError(
          'AmbiguousMatch',
          `Bunny: ${matches.length} ${record.type} records named "${record.name}" in zone ${zone.domain}, refusing to pick one`
        );
      }

      logger.debug(
        { name: wanted.Name, type: record.type, id: match.Id },
        'updating record'
      );
      return repository.update(zone, record, match.Id, signal);
    },

    async deleteByContent(zone, record, signal) {
      const existing = await repository.listBunnyRecords(zone, signal);
      const match = existing.find(sameNameAndType(toBunnyRecord(zone, record)));

      if (!match) {
        logger.debug(
          { name: record.name, type: record.type },
          'no record to delete'
        );
        return;
      }

      await repository.remove(zone, match.Id, signal);
    },
  };
}
