import type { BunnyClient, BunnyRecord } from './client.js';
import { fromBunnyRecord, toBunnyRecord, type ResolvedZone } from './codec.js';
import type { DnsRecord } from './types.js';

/** CRUD on the records of one resolved zone */
export interface RecordRepository {
  /** Raw Bunny records of the zone, with their IDs */
  listBunnyRecords(
    zone: ResolvedZone,
    signal?: AbortSignal
  ): Promise<BunnyRecord[]>;
  /** All records of the zone; fails as a whole if one cannot be decoded */
  list(zone: ResolvedZone, signal?: AbortSignal): Promise<DnsRecord[]>;
  create(
    zone: ResolvedZone,
    record: DnsRecord,
    signal?: AbortSignal
  ): Promise<DnsRecord>;
  /**
   * Overwrite record `id`. The API does not echo the stored record, so the
   * input is returned as given.
   */
  update(
    zone: ResolvedZone,
    record: DnsRecord,
    id: number,
    signal?: AbortSignal
  ): Promise<DnsRecord>;
  remove(zone: ResolvedZone, id: number, signal?: AbortSignal): Promise<void>;
}

export function createRecordRepository(client: BunnyClient): RecordRepository {
  return {
    listBunnyRecords(zone, signal) {
      return client.listRecords(zone.id, signal);
    },

    async list(zone, signal) {
      const records = await client.listRecords(zone.id, signal);
      return records.map((r) => fromBunnyRecord(zone, r));
    },

    async create(zone, record, signal) {
      const created = await client.addRecord(
        zone.id,
        toBunnyRecord(zone, record),
        signal
      );
      return fromBunnyRecord(zone, created);
    },

    async update(zone, record, id, signal) {
      await client.updateRecord(
        zone.id,
        id,
        toBunnyRecord(zone, record),
        signal
      );
      return record;
    },

    async remove(zone, id, signal) {
      await client.deleteRecord(zone.id, id, signal);
    },
  };
}
