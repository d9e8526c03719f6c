import { z } from 'zod';
import { BunnyError } from './errors.js';
import type { Logger } from './logger.js';

const bunnyZoneSchema = z.object({
  Id: z.number().int(),
  Domain: z.string(),
  DnsSecEnabled: z.boolean().optional().default(false),
});

const bunnyRecordSchema = z.object({
  Id: z.number().int(),
  Type: z.number().int(),
  Name: z.string().nullish().transform((v) => v ?? ''),
  Value: z.string().nullish().transform((v) => v ?? ''),
  Ttl: z.number().int(),
  Weight: z.number().int().nullish(),
  Priority: z.number().int().nullish(),
  Flags: z.number().int().nullish(),
  Tag: z.string().nullish(),
  Port: z.number().int().nullish(),
});

const zoneListSchema = z.object({
  Items: z.array(bunnyZoneSchema),
  HasMoreItems: z.boolean().optional().default(false),
});

const zoneDetailsSchema = z.object({
  Records: z.array(bunnyRecordSchema).nullish().transform((v) => v ?? []),
});

export type BunnyZoneWire = z.output<typeof bunnyZoneSchema>;
export type BunnyRecord = z.output<typeof bunnyRecordSchema>;

/** A record as sent to the API: no `Id`, optional fields left out when unused */
export interface BunnyRecordInput {
  Type: number;
  Name: string;
  Value: string;
  Ttl: number;
  Weight?: number;
  Priority?: number;
  Flags?: number;
  Tag?: string;
  Port?: number;
}

/** A Bunny DNS zone */
export interface BunnyZone {
  id: number;
  domain: string;
  dnsSecEnabled: boolean;
}

export interface BunnyClient {
  /** Zones whose domain contains `term`, following pages */
  searchZones(term: string, signal?: AbortSignal): Promise<BunnyZone[]>;
  /** Every zone of the account, following pages */
  listZones(signal?: AbortSignal): Promise<BunnyZone[]>;
  listRecords(zoneId: number, signal?: AbortSignal): Promise<BunnyRecord[]>;
  addRecord(
    zoneId: number,
    record: BunnyRecordInput,
    signal?: AbortSignal
  ): Promise<BunnyRecord>;
  updateRecord(
    zoneId: number,
    recordId: number,
    record: BunnyRecordInput,
    signal?: AbortSignal
  ): Promise<void>;
  deleteRecord(
    zoneId: number,
    recordId: number,
    signal?: AbortSignal
  ): Promise<void>;
}

export interface BunnyClientOptions {
  accessKey: string;
  baseUrl: string;
  logger: Logger;
}

/** Largest page the zone listing accepts */
export const ZONE_PAGE_SIZE = 1000;

function toZone(z: BunnyZoneWire): BunnyZone {
  return { id: z.Id, domain: z.Domain, dnsSecEnabled: z.DnsSecEnabled };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createBunnyClient(options: BunnyClientOptions): BunnyClient {
  const { accessKey, baseUrl, logger } = options;

  async function send(
    method: string,
    path: string,
    body: BunnyRecordInput | undefined,
    signal: AbortSignal | undefined
  ): Promise<string> {
    const headers = new Headers();
    headers.set('AccessKey', accessKey);
    headers.set('Accept', 'application/json');
    if (body !== undefined) {
      headers.set('Content-Type', 'application/json');
    }

    let res: Response;
    try {
      res = await fetch(`${baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal,
      });
    } catch (err) {
      logger.debug({ method, path, err }, 'request failed');
      throw new BunnyError(
        'Transport',
        `Bunny: ${method} ${path} failed: ${errorMessage(err)}`,
        { cause: err }
      );
    }

    logger.debug({ method, path, status: res.status }, 'request completed');

    if (!res.ok) {
      throw new BunnyError(
        'Transport',
        `Bunny API error: ${res.statusText} (${res.status})`,
        { status: res.status }
      );
    }

    try {
      return await res.text();
    } catch (err) {
      throw new BunnyError(
        'Transport',
        `Bunny: reading ${method} ${path} response failed: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }

  async function request<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    method: string,
    path: string,
    body?: BunnyRecordInput,
    signal?: AbortSignal
  ): Promise<T> {
    const text = await send(method, path, body, signal);

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new BunnyError(
        'Transport',
        `Bunny: ${method} ${path} returned invalid JSON`,
        { cause: err }
      );
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new BunnyError(
        'Transport',
        `Bunny: unexpected ${method} ${path} response: ${parsed.error.issues
          .map((i) => `${i.path.join('.')}: ${i.message}`)
          .join(', ')}`,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }

  async function listZonePages(
    query: string,
    signal: AbortSignal | undefined
  ): Promise<BunnyZone[]> {
    const zones: BunnyZone[] = [];
    let page = 1;

    while (true) {
      const data = await request(
        zoneListSchema,
        'GET',
        `/dnszone?page=${page}&perPage=${ZONE_PAGE_SIZE}${query}`,
        undefined,
        signal
      );
      zones.push(...data.Items.map(toZone));

      if (!data.HasMoreItems || data.Items.length === 0) break;
      page++;
    }

    return zones;
  }

  return {
    searchZones(term, signal) {
      return listZonePages(`&search=${encodeURIComponent(term)}`, signal);
    },

    listZones(signal) {
      return listZonePages('', signal);
    },

    async listRecords(zoneId, signal) {
      const data = await request(
        zoneDetailsSchema,
        'GET',
        `/dnszone/${zoneId}`,
        undefined,
        signal
      );
      return data.Records;
    },

    async addRecord(zoneId, record, signal) {
      return request(
        bunnyRecordSchema,
        'PUT',
        `/dnszone/${zoneId}/records`,
        record,
        signal
      );
    },

    async updateRecord(zoneId, recordId, record, signal) {
      await send(
        'POST',
        `/dnszone/${zoneId}/records/${recordId}`,
        record,
        signal
      );
    },

    async deleteRecord(zoneId, recordId, signal) {
      await send(
        'DELETE',
        `/dnszone/${zoneId}/records/${recordId}`,
        undefined,
        signal
      );
    },
  };
}
