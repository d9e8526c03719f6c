/** Record types the Bunny DNS API knows about */
export type RecordType =
  | 'A'
  | 'AAAA'
  | 'CNAME'
  | 'TXT'
  | 'MX'
  | 'Redirect'
  | 'Flatten'
  | 'PullZone'
  | 'SRV'
  | 'CAA'
  | 'PTR'
  | 'Script'
  | 'NS';

/** Types whose data is a single opaque string */
export type PlainRecordType = Exclude<RecordType, 'CAA' | 'MX' | 'SRV'>;

interface BaseRecord {
  /** Name relative to the requested domain, `@` for the apex */
  name: string;
  /** Time to live in seconds */
  ttl: number;
}

/** A, AAAA, CNAME, NS, TXT and the Bunny-specific types */
export interface PlainRecord extends BaseRecord {
  type: PlainRecordType;
  data: string;
}

export interface CaaRecord extends BaseRecord {
  type: 'CAA';
  flags: number;
  tag: string;
  value: string;
}

export interface MxRecord extends BaseRecord {
  type: 'MX';
  preference: number;
  target: string;
}

/**
 * A service record. `name` is the owner name below the
 * `_service._transport` labels (e.g. `_sip._tcp.voice` has name `voice`).
 */
export interface SrvRecord extends BaseRecord {
  type: 'SRV';
  /** Service label without the leading underscore (e.g. `sip`) */
  service: string;
  /** Transport label without the leading underscore (e.g. `tcp`) */
  transport: string;
  priority: number;
  weight: number;
  port: number;
  target: string;
}

/** A DNS record in the provider-agnostic model */
export type DnsRecord = PlainRecord | CaaRecord | MxRecord | SrvRecord;

/** A DNS zone in the provider-agnostic model */
export interface Zone {
  name: string;
}

/**
 * Render the zone-file data of a record.
 *
 * - `CAA` → `0 issue "letsencrypt.org"`
 * - `MX` → `10 mail.example.com`
 * - `SRV` → `10 5 5060 sip.example.com`
 */
export function recordData(record: DnsRecord): string {
  switch (record.type) {
    case 'CAA':
      return `${record.flags} ${record.tag} "${record.value}"`;
    case 'MX':
      return `${record.preference} ${record.target}`;
    case 'SRV':
      return `${record.priority} ${record.weight} ${record.port} ${record.target}`;
    default:
      return record.data;
  }
}
