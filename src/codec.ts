import type { BunnyRecord, BunnyRecordInput, BunnyZone } from './client.js';
import { BunnyError } from './errors.js';
import { fromBunnyType, toBunnyType } from './record-types.js';
import type { DnsRecord, SrvRecord } from './types.js';

/**
 * A zone resolved for a requested domain. `nameBase` holds the labels of
 * the requested domain below the zone apex (`sub` for `sub.example.com` in
 * zone `example.com`) and is empty when the domain is the apex.
 */
export interface ResolvedZone extends BunnyZone {
  nameBase: string;
}

function ownerName(record: DnsRecord): string {
  const name = record.name === '@' ? '' : record.name;
  if (record.type !== 'SRV') {
    return name;
  }
  const service = `_${record.service}._${record.transport}`;
  return name ? `${service}.${name}` : service;
}

function appendNameBase(name: string, nameBase: string): string {
  if (!nameBase) return name;
  return name ? `${name}.${nameBase}` : nameBase;
}

function stripNameBase(name: string, nameBase: string): string {
  if (!nameBase) return name;
  if (name === nameBase) return '';
  if (name.endsWith(`.${nameBase}`)) {
    return name.slice(0, -(nameBase.length + 1));
  }
  return name;
}

/** Encode a record for the Bunny API */
export function toBunnyRecord(
  zone: ResolvedZone,
  record: DnsRecord
): BunnyRecordInput {
  const base = {
    Type: toBunnyType(record.type),
    Name: appendNameBase(ownerName(record), zone.nameBase),
    // Bunny takes whole seconds.
    Ttl: Math.trunc(record.ttl),
  };

  switch (record.type) {
    case 'CAA':
      return {
        ...base,
        Value: record.value,
        Flags: record.flags,
        Tag: record.tag,
      };
    case 'MX':
      return { ...base, Value: record.target, Priority: record.preference };
    case 'SRV':
      return {
        ...base,
        Value: record.target,
        Priority: record.priority,
        Weight: record.weight,
        Port: record.port,
      };
    default:
      return { ...base, Value: record.data };
  }
}

/**
 * Split `_service._transport[.name]` into its parts. The name may contain
 * further dots; only the first two labels are taken apart.
 */
export function parseSrvName(
  name: string
): Pick<SrvRecord, 'service' | 'transport' | 'name'> {
  const first = name.indexOf('.');
  if (first === -1) {
    throw new BunnyError(
      'MalformedName',
      `Bunny: SRV record name "${name}" is not _service._transport[.name]`
    );
  }
  const second = name.indexOf('.', first + 1);
  const service = name.slice(0, first);
  const transport =
    second === -1 ? name.slice(first + 1) : name.slice(first + 1, second);
  const rest = second === -1 ? '' : name.slice(second + 1);

  return {
    service: service.replace(/^_+/, ''),
    transport: transport.replace(/^_+/, ''),
    name: rest || '@',
  };
}

/** Decode a Bunny record into the generic model */
export function fromBunnyRecord(
  zone: ResolvedZone,
  record: BunnyRecord
): DnsRecord {
  const type = fromBunnyType(record.Type);
  const name = stripNameBase(record.Name, zone.nameBase) || '@';
  const ttl = record.Ttl;

  switch (type) {
    case 'CAA':
      return {
        type,
        name,
        ttl,
        flags: record.Flags ?? 0,
        tag: record.Tag ?? '',
        value: record.Value,
      };
    case 'MX':
      return {
        type,
        name,
        ttl,
        preference: record.Priority ?? 0,
        target: record.Value,
      };
    case 'SRV':
      return {
        type,
        ...parseSrvName(name),
        ttl,
        priority: record.Priority ?? 0,
        weight: record.Weight ?? 0,
        port: record.Port ?? 0,
        target: record.Value,
      };
    default:
      return { type, name, ttl, data: record.Value };
  }
}
