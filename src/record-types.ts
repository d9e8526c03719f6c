import { BunnyError } from './errors.js';
import type { RecordType } from './types.js';

/** Bunny.net represents record types as integers */
export const BUNNY_RECORD_TYPES = {
  A: 0,
  AAAA: 1,
  CNAME: 2,
  TXT: 3,
  MX: 4,
  Redirect: 5,
  Flatten: 6,
  PullZone: 7,
  SRV: 8,
  CAA: 9,
  PTR: 10,
  Script: 11,
  NS: 12,
} as const satisfies Record<RecordType, number>;

const byName = new Map<string, number>(Object.entries(BUNNY_RECORD_TYPES));

const byCode = new Map<number, RecordType>();
for (const [name, code] of byName) {
  if (isRecordType(name)) byCode.set(code, name);
}

export function isRecordType(type: string): type is RecordType {
  return Object.prototype.hasOwnProperty.call(BUNNY_RECORD_TYPES, type);
}

/** Bunny type code for a record type name */
export function toBunnyType(type: string): number {
  const code = byName.get(type);
  if (code === undefined) {
    throw new BunnyError(
      'UnsupportedType',
      `Bunny: unsupported record type "${type}"`
    );
  }
  return code;
}

/** Record type name for a Bunny type code */
export function fromBunnyType(code: number): RecordType {
  const type = byCode.get(code);
  if (type === undefined) {
    throw new BunnyError(
      'UnsupportedType',
      `Bunny: unsupported record type code ${code}`
    );
  }
  return type;
}
