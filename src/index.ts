export { bunny } from './providers/bunny.js';
export { bunnyOptionsFromEnv, BUNNY_API } from './config.js';
export { BunnyError, isBunnyError } from './errors.js';
export { unFqdn, apexCandidates } from './domain.js';
export {
  BUNNY_RECORD_TYPES,
  toBunnyType,
  fromBunnyType,
  isRecordType,
} from './record-types.js';
export { toBunnyRecord, fromBunnyRecord, parseSrvName } from './codec.js';
export { recordData } from './types.js';
export type { BunnyOptions } from './config.js';
export type { BunnyErrorCode } from './errors.js';
export type { BunnyProvider } from './providers/bunny.js';
export type { CallOptions, DnsProvider } from './provider.js';
export type { ResolvedZone } from './codec.js';
export type { BunnyRecord, BunnyRecordInput, BunnyZone } from './client.js';
export type {
  DnsRecord,
  PlainRecord,
  PlainRecordType,
  CaaRecord,
  MxRecord,
  SrvRecord,
  RecordType,
  Zone,
} from './types.js';
