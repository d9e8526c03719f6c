import { describe, it, expect } from 'vitest';
import {
  fromBunnyRecord,
  parseSrvName,
  toBunnyRecord,
  type ResolvedZone,
} from '../src/codec.js';
import type { BunnyRecord } from '../src/client.js';
import { isBunnyError } from '../src/errors.js';
import type { DnsRecord } from '../src/types.js';

const apex: ResolvedZone = {
  id: 42,
  domain: 'example.com',
  dnsSecEnabled: false,
  nameBase: '',
};

const sub: ResolvedZone = { ...apex, nameBase: 'sub' };

function stored(fields: Partial<BunnyRecord> & Pick<BunnyRecord, 'Type'>): BunnyRecord {
  return { Id: 1, Name: '', Value: '', Ttl: 300, ...fields };
}

describe('toBunnyRecord', () => {
  it('encodes a plain record', () => {
    expect(
      toBunnyRecord(apex, { type: 'A', name: 'www', ttl: 300, data: '192.0.2.1' })
    ).toEqual({ Type: 0, Name: 'www', Value: '192.0.2.1', Ttl: 300 });
  });

  it('writes the apex as an empty name', () => {
    expect(
      toBunnyRecord(apex, { type: 'TXT', name: '@', ttl: 60, data: 'hello' })
    ).toEqual({ Type: 3, Name: '', Value: 'hello', Ttl: 60 });
  });

  it('appends the name-base', () => {
    expect(
      toBunnyRecord(sub, { type: 'TXT', name: 'test', ttl: 60, data: 'x' }).Name
    ).toBe('test.sub');
  });

  it('uses the name-base alone for the apex of a subdomain', () => {
    expect(
      toBunnyRecord(sub, { type: 'TXT', name: '@', ttl: 60, data: 'x' }).Name
    ).toBe('sub');
  });

  it('truncates a fractional TTL to whole seconds', () => {
    expect(
      toBunnyRecord(apex, { type: 'TXT', name: 'x', ttl: 59.9, data: 'v' }).Ttl
    ).toBe(59);
  });

  it('encodes CAA fields', () => {
    expect(
      toBunnyRecord(apex, {
        type: 'CAA',
        name: '@',
        ttl: 3600,
        flags: 128,
        tag: 'issue',
        value: 'letsencrypt.org',
      })
    ).toEqual({
      Type: 9,
      Name: '',
      Value: 'letsencrypt.org',
      Ttl: 3600,
      Flags: 128,
      Tag: 'issue',
    });
  });

  it('encodes MX preference as priority', () => {
    expect(
      toBunnyRecord(apex, {
        type: 'MX',
        name: '@',
        ttl: 300,
        preference: 10,
        target: 'mx.example.com',
      })
    ).toEqual({
      Type: 4,
      Name: '',
      Value: 'mx.example.com',
      Ttl: 300,
      Priority: 10,
    });
  });

  it('encodes SRV service labels into the name', () => {
    expect(
      toBunnyRecord(sub, {
        type: 'SRV',
        name: 'voice',
        ttl: 300,
        service: 'sip',
        transport: 'tcp',
        priority: 10,
        weight: 5,
        port: 5060,
        target: 'sip.example.com',
      })
    ).toEqual({
      Type: 8,
      Name: '_sip._tcp.voice.sub',
      Value: 'sip.example.com',
      Ttl: 300,
      Priority: 10,
      Weight: 5,
      Port: 5060,
    });
  });
});

describe('fromBunnyRecord', () => {
  it('decodes an empty name as the apex', () => {
    expect(fromBunnyRecord(apex, stored({ Type: 0, Value: '192.0.2.1' }))).toEqual({
      type: 'A',
      name: '@',
      ttl: 300,
      data: '192.0.2.1',
    });
  });

  it('strips the name-base suffix', () => {
    expect(
      fromBunnyRecord(sub, stored({ Type: 3, Name: 'test.sub', Value: 'x' })).name
    ).toBe('test');
  });

  it('decodes a name equal to the name-base as the apex', () => {
    expect(
      fromBunnyRecord(sub, stored({ Type: 3, Name: 'sub', Value: 'x' })).name
    ).toBe('@');
  });

  it('leaves names outside the name-base alone', () => {
    expect(
      fromBunnyRecord(sub, stored({ Type: 3, Name: 'www', Value: 'x' })).name
    ).toBe('www');
    expect(
      fromBunnyRecord(sub, stored({ Type: 3, Name: 'nosub', Value: 'x' })).name
    ).toBe('nosub');
  });

  it('defaults missing CAA and MX fields', () => {
    expect(fromBunnyRecord(apex, stored({ Type: 9, Value: 'ca.example' }))).toEqual({
      type: 'CAA',
      name: '@',
      ttl: 300,
      flags: 0,
      tag: '',
      value: 'ca.example',
    });
    expect(
      fromBunnyRecord(apex, stored({ Type: 4, Value: 'mx.example.com', Priority: null }))
    ).toEqual({
      type: 'MX',
      name: '@',
      ttl: 300,
      preference: 0,
      target: 'mx.example.com',
    });
  });

  it('parses SRV names', () => {
    expect(
      fromBunnyRecord(
        apex,
        stored({
          Type: 8,
          Name: '_sip._tcp.test',
          Value: 'sip.example.com',
          Priority: 1,
          Weight: 2,
          Port: 5060,
        })
      )
    ).toEqual({
      type: 'SRV',
      name: 'test',
      service: 'sip',
      transport: 'tcp',
      ttl: 300,
      priority: 1,
      weight: 2,
      port: 5060,
      target: 'sip.example.com',
    });
  });

  it('rejects unknown type codes', () => {
    expect(() => fromBunnyRecord(apex, stored({ Type: 99 }))).toThrow(
      'Bunny: unsupported record type code 99'
    );
  });

  it('rejects a single-label SRV name', () => {
    let error: unknown;
    try {
      fromBunnyRecord(apex, stored({ Type: 8, Name: '_sip', Value: 'x' }));
    } catch (err) {
      error = err;
    }
    expect(isBunnyError(error, 'MalformedName')).toBe(true);
  });
});

describe('parseSrvName', () => {
  it('splits service, transport and name', () => {
    expect(parseSrvName('_sip._tcp.test')).toEqual({
      service: 'sip',
      transport: 'tcp',
      name: 'test',
    });
  });

  it('defaults the name to the apex', () => {
    expect(parseSrvName('_sip._tcp')).toEqual({
      service: 'sip',
      transport: 'tcp',
      name: '@',
    });
  });

  it('keeps the dots of a deeper name', () => {
    expect(parseSrvName('_sip._udp.voice.sub')).toEqual({
      service: 'sip',
      transport: 'udp',
      name: 'voice.sub',
    });
  });

  it('rejects a single label', () => {
    expect(() => parseSrvName('_sip')).toThrow(
      'Bunny: SRV record name "_sip" is not _service._transport[.name]'
    );
  });
});

describe('round trip', () => {
  const records: DnsRecord[] = [
    { type: 'A', name: '@', ttl: 0, data: '192.0.2.1' },
    { type: 'AAAA', name: 'v6', ttl: 300, data: '2001:db8::1' },
    { type: 'CNAME', name: 'www', ttl: 300, data: 'example.net' },
    { type: 'NS', name: 'delegated', ttl: 86400, data: 'ns1.example.net' },
    { type: 'TXT', name: '_acme-challenge', ttl: 60, data: 'token' },
    { type: 'PTR', name: '1', ttl: 300, data: 'host.example.com' },
    { type: 'CAA', name: '@', ttl: 0, flags: 0, tag: 'issue', value: 'ca.example' },
    { type: 'MX', name: '@', ttl: 300, preference: 10, target: 'mx.example.com' },
    {
      type: 'SRV',
      name: '@',
      ttl: 300,
      service: 'sip',
      transport: 'tcp',
      priority: 0,
      weight: 5,
      port: 5060,
      target: 'sip.example.com',
    },
    {
      type: 'SRV',
      name: 'voice',
      ttl: 0,
      service: 'xmpp',
      transport: 'udp',
      priority: 10,
      weight: 0,
      port: 5222,
      target: 'xmpp.example.com',
    },
  ];

  for (const zone of [apex, sub]) {
    for (const record of records) {
      it(`${record.type} ${record.name} with name-base "${zone.nameBase}"`, () => {
        const wire = toBunnyRecord(zone, record);
        expect(fromBunnyRecord(zone, { Id: 7, ...wire })).toEqual(record);
      });
    }
  }
});
