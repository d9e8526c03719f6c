/**
 * Live test: publish and remove an ACME DNS-01 challenge TXT record on Bunny.net.
 *
 * Usage:
 *   BUNNY_API_KEY=xxx npx tsx examples/acme-challenge.ts sub.example.com
 */

import { bunny, bunnyOptionsFromEnv } from '../src/index.js';
import type { DnsRecord } from '../src/index.js';

const domain = process.argv[2];
const options = bunnyOptionsFromEnv();

if (!domain) {
  console.error('Usage: BUNNY_API_KEY=xxx npx tsx examples/acme-challenge.ts <domain>');
  process.exit(1);
}

if (!options.accessKey) {
  console.error('Missing BUNNY_API_KEY environment variable.');
  console.error('Find it at: https://dash.bunny.net/account/api-key');
  process.exit(1);
}

async function main(domain: string) {
  const provider = bunny(options);

  console.log(`\nLooking up zones for your API key...`);
  const zones = await provider.listZones();
  console.log(`Found ${zones.length} zone(s):`);
  for (const z of zones) {
    console.log(`  ${z.name}`);
  }

  const challenge: DnsRecord = {
    type: 'TXT',
    name: '_acme-challenge',
    ttl: 60,
    data: `challenge-${Date.now()}`,
  };

  console.log(`\nSetting ${challenge.name} on ${domain}...`);
  const [set] = await provider.setRecords(domain, [challenge]);
  if (set) {
    console.log(`  = Set: ${set.type} ${set.name}`);
  }

  const records = await provider.getRecords(domain);
  const visible = records.some(
    (r) => r.type === 'TXT' && r.name === challenge.name && r.data === challenge.data
  );
  console.log(`  ${visible ? '+' : '!'} Listed: ${visible ? 'present' : 'missing'}`);

  await provider.deleteRecords(domain, [challenge]);
  console.log(`  - Deleted: ${challenge.type} ${challenge.name}`);

  console.log(`\nDone! ${records.length} record(s) in zone.`);
}

main(domain).catch((err: unknown) => {
  console.error('\nError:', err instanceof Error ? err.message : err);
  process.exit(1);
});
