/**
 * Live test: publish and remove a DNS-01 challenge record at Loopia.
 *
 * Usage:
 *   LOOPIA_API_USER=xxx LOOPIA_API_PASSWORD=xxx \
 *     npx tsx examples/dns-challenge.ts example.com [zone]
 */

import {
  challengeFqdn,
  createChallengeSolver,
  createLoopiaClient,
  loadLoopiaConfig,
} from '../src/index.js';

const domain = process.argv[2];
const zone = process.argv[3] ?? domain;

if (!domain || !zone) {
  console.error(
    'Usage: LOOPIA_API_USER=xxx LOOPIA_API_PASSWORD=xxx npx tsx examples/dns-challenge.ts <domain> [zone]'
  );
  process.exit(1);
}

async function main(domain: string, zone: string) {
  const { ttl, ...options } = loadLoopiaConfig();
  const client = createLoopiaClient(options);
  const solver = createChallengeSolver({ client, zone, ttl });
  const keyAuthorization = `example-token.${Date.now()}`;

  console.log(`\nPresenting challenge at ${challengeFqdn(domain)} (zone ${zone})...`);
  const record = await solver.present(domain, keyAuthorization);
  console.log(`  + Created: TXT ${record.rdata} (record ${record.recordId}, ttl ${record.ttl})`);

  console.log(`\nCleaning up...`);
  await solver.cleanup(domain, keyAuthorization);
  console.log(`  - Removed: TXT ${record.rdata}`);

  console.log('\nDone!');
}

main(domain, zone).catch((err: unknown) => {
  console.error('\nError:', err instanceof Error ? err.message : err);
  process.exit(1);
});
