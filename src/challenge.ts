import { createHash } from 'node:crypto';
import type { LoopiaClient } from './client.js';
import { ACME_CHALLENGE_LABEL, DEFAULT_TTL, MIN_TTL } from './constants.js';
import type { ZoneRecord } from './types.js';

export interface ChallengeSolverOptions {
  client: LoopiaClient;
  /** The domain as registered at Loopia, e.g. `example.com` */
  zone: string;
  /** TTL for challenge records (default 300, Loopia's minimum) */
  ttl?: number;
}

export interface ChallengeSolver {
  /** Publish the TXT record for a DNS-01 challenge and return it */
  present(domain: string, keyAuthorization: string): Promise<ZoneRecord>;
  /** Remove the challenge TXT record, and its subdomain once empty */
  cleanup(domain: string, keyAuthorization: string): Promise<void>;
}

/** TXT value for a DNS-01 challenge: base64url SHA-256 of the key authorization */
export function dns01ChallengeValue(keyAuthorization: string): string {
  return createHash('sha256').update(keyAuthorization).digest('base64url');
}

function normalizeName(name: string): string {
  const lower = name.trim().toLowerCase();
  return lower.endsWith('.') ? lower.slice(0, -1) : lower;
}

/**
 * Challenge record name for a domain.
 *
 * "www.example.com" → "_acme-challenge.www.example.com"
 * "*.example.com" → "_acme-challenge.example.com"
 */
export function challengeFqdn(domain: string): string {
  const name = normalizeName(domain);
  const base = name.startsWith('*.') ? name.slice(2) : name;
  return `${ACME_CHALLENGE_LABEL}.${base}`;
}

/**
 * Name relative to a Loopia zone.
 *
 * "_acme-challenge.www.example.com" in "example.com" → "_acme-challenge.www"
 * "example.com" in "example.com" → "@"
 */
export function splitZoneName(fqdn: string, zone: string): string {
  const name = normalizeName(fqdn);
  const zoneName = normalizeName(zone);

  if (name === zoneName) {
    return '@';
  }

  const suffix = `.${zoneName}`;
  if (!zoneName || !name.endsWith(suffix)) {
    throw new Error(`Loopia: "${fqdn}" is not in zone "${zone}"`);
  }
  return name.slice(0, -suffix.length);
}

function isChallengeRecord(record: ZoneRecord, value: string): boolean {
  return record.type.toUpperCase() === 'TXT' && record.rdata === value;
}

/**
 * Create a DNS-01 challenge solver backed by a Loopia client.
 *
 * The solver keeps no state between `present` and `cleanup`: cleanup looks the
 * record up again by its value.
 */
export function createChallengeSolver(
  options: ChallengeSolverOptions
): ChallengeSolver {
  const { client } = options;
  const ttl = options.ttl ?? DEFAULT_TTL;

  if (!options.zone) {
    throw new Error('Loopia: zone is required');
  }
  if (!Number.isInteger(ttl) || ttl < MIN_TTL) {
    throw new Error(`Loopia: ttl must be an integer of at least ${MIN_TTL}`);
  }

  const zone = normalizeName(options.zone);

  return {
    async present(domain: string, keyAuthorization: string) {
      const subdomain = splitZoneName(challengeFqdn(domain), zone);
      const value = dns01ChallengeValue(keyAuthorization);

      await client.addTxtRecord(zone, subdomain, ttl, value);

      const records = await client.getTxtRecords(zone, subdomain);
      const stored = records.find((r) => isChallengeRecord(r, value));
      if (!stored) {
        throw new Error('Loopia: failed to find the stored TXT record');
      }
      return stored;
    },

    async cleanup(domain: string, keyAuthorization: string) {
      const subdomain = splitZoneName(challengeFqdn(domain), zone);
      const value = dns01ChallengeValue(keyAuthorization);

      const records = await client.getTxtRecords(zone, subdomain);
      for (const record of records) {
        if (isChallengeRecord(record, value)) {
          await client.removeTxtRecord(zone, subdomain, record.recordId);
        }
      }

      // Other records may still live at the subdomain
      const remaining = await client.getTxtRecords(zone, subdomain);
      if (remaining.length > 0) {
        return;
      }
      await client.removeSubdomain(zone, subdomain);
    },
  };
}
