import dns from 'dns/promises';
import net from 'net';
import { ResolutionError } from '../errors.js';
import type { ScanTarget } from '../types/scanner.js';

export interface Resolver {
  resolve(hostname: string): Promise<string[]>;
}

export class DnsResolver implements Resolver {
  async resolve(hostname: string): Promise<string[]> {
    let addresses: string[];
    try {
      const records = await dns.lookup(hostname, { all: true });
      addresses = records.map((record) => record.address);
    } catch (error) {
      throw new ResolutionError(hostname, error);
    }

    if (addresses.length === 0) {
      throw new ResolutionError(hostname);
    }
    return addresses;
  }
}

export function isIpLiteral(value: string): boolean {
  return net.isIP(value) !== 0;
}

/**
 * Turn a user-supplied identifier into a scan target. IP literals pass through;
 * names use the first address the resolver returns.
 */
export async function resolveTarget(identifier: string, resolver: Resolver): Promise<ScanTarget> {
  if (isIpLiteral(identifier)) {
    return { address: identifier, label: identifier };
  }

  const [address] = await resolver.resolve(identifier);
  if (address === undefined) {
    throw new ResolutionError(identifier);
  }
  return { address, label: identifier };
}
