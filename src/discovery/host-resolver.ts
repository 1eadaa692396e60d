import { Injectable } from '@nestjs/common';
import { promises as dns } from 'dns';

/**
 * Resolves a hostname to an address. Rejects when the name does not resolve.
 */
export abstract class HostResolver {
  abstract resolve(hostname: string): Promise<string>;
}

/**
 * IPv4 lookup through the system resolver, as used for headless service pod records
 */
@Injectable()
export class DnsHostResolver extends HostResolver {
  async resolve(hostname: string): Promise<string> {
    const { address } = await dns.lookup(hostname, { family: 4 });
    return address;
  }
}
