/**
 * Node address classification.
 *
 * An address is an IPv4 literal, an IPv6 literal, a resolvable host name or
 * unresolvable. Name lookups go through an {@link AddressResolver} so tests
 * and callers without network access can supply their own.
 *
 * @packageDocumentation
 */

import { lookup } from 'node:dns/promises';
import { Logger, logger as defaultLogger } from '../utils/logger.js';
import { isIpv4Address, isIpv6Address } from '../validate/values.js';

export type AddressType = 'IPv4' | 'IPv6' | 'FQDN' | 'unresolvable';

/**
 * Decides whether a host name resolves. Implementations must not reject.
 */
export interface AddressResolver {
  isResolvable(address: string): Promise<boolean>;
}

/**
 * Options for {@link DnsAddressResolver}.
 */
export interface DnsAddressResolverOptions {
  /** Upper bound for a single lookup; a slower lookup counts as a failure. */
  readonly timeoutMs: number;
  readonly logger?: Logger | undefined;
  /** Replaces `dns.lookup`. */
  readonly lookupFn?: ((hostname: string) => Promise<unknown>) | undefined;
}

/**
 * Resolver backed by the system resolver (`dns.lookup`) with a timeout.
 */
export class DnsAddressResolver implements AddressResolver {
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly lookupFn: (hostname: string) => Promise<unknown>;

  constructor(options: DnsAddressResolverOptions) {
    this.timeoutMs = options.timeoutMs;
    this.logger = (options.logger ?? defaultLogger).child('AddressResolver');
    this.lookupFn = options.lookupFn ?? ((hostname) => lookup(hostname));
  }

  async isResolvable(address: string): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => {
        this.logger.debug('address_lookup_timeout', { address, timeoutMs: this.timeoutMs });
        resolve(false);
      }, this.timeoutMs);
      timer.unref();
    });
    const looked = this.lookupFn(address).then(
      () => true,
      (error: unknown) => {
        this.logger.debug('address_lookup_failed', {
          address,
          error: error instanceof Error ? error.message : String(error),
        });
        return false;
      }
    );
    try {
      return await Promise.race([looked, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Memoizes address types for the duration of one validation call.
 *
 * Each distinct address literal is classified, and looked up, at most once.
 * A blank address is unresolvable and never reaches the resolver. Create a
 * new cache per call.
 */
export class AddressTypeCache {
  private readonly types = new Map<string, AddressType>();

  constructor(private readonly resolver: AddressResolver) {}

  async classify(address: string): Promise<AddressType> {
    const known = this.types.get(address);
    if (known !== undefined) {
      return known;
    }
    const type = await this.detect(address);
    this.types.set(address, type);
    return type;
  }

  /** Addresses classified so far, in first-seen order. */
  entries(): IterableIterator<[string, AddressType]> {
    return this.types.entries();
  }

  private async detect(address: string): Promise<AddressType> {
    if (address.trim() === '') {
      return 'unresolvable';
    }
    if (isIpv4Address(address)) {
      return 'IPv4';
    }
    if (isIpv6Address(address)) {
      return 'IPv6';
    }
    return (await this.resolver.isResolvable(address)) ? 'FQDN' : 'unresolvable';
  }
}
