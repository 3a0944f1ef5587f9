import type { AddressResolver } from './address.js';

/**
 * Resolver for tests: names listed in `resolvable` resolve, nothing else does.
 * Records every lookup.
 */
export class FakeAddressResolver implements AddressResolver {
  readonly lookups: string[] = [];
  private readonly resolvable: ReadonlySet<string>;

  constructor(resolvable: Iterable<string> = []) {
    this.resolvable = new Set(resolvable);
  }

  isResolvable(address: string): Promise<boolean> {
    this.lookups.push(address);
    return Promise.resolve(this.resolvable.has(address));
  }
}
