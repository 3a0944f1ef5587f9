/**
 * Validation of a new cluster: name, transport and node list.
 *
 * @packageDocumentation
 */

import { getProblemCreator } from '../reports/factory.js';
import type { ReportItem } from '../reports/types.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';
import {
  isRequired,
  runCollectionOfOptionValidators,
  valueIn,
  valueNotEmpty,
} from '../validate/validators.js';
import type { OptionMap } from '../validate/values.js';
import { AddressTypeCache, type AddressResolver, type AddressType } from './address.js';
import { LINK_BOUNDS, TRANSPORTS_ALL, transportFamilyOf } from './constants.js';

/**
 * A node of the new cluster as supplied by the caller.
 */
export interface NodeSpec {
  readonly name?: string | undefined;
  readonly addrs?: readonly string[] | undefined;
}

/**
 * Options of {@link create}.
 */
export interface CreateClusterOptions {
  /** Resolves host names; a new per-call cache is built on top of it. */
  readonly resolver: AddressResolver;
  /** Downgrade unresolvable addresses to a warning. */
  readonly forceUnresolvable?: boolean | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Validates creating a new minimal corosync.conf.
 *
 * Every problem is collected; nothing stops the pass early. Node names are
 * used in reports only when they are all present and unique.
 *
 * @param clusterName - Name of the new cluster.
 * @param nodeList - Nodes of the new cluster.
 * @param transport - Corosync transport, e.g. `knet` or `udpu`.
 * @param options - Resolver and force settings.
 * @returns Report items in check order.
 */
export async function create(
  clusterName: string,
  nodeList: readonly NodeSpec[],
  transport: string,
  options: CreateClusterOptions
): Promise<ReportItem[]> {
  const log = (options.logger ?? defaultLogger).child('ClusterValidator');
  const family = transportFamilyOf(transport);
  const addressTypes = new AddressTypeCache(options.resolver);

  const reports = runCollectionOfOptionValidators({ name: clusterName, transport }, [
    valueNotEmpty('name', 'a cluster name', { optionNameForReport: 'cluster name' }),
    valueIn('transport', TRANSPORTS_ALL),
  ]);

  let allNamesUsable = true;
  const nameCount = new Map<string, number>();
  const addrCount = new Map<string, number>();
  const addrTypesPerNode: AddressType[][] = [];

  for (const [index, node] of nodeList.entries()) {
    const nodeIndex = index + 1;
    const nameOptions: OptionMap = node.name === undefined ? {} : { name: node.name };
    reports.push(
      ...runCollectionOfOptionValidators(nameOptions, [
        isRequired('name', `node ${String(nodeIndex)}`),
        valueNotEmpty('name', 'a non-empty string', {
          optionNameForReport: `node ${String(nodeIndex)} name`,
        }),
      ])
    );
    if (node.name === undefined || node.name === '') {
      allNamesUsable = false;
    } else {
      increment(nameCount, node.name);
    }

    const addrs = node.addrs ?? [];
    if (family !== undefined) {
      const { min, max } = LINK_BOUNDS[family];
      if (addrs.length < min || addrs.length > max) {
        reports.push(
          getProblemCreator()('NodeAddressesCountOutOfRange', {
            actualCount: addrs.length,
            minCount: min,
            maxCount: max,
            nodeName: node.name ?? null,
            nodeIndex,
          })
        );
      }
    }

    const nodeAddrTypes: AddressType[] = [];
    for (const addr of addrs) {
      increment(addrCount, addr);
      nodeAddrTypes.push(await addressTypes.classify(addr));
    }
    addrTypesPerNode.push(nodeAddrTypes);
  }

  const unresolvable = [...addressTypes.entries()]
    .filter(([, type]) => type === 'unresolvable')
    .map(([addr]) => addr)
    .sort();
  if (unresolvable.length > 0) {
    reports.push(
      getProblemCreator({
        forceCode: 'FORCE_NODE_ADDRESSES_UNRESOLVABLE',
        allowExtra: options.forceUnresolvable ?? false,
      })('NodeAddressesUnresolvable', { addresses: unresolvable })
    );
  }

  const duplicateNames = duplicates(nameCount);
  if (duplicateNames.length > 0) {
    allNamesUsable = false;
    reports.push(getProblemCreator()('DuplicateNodeNames', { names: duplicateNames }));
  }
  const duplicateAddrs = duplicates(addrCount);
  if (duplicateAddrs.length > 0) {
    reports.push(getProblemCreator()('DuplicateNodeAddresses', { addresses: duplicateAddrs }));
  }

  // Reports keyed by node name are only comprehensible with unique names.
  // Single-link families were fully covered by the per-node count check.
  if (allNamesUsable && family !== 'udp') {
    const nodeAddrCount: Record<string, number> = Object.fromEntries(
      nodeList.map((node) => [node.name ?? '', node.addrs?.length ?? 0])
    );
    if (new Set(Object.values(nodeAddrCount)).size > 1) {
      reports.push(getProblemCreator()('NodeAddressCountMismatch', { nodeAddrCount }));
    }
  }

  const mismatchedLinks = linksWithMixedIpVersions(addrTypesPerNode);
  if (mismatchedLinks.length > 0) {
    reports.push(
      getProblemCreator()('IpVersionMismatchInLinks', { linkNumbers: mismatchedLinks })
    );
  }

  log.debug('cluster_create_validated', {
    nodes: nodeList.length,
    transport,
    reports: reports.length,
  });
  return reports;
}

/**
 * Returns link indexes where some node uses IPv4 and another IPv6.
 *
 * Address lists of different length are compared up to the longest one.
 */
function linksWithMixedIpVersions(addrTypesPerNode: readonly AddressType[][]): number[] {
  const linkCount = Math.max(0, ...addrTypesPerNode.map((types) => types.length));
  const mismatched: number[] = [];
  for (let link = 0; link < linkCount; link++) {
    const typesInLink = new Set(addrTypesPerNode.map((types) => types[link]));
    if (typesInLink.has('IPv4') && typesInLink.has('IPv6')) {
      mismatched.push(link);
    }
  }
  return mismatched;
}

function increment(counter: Map<string, number>, key: string): void {
  counter.set(key, (counter.get(key) ?? 0) + 1);
}

function duplicates(counter: ReadonlyMap<string, number>): string[] {
  return [...counter.entries()]
    .filter(([, count]) => count > 1)
    .map(([key]) => key)
    .sort();
}
