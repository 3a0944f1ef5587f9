/**
 * Corosync configuration validators.
 *
 * Every function returns report items and leaves its inputs untouched, so a
 * pass can be repeated for a preview and again before commit.
 *
 * @packageDocumentation
 */

export type { AddressResolver, AddressType, DnsAddressResolverOptions } from './address.js';
export { AddressTypeCache, DnsAddressResolver } from './address.js';
export type { CreateClusterOptions, NodeSpec } from './cluster.js';
export { create } from './cluster.js';
export type { QdeviceModel, TransportFamily } from './constants.js';
export {
  LINK_BOUNDS,
  QUORUM_OPTIONS,
  QUORUM_OPTIONS_INCOMPATIBLE_WITH_QDEVICE,
  TRANSPORTS_ALL,
  TRANSPORTS_KNET,
  TRANSPORTS_UDP,
  transportFamilyOf,
} from './constants.js';
export type { LinkSpec } from './links.js';
export { createLinkListKnet, createLinkListUdp } from './links.js';
export type {
  AddQuorumDeviceFlags,
  QuorumDeviceOptions,
  UpdateQuorumDeviceFlags,
} from './qdevice.js';
export { addQuorumDevice, updateQuorumDevice } from './qdevice.js';
export { createQuorumOptions, updateQuorumOptions } from './quorum.js';
export { createTotem, createTransportKnet, createTransportUdp } from './transport.js';
