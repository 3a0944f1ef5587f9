/**
 * Corosync transports, link bounds and quorum option sets.
 *
 * @packageDocumentation
 */

/**
 * The two transport families. Each family has its own link bounds and option
 * rules.
 */
export type TransportFamily = 'knet' | 'udp';

export const TRANSPORTS_KNET: readonly string[] = ['knet'];
export const TRANSPORTS_UDP: readonly string[] = ['udp', 'udpu'];
export const TRANSPORTS_ALL: readonly string[] = [...TRANSPORTS_KNET, ...TRANSPORTS_UDP];

/**
 * Link (address) count bounds per node for each family.
 */
export const LINK_BOUNDS: Readonly<Record<TransportFamily, { min: number; max: number }>> = {
  knet: { min: 1, max: 8 },
  udp: { min: 1, max: 1 },
};

/**
 * Maps a transport name to its family.
 *
 * @returns The family, or undefined for an unknown transport.
 */
export function transportFamilyOf(transport: string): TransportFamily | undefined {
  if (TRANSPORTS_KNET.includes(transport)) {
    return 'knet';
  }
  if (TRANSPORTS_UDP.includes(transport)) {
    return 'udp';
  }
  return undefined;
}

export const QUORUM_OPTIONS: readonly string[] = [
  'auto_tie_breaker',
  'last_man_standing',
  'last_man_standing_window',
  'wait_for_all',
];

export const QUORUM_OPTIONS_INCOMPATIBLE_WITH_QDEVICE: readonly string[] = [
  'auto_tie_breaker',
  'last_man_standing',
  'last_man_standing_window',
];

/**
 * Quorum device models with implemented validation.
 */
export type QdeviceModel = 'net';

export const QDEVICE_MODELS: readonly QdeviceModel[] = ['net'];

export function isQdeviceModel(model: string): model is QdeviceModel {
  return QDEVICE_MODELS.some((known) => known === model);
}

/**
 * Heuristics command names. The name ends up as a key in corosync.conf, so
 * characters with a meaning in that syntax are rejected.
 */
export const QDEVICE_HEURISTICS_EXEC_NAME_RE = /^exec_[^.:{}#\s]+$/;

export const QDEVICE_HEURISTICS_EXEC_PREFIX = 'exec_';
