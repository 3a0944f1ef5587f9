/**
 * Validation of transport and totem options.
 *
 * None of these checks can be forced: option names are strict so a user
 * cannot overwrite settings they should not touch, and the values are enums
 * or unbounded numbers.
 *
 * @packageDocumentation
 */

import { getProblemCreator } from '../reports/factory.js';
import type { ReportItem } from '../reports/types.js';
import {
  namesIn,
  runCollectionOfOptionValidators,
  valueIn,
  valueNonnegativeInteger,
  valueNotEmpty,
  valuePositiveInteger,
} from '../validate/validators.js';
import { getOption, type OptionMap } from '../validate/values.js';

const IP_VERSIONS = ['ipv4', 'ipv6'];

/**
 * Validates udp/udpu transport options.
 */
export function createTransportUdp(options: OptionMap): ReportItem[] {
  return [
    ...runCollectionOfOptionValidators(options, [
      valueIn('ip_version', IP_VERSIONS),
      valuePositiveInteger('netmtu'),
    ]),
    ...namesIn(['ip_version', 'netmtu'], Object.keys(options), 'udp/udpu transport'),
  ];
}

/**
 * Validates knet transport options.
 *
 * @param genericOptions - Options of the transport itself.
 * @param compressionOptions - Options of the `compression` section.
 * @param cryptoOptions - Options of the `crypto` section.
 */
export function createTransportKnet(
  genericOptions: OptionMap,
  compressionOptions: OptionMap,
  cryptoOptions: OptionMap
): ReportItem[] {
  const reports = [
    ...runCollectionOfOptionValidators(genericOptions, [
      valueIn('ip_version', IP_VERSIONS),
      valueNonnegativeInteger('knet_pmtud_interval'),
      valueIn('link_mode', ['active', 'passive', 'rr']),
    ]),
    ...namesIn(
      ['ip_version', 'knet_pmtud_interval', 'link_mode'],
      Object.keys(genericOptions),
      'transport'
    ),
    ...runCollectionOfOptionValidators(compressionOptions, [
      valueNotEmpty('level', 'a compression level e.g. 0..9'),
      valueNotEmpty('model', 'a compression model e.g. zlib, lz4 or bzip2'),
      valueNonnegativeInteger('threshold'),
    ]),
    ...namesIn(['level', 'model', 'threshold'], Object.keys(compressionOptions), 'compression'),
    ...runCollectionOfOptionValidators(cryptoOptions, [
      valueIn('cipher', ['none', 'aes256', 'aes192', 'aes128', '3des']),
      valueIn('hash', ['none', 'md5', 'sha1', 'sha256', 'sha384', 'sha512']),
      valueIn('model', ['nss', 'openssl']),
    ]),
    ...namesIn(['cipher', 'hash', 'model'], Object.keys(cryptoOptions), 'crypto'),
  ];
  // corosync defaults: cipher aes256, hash sha1
  const cipher = getOption(cryptoOptions, 'cipher')?.normalized ?? 'aes256';
  const hash = getOption(cryptoOptions, 'hash')?.normalized ?? 'sha1';
  if (cipher !== 'none' && hash === 'none') {
    reports.push(getProblemCreator()('CryptoCipherRequiresHash', {}));
  }
  return reports;
}

const TOTEM_OPTIONS = [
  'consensus',
  'downcheck',
  'fail_recv_const',
  'heartbeat_failures_allowed',
  'hold',
  'join',
  'max_messages',
  'max_network_delay',
  'merge',
  'miss_count_const',
  'send_join',
  'seqno_unchanged_const',
  'token',
  'token_coefficient',
  'token_retransmit',
  'token_retransmits_before_loss_const',
  'window_size',
];

/**
 * Validates the totem section: every tunable is a non-negative integer.
 */
export function createTotem(options: OptionMap): ReportItem[] {
  return [
    ...runCollectionOfOptionValidators(
      options,
      TOTEM_OPTIONS.map((name) => valueNonnegativeInteger(name))
    ),
    ...namesIn(TOTEM_OPTIONS, Object.keys(options), 'totem'),
  ];
}
