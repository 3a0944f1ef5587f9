/**
 * Validation of link (interface) option lists for both transport families.
 *
 * @packageDocumentation
 */

import { getProblemCreator } from '../reports/factory.js';
import type { ReportItem } from '../reports/types.js';
import {
  dependsOnOption,
  namesIn,
  runCollectionOfOptionValidators,
  valueIn,
  valueIntegerInRange,
  valueIpAddress,
  valueNonnegativeInteger,
  valuePortNumber,
  type OptionValidator,
} from '../validate/validators.js';
import { getOption, hasOption, type OptionMap } from '../validate/values.js';
import { LINK_BOUNDS } from './constants.js';

/**
 * Options of one link.
 */
export type LinkSpec = OptionMap;

const UDP_LINK_OPTIONS = ['bindnetaddr', 'broadcast', 'mcastaddr', 'mcastport', 'ttl'];

const KNET_LINK_OPTIONS = [
  // tells knet which IP version to prefer
  'ip_version',
  'linknumber',
  'link_priority',
  'mcastport',
  'ping_interval',
  'ping_precision',
  'ping_timeout',
  'pong_count',
  'transport',
];

/**
 * Validates udp/udpu link options.
 *
 * Link options are optional, so an empty list is valid. Only the first entry
 * is checked; a longer list is reported as too many links.
 *
 * @param linkList - Options of each link.
 */
export function createLinkListUdp(linkList: readonly LinkSpec[]): ReportItem[] {
  const [options] = linkList;
  if (options === undefined) {
    return [];
  }
  const reports = [
    ...runCollectionOfOptionValidators(options, [
      valueIpAddress('bindnetaddr'),
      valueIn('broadcast', ['0', '1']),
      valueIpAddress('mcastaddr'),
      valuePortNumber('mcastport'),
      valueIntegerInRange('ttl', 0, 255),
    ]),
    ...namesIn(UDP_LINK_OPTIONS, Object.keys(options), 'link'),
  ];
  const broadcast = getOption(options, 'broadcast')?.normalized ?? '0';
  if (broadcast === '1' && hasOption(options, 'mcastaddr')) {
    reports.push(getProblemCreator()('BroadcastDisallowsMcastaddr', {}));
  }
  const { max } = LINK_BOUNDS.udp;
  if (linkList.length > max) {
    reports.push(
      getProblemCreator()('TooManyLinks', {
        actualCount: linkList.length,
        maxCount: max,
        transport: 'udp/udpu',
      })
    );
  }
  return reports;
}

/**
 * Validates knet link options.
 *
 * @param linkList - Options of each link; options may be given for some links only.
 * @param maxLinkNumber - Highest link number in use, clamped to what knet supports.
 */
export function createLinkListKnet(
  linkList: readonly LinkSpec[],
  maxLinkNumber: number
): ReportItem[] {
  if (linkList.length === 0) {
    return [];
  }
  const { max } = LINK_BOUNDS.knet;
  const highestLinkNumber = Math.max(0, Math.min(max - 1, maxLinkNumber));
  const validators: OptionValidator[] = [
    valueIn('ip_version', ['ipv4', 'ipv6']),
    valueIntegerInRange('linknumber', 0, highestLinkNumber),
    valueIntegerInRange('link_priority', 0, 255),
    valuePortNumber('mcastport'),
    valueNonnegativeInteger('ping_interval'),
    valueNonnegativeInteger('ping_precision'),
    valueNonnegativeInteger('ping_timeout'),
    dependsOnOption('ping_interval', 'ping_timeout'),
    dependsOnOption('ping_timeout', 'ping_interval'),
    valueNonnegativeInteger('pong_count'),
    valueIn('transport', ['sctp', 'udp']),
  ];

  const reports: ReportItem[] = [];
  const usedLinkNumbers = new Map<string, number>();
  for (const options of linkList) {
    const linkNumber = getOption(options, 'linknumber');
    if (linkNumber !== undefined) {
      usedLinkNumbers.set(
        linkNumber.normalized,
        (usedLinkNumbers.get(linkNumber.normalized) ?? 0) + 1
      );
    }
    reports.push(
      ...runCollectionOfOptionValidators(options, validators),
      ...namesIn(KNET_LINK_OPTIONS, Object.keys(options), 'link')
    );
  }

  const duplicateLinkNumbers = [...usedLinkNumbers.entries()]
    .filter(([, count]) => count > 1)
    .map(([number]) => number);
  if (duplicateLinkNumbers.length > 0) {
    reports.push(
      getProblemCreator()('DuplicateLinkNumbers', { linkNumbers: duplicateLinkNumbers })
    );
  }
  if (linkList.length > max) {
    reports.push(
      getProblemCreator()('TooManyLinks', {
        actualCount: linkList.length,
        maxCount: max,
        transport: 'knet',
      })
    );
  }
  return reports;
}
