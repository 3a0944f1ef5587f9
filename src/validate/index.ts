/**
 * Option validation framework.
 *
 * @packageDocumentation
 */

export type { OptionMap, OptionValue, ValuePair } from './values.js';
export {
  getOption,
  hasOption,
  isEmptyString,
  isInteger,
  isIpv4Address,
  isIpv6Address,
  isPortNumber,
  toValuePair,
} from './values.js';
export type {
  NameCheckOptions,
  OptionNamePattern,
  OptionValidator,
  ValueCheckOptions,
} from './validators.js';
export {
  dependsOnOption,
  ifOptionExists,
  isRequired,
  namesIn,
  runCollectionOfOptionValidators,
  valueCond,
  valueEmptyOrValid,
  valueIn,
  valueIntegerInRange,
  valueIpAddress,
  valueNonnegativeInteger,
  valueNotEmpty,
  valuePortNumber,
  valuePositiveInteger,
} from './validators.js';
