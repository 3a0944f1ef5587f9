/**
 * Option maps, value pairs and the value predicates used by validators.
 *
 * @packageDocumentation
 */

import { isIPv4, isIPv6 } from 'node:net';

/**
 * A value as the user typed it together with its normalized form.
 *
 * Rules test `normalized`; reports show `original`.
 */
export interface ValuePair {
  readonly original: string;
  readonly normalized: string;
}

/**
 * A single option value, plain or normalized.
 */
export type OptionValue = string | ValuePair;

/**
 * Mapping of option name to value. An empty string is a present value.
 */
export type OptionMap = Readonly<Record<string, OptionValue>>;

/**
 * Wraps a plain string into a value pair; value pairs pass through.
 */
export function toValuePair(value: OptionValue): ValuePair {
  return typeof value === 'string' ? { original: value, normalized: value } : value;
}

/**
 * Whether the option map has `name` as an own key.
 */
export function hasOption(options: OptionMap, name: string): boolean {
  return Object.hasOwn(options, name);
}

/**
 * Returns the value pair for `name`, or undefined when the option is absent.
 */
export function getOption(options: OptionMap, name: string): ValuePair | undefined {
  if (!hasOption(options, name)) {
    return undefined;
  }
  const value = options[name];
  return value === undefined ? undefined : toValuePair(value);
}

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Checks that `value` is a decimal integer within the optional bounds.
 *
 * @param value - String to check.
 * @param atLeast - Inclusive lower bound.
 * @param atMost - Inclusive upper bound.
 */
export function isInteger(value: string, atLeast?: number, atMost?: number): boolean {
  if (!INTEGER_PATTERN.test(value)) {
    return false;
  }
  const parsed = Number.parseInt(value.trim(), 10);
  if (atLeast !== undefined && parsed < atLeast) {
    return false;
  }
  if (atMost !== undefined && parsed > atMost) {
    return false;
  }
  return true;
}

export function isPortNumber(value: string): boolean {
  return isInteger(value, 1, 65535);
}

export function isIpv4Address(value: string): boolean {
  return isIPv4(value);
}

export function isIpv6Address(value: string): boolean {
  return isIPv6(value);
}

export function isEmptyString(value: string): boolean {
  return value === '';
}
