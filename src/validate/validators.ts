/**
 * Generic option validators.
 *
 * Each factory returns an {@link OptionValidator}: a function that receives
 * the whole option map and returns zero or more report items. Value checks
 * are no-ops when their option is absent; presence is enforced separately by
 * {@link isRequired}.
 *
 * @packageDocumentation
 */

import { getProblemCreator } from '../reports/factory.js';
import type { ForceOptions, ReportItem } from '../reports/types.js';
import {
  getOption,
  hasOption,
  isEmptyString,
  isInteger,
  isIpv4Address,
  isIpv6Address,
  isPortNumber,
  type OptionMap,
} from './values.js';

/**
 * Checks an option map and reports the problems it finds.
 */
export type OptionValidator = (options: OptionMap) => ReportItem[];

/**
 * Options shared by the value checks.
 */
export interface ValueCheckOptions extends ForceOptions {
  /** Name shown in the report instead of the option key. */
  readonly optionNameForReport?: string | undefined;
}

/**
 * A family of option names accepted by a name check, e.g. `exec_NAME`.
 */
export interface OptionNamePattern {
  /** Text listed in the report. */
  readonly label: string;
  /** Names starting with this prefix match the pattern. */
  readonly prefix: string;
}

/**
 * Options of {@link namesIn}.
 */
export interface NameCheckOptions extends ForceOptions {
  readonly allowedPatterns?: readonly OptionNamePattern[] | undefined;
}

/**
 * Runs validators in order over the same option map and concatenates their
 * reports.
 *
 * @param options - The option map to check.
 * @param validators - Validators to apply, in report order.
 * @returns All report items, in validator order.
 */
export function runCollectionOfOptionValidators(
  options: OptionMap,
  validators: readonly OptionValidator[]
): ReportItem[] {
  const reports: ReportItem[] = [];
  for (const validate of validators) {
    reports.push(...validate(options));
  }
  return reports;
}

/**
 * Wraps a validator so it only runs when `optionName` is present.
 */
export function ifOptionExists(optionName: string, validator: OptionValidator): OptionValidator {
  return (options) => (hasOption(options, optionName) ? validator(options) : []);
}

/**
 * Reports a missing required option.
 *
 * @param optionName - Option that must be present.
 * @param optionType - Description of the option group, e.g. `node 1`.
 */
export function isRequired(optionName: string, optionType = 'option'): OptionValidator {
  return (options) => {
    if (hasOption(options, optionName)) {
      return [];
    }
    return [
      getProblemCreator()('MissingOption', {
        optionNames: [optionName],
        optionType,
      }),
    ];
  };
}

/**
 * Reports `optionName` set without `prerequisiteName`.
 */
export function dependsOnOption(
  optionName: string,
  prerequisiteName: string,
  optionType = '',
  prerequisiteType = ''
): OptionValidator {
  return ifOptionExists(optionName, (options) => {
    if (hasOption(options, prerequisiteName)) {
      return [];
    }
    return [
      getProblemCreator()('DependencyUnmet', {
        optionName,
        optionType,
        prerequisiteName,
        prerequisiteType,
      }),
    ];
  });
}

/**
 * Base of every value check: tests the normalized value with `predicate`.
 *
 * @param optionName - Option to check.
 * @param predicate - Accepts valid normalized values.
 * @param allowedValues - Allowed values or their description, for the report.
 * @param checkOptions - Report name override and force settings.
 */
export function valueCond(
  optionName: string,
  predicate: (value: string) => boolean,
  allowedValues: readonly string[] | string,
  checkOptions: ValueCheckOptions = {}
): OptionValidator {
  const createReport = getProblemCreator(checkOptions);
  const reportedName = checkOptions.optionNameForReport ?? optionName;
  return (options) => {
    const value = getOption(options, optionName);
    if (value === undefined || predicate(value.normalized)) {
      return [];
    }
    return [
      createReport('InvalidOptionValue', {
        optionName: reportedName,
        optionValue: value.original,
        allowedValues,
      }),
    ];
  };
}

/**
 * Accepts an empty value as "unset"; any other value goes to `validator`.
 */
export function valueEmptyOrValid(optionName: string, validator: OptionValidator): OptionValidator {
  return (options) => {
    const value = getOption(options, optionName);
    if (value === undefined || isEmptyString(value.normalized)) {
      return [];
    }
    return validator(options);
  };
}

export function valueIn(
  optionName: string,
  allowedValues: readonly string[],
  checkOptions: ValueCheckOptions = {}
): OptionValidator {
  return valueCond(optionName, (value) => allowedValues.includes(value), allowedValues, checkOptions);
}

export function valueIntegerInRange(
  optionName: string,
  atLeast: number,
  atMost: number,
  checkOptions: ValueCheckOptions = {}
): OptionValidator {
  return valueCond(
    optionName,
    (value) => isInteger(value, atLeast, atMost),
    `${String(atLeast)}..${String(atMost)}`,
    checkOptions
  );
}

export function valueNonnegativeInteger(
  optionName: string,
  checkOptions: ValueCheckOptions = {}
): OptionValidator {
  return valueCond(optionName, (value) => isInteger(value, 0), 'a non-negative integer', checkOptions);
}

export function valuePositiveInteger(
  optionName: string,
  checkOptions: ValueCheckOptions = {}
): OptionValidator {
  return valueCond(optionName, (value) => isInteger(value, 1), 'a positive integer', checkOptions);
}

export function valuePortNumber(
  optionName: string,
  checkOptions: ValueCheckOptions = {}
): OptionValidator {
  return valueCond(optionName, isPortNumber, 'a port number (1-65535)', checkOptions);
}

export function valueIpAddress(
  optionName: string,
  checkOptions: ValueCheckOptions = {}
): OptionValidator {
  return valueCond(
    optionName,
    (value) => isIpv4Address(value) || isIpv6Address(value),
    'an IP address',
    checkOptions
  );
}

/**
 * Reports a present but empty value.
 *
 * @param optionName - Option to check.
 * @param description - What a valid value looks like, e.g. `a cluster name`.
 */
export function valueNotEmpty(
  optionName: string,
  description: string,
  checkOptions: ValueCheckOptions = {}
): OptionValidator {
  return valueCond(optionName, (value) => !isEmptyString(value), description, checkOptions);
}

/**
 * Reports names that are neither allowed nor matching an allowed pattern.
 *
 * All unrecognized names go into a single report, sorted.
 *
 * @param allowedNames - Accepted option names.
 * @param givenNames - Names to check.
 * @param optionType - Description of the option group.
 * @param checkOptions - Allowed name patterns and force settings.
 */
export function namesIn(
  allowedNames: readonly string[],
  givenNames: Iterable<string>,
  optionType = 'option',
  checkOptions: NameCheckOptions = {}
): ReportItem[] {
  const patterns = checkOptions.allowedPatterns ?? [];
  const allowed = new Set(allowedNames);
  const invalidNames = new Set<string>();
  for (const name of givenNames) {
    if (allowed.has(name) || patterns.some((pattern) => name.startsWith(pattern.prefix))) {
      continue;
    }
    invalidNames.add(name);
  }
  if (invalidNames.size === 0) {
    return [];
  }
  return [
    getProblemCreator(checkOptions)('InvalidOptionName', {
      optionNames: [...invalidNames].sort(),
      allowed: [...allowed].sort(),
      optionType,
      allowedPatterns: patterns.map((pattern) => pattern.label).sort(),
    }),
  ];
}
