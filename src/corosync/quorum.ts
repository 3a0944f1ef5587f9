/**
 * Validation of quorum options.
 *
 * @packageDocumentation
 */

import { getProblemCreator } from '../reports/factory.js';
import type { ReportItem } from '../reports/types.js';
import {
  dependsOnOption,
  namesIn,
  runCollectionOfOptionValidators,
  valueEmptyOrValid,
  valueIn,
  valuePositiveInteger,
  type OptionValidator,
} from '../validate/validators.js';
import type { OptionMap } from '../validate/values.js';
import { QUORUM_OPTIONS, QUORUM_OPTIONS_INCOMPATIBLE_WITH_QDEVICE } from './constants.js';

const BOOLEAN_VALUES = ['0', '1'];

/**
 * Validates quorum options of a new configuration.
 *
 * @param options - Quorum options to set.
 * @param hasQdevice - Whether a quorum device is configured.
 */
export function createQuorumOptions(options: OptionMap, hasQdevice: boolean): ReportItem[] {
  return [
    ...validateQuorumOptions(options, hasQdevice, false),
    ...runCollectionOfOptionValidators(options, [
      dependsOnOption('last_man_standing_window', 'last_man_standing'),
    ]),
  ];
}

/**
 * Validates a change of quorum options; an empty value unsets the option.
 *
 * @param options - Quorum options to change.
 * @param hasQdevice - Whether a quorum device is configured.
 */
export function updateQuorumOptions(options: OptionMap, hasQdevice: boolean): ReportItem[] {
  return validateQuorumOptions(options, hasQdevice, true);
}

function validateQuorumOptions(
  options: OptionMap,
  hasQdevice: boolean,
  allowEmptyValues: boolean
): ReportItem[] {
  const reports = [
    ...runCollectionOfOptionValidators(options, quorumOptionValidators(allowEmptyValues)),
    ...namesIn(QUORUM_OPTIONS, Object.keys(options), 'quorum'),
  ];
  if (hasQdevice) {
    const incompatible = Object.keys(options).filter((name) =>
      QUORUM_OPTIONS_INCOMPATIBLE_WITH_QDEVICE.includes(name)
    );
    if (incompatible.length > 0) {
      reports.push(
        getProblemCreator()('IncompatibleWithQdevice', { optionNames: incompatible })
      );
    }
  }
  return reports;
}

function quorumOptionValidators(allowEmptyValues: boolean): OptionValidator[] {
  const validators: [string, OptionValidator][] = [
    ['auto_tie_breaker', valueIn('auto_tie_breaker', BOOLEAN_VALUES)],
    ['last_man_standing', valueIn('last_man_standing', BOOLEAN_VALUES)],
    ['last_man_standing_window', valuePositiveInteger('last_man_standing_window')],
    ['wait_for_all', valueIn('wait_for_all', BOOLEAN_VALUES)],
  ];
  return validators.map(([name, validator]) =>
    allowEmptyValues ? valueEmptyOrValid(name, validator) : validator
  );
}
