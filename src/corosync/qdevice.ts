/**
 * Validation of quorum device settings: model options, generic options and
 * heuristics.
 *
 * @packageDocumentation
 */

import { allowExtraNames, allowExtraValues, getProblemCreator } from '../reports/factory.js';
import type { ForceOptions, ReportItem } from '../reports/types.js';
import {
  ifOptionExists,
  isRequired,
  namesIn,
  runCollectionOfOptionValidators,
  valueEmptyOrValid,
  valueIn,
  valueIntegerInRange,
  valueNotEmpty,
  valuePortNumber,
  valuePositiveInteger,
  type OptionValidator,
} from '../validate/validators.js';
import { getOption, isEmptyString, type OptionMap } from '../validate/values.js';
import {
  isQdeviceModel,
  QDEVICE_HEURISTICS_EXEC_NAME_RE,
  QDEVICE_HEURISTICS_EXEC_PREFIX,
  QDEVICE_MODELS,
  type QdeviceModel,
} from './constants.js';

/**
 * Option maps describing a quorum device.
 */
export interface QuorumDeviceOptions {
  readonly modelOptions: OptionMap;
  readonly genericOptions: OptionMap;
  readonly heuristicsOptions: OptionMap;
  /** Ids of existing cluster nodes, accepted as tie breakers. */
  readonly nodeIds: readonly string[];
}

export interface AddQuorumDeviceFlags {
  /** Continue with a model that has no validation. */
  readonly forceModel?: boolean | undefined;
  /** Turn forceable option errors into warnings. */
  readonly forceOptions?: boolean | undefined;
}

export interface UpdateQuorumDeviceFlags {
  readonly forceOptions?: boolean | undefined;
}

const NET_REQUIRED_OPTIONS = ['algorithm', 'host'];
const NET_OPTIONAL_OPTIONS = ['connect_timeout', 'force_ip_version', 'port', 'tie_breaker'];
const NET_ALGORITHMS = ['ffsplit', 'lms'];
const MODEL_OPTION_TYPE = 'quorum device model';

const GENERIC_OPTIONS = ['sync_timeout', 'timeout'];
const HEURISTICS_OPTIONS = ['interval', 'mode', 'sync_timeout', 'timeout'];
const EXEC_NAME_DESCRIPTION = "exec_NAME cannot contain '.:{}#' and whitespace characters";

/**
 * Validates adding a quorum device.
 *
 * @param model - Quorum device model.
 * @param device - Model, generic and heuristics options plus node ids.
 * @param flags - Force settings.
 */
export function addQuorumDevice(
  model: string,
  device: QuorumDeviceOptions,
  flags: AddQuorumDeviceFlags = {}
): ReportItem[] {
  const forceOptions = flags.forceOptions ?? false;
  const modelReports = isQdeviceModel(model)
    ? validateModelOptions(model, device, 'add', forceOptions)
    : runCollectionOfOptionValidators({ model }, [
        valueIn(
          'model',
          QDEVICE_MODELS,
          allowExtraValues('FORCE_QDEVICE_MODEL', flags.forceModel ?? false)
        ),
      ]);
  return [
    ...modelReports,
    ...validateGenericOptions(device.genericOptions, false, forceOptions),
    ...validateHeuristicsOptions(device.heuristicsOptions, false, forceOptions),
  ];
}

/**
 * Validates updating a quorum device. The model itself is never changed, so
 * options of a model without validation are not checked.
 *
 * @param model - Model of the configured device.
 * @param device - Options to change; empty values unset options.
 * @param flags - Force settings.
 */
export function updateQuorumDevice(
  model: string,
  device: QuorumDeviceOptions,
  flags: UpdateQuorumDeviceFlags = {}
): ReportItem[] {
  const forceOptions = flags.forceOptions ?? false;
  return [
    ...(isQdeviceModel(model) ? validateModelOptions(model, device, 'update', forceOptions) : []),
    ...validateGenericOptions(device.genericOptions, true, forceOptions),
    ...validateHeuristicsOptions(device.heuristicsOptions, true, forceOptions),
  ];
}

function validateModelOptions(
  model: QdeviceModel,
  device: QuorumDeviceOptions,
  mode: 'add' | 'update',
  forceOptions: boolean
): ReportItem[] {
  switch (model) {
    case 'net':
      return validateNetOptions(device.modelOptions, device.nodeIds, mode, forceOptions);
    default: {
      const unhandled: never = model;
      throw new Error(`Unhandled quorum device model: ${String(unhandled)}`);
    }
  }
}

function validateNetOptions(
  options: OptionMap,
  nodeIds: readonly string[],
  mode: 'add' | 'update',
  forceOptions: boolean
): ReportItem[] {
  const force = allowExtraValues('FORCE_OPTIONS', forceOptions);
  const optional: [string, OptionValidator][] = [
    ['connect_timeout', valueIntegerInRange('connect_timeout', 1000, 2 * 60 * 1000, force)],
    ['force_ip_version', valueIn('force_ip_version', ['0', '4', '6'], force)],
    ['port', valuePortNumber('port', force)],
    ['tie_breaker', valueIn('tie_breaker', ['lowest', 'highest', ...nodeIds], force)],
  ];
  const validators: OptionValidator[] = [
    ...(mode === 'add'
      ? NET_REQUIRED_OPTIONS.map((name) => isRequired(name, MODEL_OPTION_TYPE))
      : []),
    valueNotEmpty('host', 'a qdevice host address'),
    netAlgorithm(force),
    ...optional.map(([name, validator]) =>
      mode === 'update' ? valueEmptyOrValid(name, validator) : validator
    ),
  ];
  return [
    ...runCollectionOfOptionValidators(options, validators),
    ...namesIn(
      [...NET_REQUIRED_OPTIONS, ...NET_OPTIONAL_OPTIONS],
      Object.keys(options),
      MODEL_OPTION_TYPE,
      allowExtraNames('FORCE_OPTIONS', forceOptions)
    ),
  ];
}

/**
 * The algorithm is mandatory, so an empty value is never forceable.
 */
function netAlgorithm(force: ForceOptions): OptionValidator {
  const inAllowed = valueIn('algorithm', NET_ALGORITHMS, force);
  return ifOptionExists('algorithm', (options) => {
    const value = getOption(options, 'algorithm');
    if (value !== undefined && isEmptyString(value.normalized)) {
      return [
        getProblemCreator()('InvalidOptionValue', {
          optionName: 'algorithm',
          optionValue: value.original,
          allowedValues: NET_ALGORITHMS,
        }),
      ];
    }
    return inAllowed(options);
  });
}

function validateGenericOptions(
  options: OptionMap,
  allowEmptyValues: boolean,
  forceOptions: boolean
): ReportItem[] {
  const force = allowExtraValues('FORCE_OPTIONS', forceOptions);
  const validators = GENERIC_OPTIONS.map((name) => {
    const validator = valuePositiveInteger(name, force);
    return allowEmptyValues ? valueEmptyOrValid(name, validator) : validator;
  });
  return [
    ...runCollectionOfOptionValidators(options, validators),
    ...validateGenericOptionNames(options, forceOptions),
  ];
}

/**
 * The device model is a generic option in corosync.conf but is set through
 * its own parameter, so it is rejected here without a way to force it.
 */
function validateGenericOptionNames(options: OptionMap, forceOptions: boolean): ReportItem[] {
  const names = Object.keys(options).filter((name) => !GENERIC_OPTIONS.includes(name));
  const reports = names.includes('model')
    ? namesIn(GENERIC_OPTIONS, ['model'], 'quorum device')
    : [];
  return [
    ...reports,
    ...namesIn(
      GENERIC_OPTIONS,
      names.filter((name) => name !== 'model'),
      'quorum device',
      allowExtraNames('FORCE_OPTIONS', forceOptions)
    ),
  ];
}

function validateHeuristicsOptions(
  options: OptionMap,
  allowEmptyValues: boolean,
  forceOptions: boolean
): ReportItem[] {
  const names = Object.keys(options);
  const execNames = names.filter((name) => name.startsWith(QDEVICE_HEURISTICS_EXEC_PREFIX));
  const nonExecNames = names.filter((name) => !name.startsWith(QDEVICE_HEURISTICS_EXEC_PREFIX));

  const force = allowExtraValues('FORCE_OPTIONS', forceOptions);
  const byName: [string, OptionValidator][] = [
    ['mode', valueIn('mode', ['off', 'on', 'sync'], force)],
    ['interval', valuePositiveInteger('interval', force)],
    ['sync_timeout', valuePositiveInteger('sync_timeout', force)],
    ['timeout', valuePositiveInteger('timeout', force)],
  ];
  const validators = byName.map(([name, validator]) =>
    allowEmptyValues ? valueEmptyOrValid(name, validator) : validator
  );

  // Never forceable: a crafted exec_NAME could set arbitrary corosync.conf keys.
  const invalidExecNames = execNames.filter((name) => !QDEVICE_HEURISTICS_EXEC_NAME_RE.test(name));
  const validExecNames = execNames.filter((name) => QDEVICE_HEURISTICS_EXEC_NAME_RE.test(name));
  if (!allowEmptyValues) {
    // an empty command on update removes the option
    validators.push(...validExecNames.map((name) => valueNotEmpty(name, 'a command to be run')));
  }

  const reports = [
    ...runCollectionOfOptionValidators(options, validators),
    ...namesIn(HEURISTICS_OPTIONS, nonExecNames, 'heuristics', {
      ...allowExtraNames('FORCE_OPTIONS', forceOptions),
      allowedPatterns: [{ label: 'exec_NAME', prefix: QDEVICE_HEURISTICS_EXEC_PREFIX }],
    }),
  ];
  if (invalidExecNames.length > 0) {
    reports.push(
      getProblemCreator()('InvalidUserdefinedOptionName', {
        optionNames: invalidExecNames,
        allowedDescription: EXEC_NAME_DESCRIPTION,
        optionType: 'heuristics',
      })
    );
  }
  return reports;
}
