/**
 * Create-with-set commands for order, colocation and ticket constraints.
 *
 * A command resolves the requested resources, prepares the options of its
 * constraint type, appends the constraint and refuses duplicates. Nothing is
 * appended when any step fails.
 *
 * @packageDocumentation
 */

import { ReportListError } from '../reports/errors.js';
import { error } from '../reports/factory.js';
import type { ReportItem } from '../reports/types.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';
import {
  isRequired,
  runCollectionOfOptionValidators,
  valueIn,
} from '../validate/validators.js';
import { isInteger, type OptionMap, type ValuePair } from '../validate/values.js';
import {
  checkIsWithoutDuplication,
  createId,
  createWithSet,
  exportWithSet,
  haveDuplicateResourceSets,
  prepareOptions,
  prepareResourceSetList,
} from './constraint.js';
import type { ResourceSetSpec } from './resource-set.js';
import { checkNewIdApplicable, DEFAULT_ID_PREFIX, getConstraints, validateId } from './tools.js';
import type { CibElement } from './tree.js';

export type ConstraintType = 'order' | 'colocation' | 'ticket';

export const CONSTRAINT_TAGS: Readonly<Record<ConstraintType, string>> = {
  order: 'rsc_order',
  colocation: 'rsc_colocation',
  ticket: 'rsc_ticket',
};

const ALLOWED_OPTIONS: Readonly<Record<ConstraintType, readonly string[]>> = {
  order: ['kind', 'symmetrical'],
  colocation: ['score', 'score-attribute', 'score-attribute-mangle'],
  ticket: ['loss-policy', 'ticket'],
};

const ORDER_KINDS = ['Optional', 'Mandatory', 'Serialize'];
const BOOLEANS = ['true', 'false'];
const LOSS_POLICIES = ['fence', 'stop', 'freeze', 'demote'];
const INFINITY_SCORES = ['INFINITY', '+INFINITY', '-INFINITY'];

/**
 * Settings of {@link createConstraintWithSets}.
 */
export interface CreateConstraintSettings {
  /** Reference the enclosing clone instead of a resource inside it. */
  readonly canRepairToClone?: boolean | undefined;
  /** Accept references to resources inside a clone. */
  readonly inCloneAllowed?: boolean | undefined;
  /** Skip the duplicate constraint check (the forced form). */
  readonly duplicationAllowed?: boolean | undefined;
  readonly idPrefix?: string | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Creates a constraint of `type` referencing resource sets.
 *
 * @param tree - The configuration tree; must contain a constraints section.
 * @param type - Constraint type.
 * @param resourceSetList - Requested sets.
 * @param options - Constraint options; an `id` is generated when missing.
 * @param settings - Resolution and duplicate settings.
 * @returns The appended constraint element.
 * @throws ReportListError describing why nothing was created.
 *
 * @example
 * ```typescript
 * createConstraintWithSets(cib, 'order', [{ ids: ['A', 'B'], options: {} }], {
 *   kind: 'mandatory',
 * });
 * // <rsc_order id="ha_order_set_A_B" kind="Mandatory"> ... </rsc_order>
 * ```
 */
export function createConstraintWithSets(
  tree: CibElement,
  type: ConstraintType,
  resourceSetList: readonly ResourceSetSpec[],
  options: Readonly<Record<string, string>>,
  settings: CreateConstraintSettings = {}
): CibElement {
  const log = (settings.logger ?? defaultLogger).child('ConstraintBuilder');
  const idPrefix = settings.idPrefix ?? DEFAULT_ID_PREFIX;
  const section = getConstraints(tree);

  const preparedSets = prepareResourceSetList(
    tree,
    settings.canRepairToClone ?? false,
    settings.inCloneAllowed ?? false,
    resourceSetList
  );
  const prepared = prepareOptions(
    ALLOWED_OPTIONS[type],
    options,
    () => createId(tree, type, preparedSets, idPrefix),
    (id) => checkNewIdApplicable(tree, `${type} constraint id`, id)
  );
  const attributes = prepareTypeOptions(type, prepared);

  const constraint = createWithSet(section, CONSTRAINT_TAGS[type], attributes, preparedSets, idPrefix);
  if (settings.duplicationAllowed !== true) {
    try {
      checkIsWithoutDuplication(section, constraint, haveDuplicateResourceSets, exportWithSet);
    } catch (err) {
      section.removeChild(constraint);
      log.debug('constraint_duplicate_refused', { tag: constraint.tag, id: attributes.id });
      throw err;
    }
  }

  log.debug('constraint_created', {
    tag: constraint.tag,
    id: attributes.id,
    sets: preparedSets.map((spec) => spec.ids),
  });
  return constraint;
}

/**
 * Applies the type-specific rules to prepared options.
 *
 * @throws ReportListError listing every problem found.
 */
export function prepareTypeOptions(
  type: ConstraintType,
  options: Readonly<Record<string, string>>
): Record<string, string> {
  let result: { options: Record<string, string>; reports: ReportItem[] };
  switch (type) {
    case 'order':
      result = prepareOrderOptions(options);
      break;
    case 'colocation':
      result = prepareColocationOptions(options);
      break;
    case 'ticket':
      result = prepareTicketOptions(options);
      break;
    default: {
      const unhandled: never = type;
      throw new Error(`Unhandled constraint type: ${String(unhandled)}`);
    }
  }
  if (result.reports.length > 0) {
    throw new ReportListError(result.reports);
  }
  return result.options;
}

/**
 * `kind` is case-insensitive and stored capitalized; `symmetrical` is stored
 * lower case.
 */
function prepareOrderOptions(options: Readonly<Record<string, string>>): {
  options: Record<string, string>;
  reports: ReportItem[];
} {
  const prepared = { ...options };
  const normalized: Record<string, ValuePair> = {};
  if (options.kind !== undefined) {
    const lower = options.kind.toLowerCase();
    const kind = { original: options.kind, normalized: lower.charAt(0).toUpperCase() + lower.slice(1) };
    normalized.kind = kind;
    prepared.kind = kind.normalized;
  }
  if (options.symmetrical !== undefined) {
    const symmetrical = {
      original: options.symmetrical,
      normalized: options.symmetrical.toLowerCase(),
    };
    normalized.symmetrical = symmetrical;
    prepared.symmetrical = symmetrical.normalized;
  }
  const reports = runCollectionOfOptionValidators(normalized, [
    valueIn('kind', ORDER_KINDS),
    valueIn('symmetrical', BOOLEANS),
  ]);
  return { options: prepared, reports };
}

function isScore(value: string): boolean {
  return INFINITY_SCORES.includes(value) || isInteger(value);
}

/**
 * A colocation without any score gets `INFINITY`.
 */
function prepareColocationOptions(options: Readonly<Record<string, string>>): {
  options: Record<string, string>;
  reports: ReportItem[];
} {
  const prepared = { ...options };
  const reports: ReportItem[] = [];
  const { score } = options;
  if (score !== undefined && !isScore(score)) {
    reports.push(error('InvalidScore', { score }));
  }
  const scoreNames = ['score', 'score-attribute', 'score-attribute-mangle'];
  if (!scoreNames.some((name) => options[name] !== undefined)) {
    prepared.score = 'INFINITY';
  }
  return { options: prepared, reports };
}

function prepareTicketOptions(options: Readonly<Record<string, string>>): {
  options: Record<string, string>;
  reports: ReportItem[];
} {
  const optionMap: OptionMap = options;
  const reports = runCollectionOfOptionValidators(optionMap, [
    isRequired('ticket', 'ticket constraint'),
    valueIn('loss-policy', LOSS_POLICIES),
  ]);
  if (options.ticket !== undefined) {
    reports.push(...validateId(options.ticket, 'ticket'));
  }
  return { options: { ...options }, reports };
}
