/**
 * Constraint builder: resolves resource references, prepares options and
 * ids, detects duplicate constraints and appends new constraint elements.
 *
 * Resolution failures are thrown as {@link ReportListError} with
 * non-forceable errors; referencing the wrong resource would corrupt the tree.
 *
 * @packageDocumentation
 */

import { ReportListError } from '../reports/errors.js';
import { error, reportItem } from '../reports/factory.js';
import type { ExportedConstraint, ReportItem } from '../reports/types.js';
import { namesIn } from '../validate/validators.js';
import { findResourceById, isClone, TAG_MASTER, TAGS_CLONE } from './resource.js';
import {
  createResourceSet,
  exportResourceSet,
  extractIdSetList,
  getResourceIdSetList,
  prepareSet,
  TAG_RESOURCE_SET,
  type ResourceSetSpec,
} from './resource-set.js';
import { DEFAULT_ID_PREFIX, exportAttributes, findUniqueId } from './tools.js';
import { CibElement } from './tree.js';

/**
 * Returns the id a constraint should reference for resource `id`.
 *
 * A clone or master is referenced as is. A resource inside a clone is
 * replaced by the clone when `canRepairToClone`, kept when `inCloneAllowed`,
 * and refused otherwise.
 *
 * @param tree - Any node of the configuration tree.
 * @param canRepairToClone - Substitute the enclosing clone for the resource.
 * @param inCloneAllowed - Accept a reference to a resource inside a clone.
 * @param id - Requested resource id.
 * @throws ReportListError with ResourceNotFound, ResourceInClone or ResourceInMaster.
 */
export function findValidResourceId(
  tree: CibElement,
  canRepairToClone: boolean,
  inCloneAllowed: boolean,
  id: string
): string {
  const resource = findResourceById(tree, id);
  if (resource === undefined) {
    throw new ReportListError([error('ResourceNotFound', { resourceId: id })]);
  }
  if (isClone(resource)) {
    return id;
  }
  const clone = resource.findAncestor(TAGS_CLONE);
  if (clone === null) {
    return id;
  }
  const cloneId = clone.id ?? '';
  if (canRepairToClone) {
    return cloneId;
  }
  if (inCloneAllowed) {
    return id;
  }
  throw new ReportListError([
    clone.tag === TAG_MASTER
      ? error('ResourceInMaster', { resourceId: id, masterId: cloneId })
      : error('ResourceInClone', { resourceId: id, cloneId }),
  ]);
}

/**
 * Validates requested sets and resolves every resource id in them.
 */
export function prepareResourceSetList(
  tree: CibElement,
  canRepairToClone: boolean,
  inCloneAllowed: boolean,
  resourceSetList: readonly ResourceSetSpec[]
): ResourceSetSpec[] {
  const resolveId = (id: string): string =>
    findValidResourceId(tree, canRepairToClone, inCloneAllowed, id);
  return resourceSetList.map((spec) => prepareSet(resolveId, spec));
}

/**
 * Checks constraint option names and fills in the id.
 *
 * @param allowedNames - Accepted option names; `id` is always accepted.
 * @param options - Requested constraint options.
 * @param createId - Generates an id when none was requested.
 * @param validateId - Reports problems with a requested id.
 * @returns A copy of the options with `id` set.
 * @throws ReportListError for unknown names or a rejected id.
 */
export function prepareOptions(
  allowedNames: readonly string[],
  options: Readonly<Record<string, string>>,
  createId: () => string,
  validateId: (id: string) => ReportItem[]
): Record<string, string> {
  const nameReports = namesIn([...allowedNames, 'id'], Object.keys(options), 'constraint');
  if (nameReports.length > 0) {
    throw new ReportListError(nameReports);
  }
  const prepared = { ...options };
  const requestedId = options.id;
  if (requestedId === undefined) {
    prepared.id = createId();
    return prepared;
  }
  const idReports = validateId(requestedId);
  if (idReports.length > 0) {
    throw new ReportListError(idReports);
  }
  return prepared;
}

/**
 * Builds a unique id from the constraint type and the ids of each set, e.g.
 * `ha_order_set_A_B_set_C`.
 */
export function createId(
  tree: CibElement,
  typePrefix: string,
  resourceSetList: readonly ResourceSetSpec[],
  idPrefix = DEFAULT_ID_PREFIX
): string {
  const setsPart = extractIdSetList(resourceSetList)
    .map((idSet) => `_set_${idSet.join('_')}`)
    .join('');
  return findUniqueId(tree, `${idPrefix}_${typePrefix}${setsPart}`);
}

function idSetListOf(constraint: CibElement): string[][] {
  return constraint.findDescendantsByTag(TAG_RESOURCE_SET).map(getResourceIdSetList);
}

/**
 * Whether two constraints reference the same resources in the same sets, in
 * the same order.
 */
export function haveDuplicateResourceSets(constraint: CibElement, other: CibElement): boolean {
  const mine = idSetListOf(constraint);
  const theirs = idSetListOf(other);
  return (
    mine.length === theirs.length &&
    mine.every((ids, index) => {
      const otherIds = theirs[index];
      return (
        otherIds !== undefined &&
        ids.length === otherIds.length &&
        ids.every((id, i) => id === otherIds[i])
      );
    })
  );
}

/**
 * Fails when `constraint` duplicates another constraint of the same tag in
 * `section`.
 *
 * @param section - Constraints section to search.
 * @param constraint - The new constraint; it may already be in `section`.
 * @param areDuplicate - Duplicate predicate.
 * @param exportConstraint - Export used to list the conflicting constraints.
 * @throws ReportListError with a DuplicateConstraints error forceable by
 *   `FORCE_CONSTRAINT_DUPLICATE`.
 */
export function checkIsWithoutDuplication(
  section: CibElement,
  constraint: CibElement,
  areDuplicate: (a: CibElement, b: CibElement) => boolean,
  exportConstraint: (node: CibElement) => ExportedConstraint
): void {
  const duplicateList = section
    .findDescendantsByTag(constraint.tag)
    .filter((other) => other !== constraint && areDuplicate(constraint, other));
  if (duplicateList.length > 0) {
    throw new ReportListError([
      reportItem('DuplicateConstraints', 'ERROR', 'FORCE_CONSTRAINT_DUPLICATE', {
        constraintType: constraint.tag,
        constraints: duplicateList.map(exportConstraint),
      }),
    ]);
  }
}

export function exportWithSet(constraint: CibElement): ExportedConstraint {
  return {
    attributes: exportAttributes(constraint),
    resourceSets: constraint.findDescendantsByTag(TAG_RESOURCE_SET).map(exportResourceSet),
  };
}

export function exportPlain(constraint: CibElement): ExportedConstraint {
  return { attributes: exportAttributes(constraint) };
}

/**
 * Appends a constraint with one resource set per entry. Performs no
 * validation.
 *
 * @param section - Constraints section receiving the element.
 * @param tag - Constraint tag, e.g. `rsc_order`.
 * @param attributes - Prepared constraint options, including `id`.
 * @param resourceSetList - Prepared resource sets.
 * @param idPrefix - Prefix of generated set ids.
 * @returns The new constraint element.
 */
export function createWithSet(
  section: CibElement,
  tag: string,
  attributes: Readonly<Record<string, string>>,
  resourceSetList: readonly ResourceSetSpec[],
  idPrefix = DEFAULT_ID_PREFIX
): CibElement {
  const constraint = section.appendChild(new CibElement(tag, attributes));
  for (const spec of resourceSetList) {
    createResourceSet(constraint, spec, idPrefix);
  }
  return constraint;
}
