/**
 * Id handling and section lookup on the configuration tree.
 *
 * @packageDocumentation
 */

import { ReportListError } from '../reports/errors.js';
import { error } from '../reports/factory.js';
import type { ReportItem } from '../reports/types.js';
import type { CibElement } from './tree.js';

/**
 * Prefix of generated constraint and resource set ids.
 */
export const DEFAULT_ID_PREFIX = 'ha';

const ID_FIRST_CHAR = /^[A-Za-z_]$/;
const ID_CHAR = /^[A-Za-z0-9_.-]$/;

/**
 * Whether any node in the whole tree of `tree` uses `id`.
 */
export function doesIdExist(tree: CibElement, id: string): boolean {
  return tree.root().findById(id) !== undefined;
}

/**
 * Returns `proposed`, or `proposed-1`, `proposed-2`, ... whichever is unused.
 */
export function findUniqueId(tree: CibElement, proposed: string): string {
  let candidate = proposed;
  let counter = 1;
  while (doesIdExist(tree, candidate)) {
    candidate = `${proposed}-${String(counter)}`;
    counter += 1;
  }
  return candidate;
}

/**
 * Checks XML id syntax: a letter or underscore, then letters, digits, `.`,
 * `-` or `_`.
 *
 * @param id - The id to check.
 * @param idDescription - What the id identifies, for the report.
 */
export function validateId(id: string, idDescription = 'id'): ReportItem<'InvalidId'>[] {
  const chars = [...id];
  const [first] = chars;
  if (first === undefined) {
    return [error('InvalidId', { id, idDescription, invalidCharacter: '', isFirstChar: true })];
  }
  if (!ID_FIRST_CHAR.test(first)) {
    return [error('InvalidId', { id, idDescription, invalidCharacter: first, isFirstChar: true })];
  }
  const invalid = chars.slice(1).find((char) => !ID_CHAR.test(char));
  if (invalid !== undefined) {
    return [
      error('InvalidId', { id, idDescription, invalidCharacter: invalid, isFirstChar: false }),
    ];
  }
  return [];
}

/**
 * Checks that `id` is valid and not used yet in the tree.
 */
export function checkNewIdApplicable(
  tree: CibElement,
  idDescription: string,
  id: string
): ReportItem[] {
  const syntax = validateId(id, idDescription);
  if (syntax.length > 0) {
    return syntax;
  }
  return doesIdExist(tree, id) ? [error('IdAlreadyExists', { id })] : [];
}

export function exportAttributes(node: CibElement): Record<string, string> {
  return node.attributes();
}

/**
 * Returns the constraints section of the tree.
 *
 * @throws ReportListError when the tree has no constraints section.
 */
export function getConstraints(tree: CibElement): CibElement {
  return getSection(tree, 'constraints');
}

/**
 * Returns the resources section of the tree.
 *
 * @throws ReportListError when the tree has no resources section.
 */
export function getResources(tree: CibElement): CibElement {
  return getSection(tree, 'resources');
}

function getSection(tree: CibElement, section: string): CibElement {
  const root = tree.root();
  const found = root.tag === section ? root : root.findDescendantsByTag(section)[0];
  if (found === undefined) {
    throw new ReportListError([error('CibSectionMissing', { section })]);
  }
  return found;
}
