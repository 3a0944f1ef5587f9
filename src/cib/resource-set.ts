/**
 * Resource sets: ordered groups of resource references inside a constraint.
 *
 * @packageDocumentation
 */

import { ReportListError } from '../reports/errors.js';
import { error } from '../reports/factory.js';
import type { ExportedResourceSet, ReportItem } from '../reports/types.js';
import { namesIn, runCollectionOfOptionValidators, valueIn } from '../validate/validators.js';
import { DEFAULT_ID_PREFIX, exportAttributes, findUniqueId } from './tools.js';
import { CibElement } from './tree.js';

export const TAG_RESOURCE_SET = 'resource_set';
export const TAG_RESOURCE_REF = 'resource_ref';

/**
 * A resource set as requested by the caller.
 */
export interface ResourceSetSpec {
  readonly ids: readonly string[];
  readonly options: Readonly<Record<string, string>>;
}

/**
 * Maps a requested resource id to the id the constraint should reference.
 */
export type ResourceIdResolver = (id: string) => string;

const SET_OPTIONS: ReadonlyMap<string, readonly string[]> = new Map([
  ['sequential', ['true', 'false']],
  ['require-all', ['true', 'false']],
  ['action', ['start', 'promote', 'demote', 'stop']],
  ['role', ['Stopped', 'Started', 'Master', 'Slave']],
]);

/**
 * Validates set-level options.
 */
export function validateSetOptions(options: Readonly<Record<string, string>>): ReportItem[] {
  return [
    ...namesIn([...SET_OPTIONS.keys()], Object.keys(options), 'set'),
    ...runCollectionOfOptionValidators(
      options,
      [...SET_OPTIONS.entries()].map(([name, allowed]) => valueIn(name, allowed))
    ),
  ];
}

/**
 * Validates a set request and resolves its resource ids.
 *
 * @param resolveId - Resolver applied to every id, may throw ReportListError.
 * @param spec - The requested set.
 * @returns The set with resolved ids.
 * @throws ReportListError for an empty set or invalid options.
 */
export function prepareSet(resolveId: ResourceIdResolver, spec: ResourceSetSpec): ResourceSetSpec {
  const reports = [
    ...(spec.ids.length === 0 ? [error('EmptyResourceSet', {})] : []),
    ...validateSetOptions(spec.options),
  ];
  if (reports.length > 0) {
    throw new ReportListError(reports);
  }
  return {
    ids: spec.ids.map((id) => resolveId(id)),
    options: { ...spec.options },
  };
}

/**
 * Appends a `resource_set` element with one `resource_ref` per id.
 *
 * @param parent - The constraint element receiving the set.
 * @param spec - A prepared set.
 * @param idPrefix - Prefix of the generated set id.
 */
export function createResourceSet(
  parent: CibElement,
  spec: ResourceSetSpec,
  idPrefix = DEFAULT_ID_PREFIX
): CibElement {
  const setElement = new CibElement(TAG_RESOURCE_SET, {
    id: findUniqueId(parent, `${idPrefix}_rsc_set_${spec.ids.join('_')}`),
    ...spec.options,
  });
  for (const id of spec.ids) {
    setElement.appendChild(new CibElement(TAG_RESOURCE_REF, { id }));
  }
  return parent.appendChild(setElement);
}

/**
 * Ordered ids referenced by a `resource_set` element.
 */
export function getResourceIdSetList(setElement: CibElement): string[] {
  return setElement
    .findDescendantsByTag(TAG_RESOURCE_REF)
    .map((ref) => ref.id)
    .filter((id): id is string => id !== undefined);
}

/**
 * Ordered id lists of prepared sets.
 */
export function extractIdSetList(resourceSetList: readonly ResourceSetSpec[]): string[][] {
  return resourceSetList.map((spec) => [...spec.ids]);
}

export function exportResourceSet(setElement: CibElement): ExportedResourceSet {
  return {
    ids: getResourceIdSetList(setElement),
    options: exportAttributes(setElement),
  };
}
