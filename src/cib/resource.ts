/**
 * Resource elements of the CIB.
 *
 * @packageDocumentation
 */

import type { CibElement } from './tree.js';

export const TAG_PRIMITIVE = 'primitive';
export const TAG_GROUP = 'group';
export const TAG_CLONE = 'clone';
export const TAG_MASTER = 'master';

/** Wrappers that run their content as multiple instances. */
export const TAGS_CLONE: readonly string[] = [TAG_CLONE, TAG_MASTER];

export const TAGS_ALL: readonly string[] = [TAG_PRIMITIVE, TAG_GROUP, ...TAGS_CLONE];

/**
 * Finds a resource (plain, group, clone or master) by id.
 */
export function findResourceById(tree: CibElement, id: string): CibElement | undefined {
  const root = tree.root();
  for (const node of [root, ...root.descendants()]) {
    if (node.id === id && TAGS_ALL.includes(node.tag)) {
      return node;
    }
  }
  return undefined;
}

export function isClone(node: CibElement): boolean {
  return TAGS_CLONE.includes(node.tag);
}
