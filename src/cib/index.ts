/**
 * Configuration tree and constraint builder.
 *
 * @packageDocumentation
 */

export type { ConstraintType, CreateConstraintSettings } from './commands.js';
export { CONSTRAINT_TAGS, createConstraintWithSets, prepareTypeOptions } from './commands.js';
export {
  checkIsWithoutDuplication,
  createId,
  createWithSet,
  exportPlain,
  exportWithSet,
  findValidResourceId,
  haveDuplicateResourceSets,
  prepareOptions,
  prepareResourceSetList,
} from './constraint.js';
export {
  findResourceById,
  isClone,
  TAG_CLONE,
  TAG_GROUP,
  TAG_MASTER,
  TAG_PRIMITIVE,
  TAGS_ALL,
  TAGS_CLONE,
} from './resource.js';
export type { ResourceIdResolver, ResourceSetSpec } from './resource-set.js';
export {
  createResourceSet,
  exportResourceSet,
  extractIdSetList,
  getResourceIdSetList,
  prepareSet,
  TAG_RESOURCE_REF,
  TAG_RESOURCE_SET,
  validateSetOptions,
} from './resource-set.js';
export {
  checkNewIdApplicable,
  DEFAULT_ID_PREFIX,
  doesIdExist,
  exportAttributes,
  findUniqueId,
  getConstraints,
  getResources,
  validateId,
} from './tools.js';
export { CibElement, element } from './tree.js';
