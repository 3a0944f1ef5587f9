/**
 * Generic labeled tree holding the CIB (resources and constraints).
 *
 * Children are owned by their parent; each node keeps a non-owning reference
 * back to its parent for ancestor lookups.
 *
 * @packageDocumentation
 */

/**
 * A node of the configuration tree.
 *
 * @example
 * ```typescript
 * const cib = element('cib', {}, [
 *   element('resources', {}, [
 *     element('clone', { id: 'web-clone' }, [element('primitive', { id: 'web' })]),
 *   ]),
 *   element('constraints'),
 * ]);
 * cib.findById('web')?.findAncestor(['clone'])?.id; // "web-clone"
 * ```
 */
export class CibElement {
  readonly tag: string;
  private readonly attributeMap: Map<string, string>;
  private readonly childList: CibElement[] = [];
  private parentRef: CibElement | null = null;

  constructor(tag: string, attributes: Readonly<Record<string, string>> = {}) {
    this.tag = tag;
    this.attributeMap = new Map(Object.entries(attributes));
  }

  get parent(): CibElement | null {
    return this.parentRef;
  }

  get children(): readonly CibElement[] {
    return this.childList;
  }

  /** Value of the `id` attribute. */
  get id(): string | undefined {
    return this.attributeMap.get('id');
  }

  getAttribute(name: string): string | undefined {
    return this.attributeMap.get(name);
  }

  setAttribute(name: string, value: string): this {
    this.attributeMap.set(name, value);
    return this;
  }

  setAttributes(attributes: Readonly<Record<string, string>>): this {
    for (const [name, value] of Object.entries(attributes)) {
      this.attributeMap.set(name, value);
    }
    return this;
  }

  /** Copy of the attributes in insertion order. */
  attributes(): Record<string, string> {
    return Object.fromEntries(this.attributeMap);
  }

  /**
   * Appends `child`, detaching it from its previous parent first.
   *
   * @returns The appended child.
   */
  appendChild(child: CibElement): CibElement {
    child.parentRef?.removeChild(child);
    this.childList.push(child);
    child.parentRef = this;
    return child;
  }

  removeChild(child: CibElement): boolean {
    const index = this.childList.indexOf(child);
    if (index === -1) {
      return false;
    }
    this.childList.splice(index, 1);
    child.parentRef = null;
    return true;
  }

  root(): CibElement {
    let node: CibElement = this;
    while (node.parentRef !== null) {
      node = node.parentRef;
    }
    return node;
  }

  /** All descendants in document order, excluding this node. */
  *descendants(): Generator<CibElement> {
    for (const child of this.childList) {
      yield child;
      yield* child.descendants();
    }
  }

  findDescendantsByTag(tag: string): CibElement[] {
    return [...this.descendants()].filter((node) => node.tag === tag);
  }

  /**
   * Nearest proper ancestor whose tag is one of `tags`.
   */
  findAncestor(tags: readonly string[]): CibElement | null {
    let node = this.parentRef;
    while (node !== null) {
      if (tags.includes(node.tag)) {
        return node;
      }
      node = node.parentRef;
    }
    return null;
  }

  /**
   * First node, this one included, whose `id` attribute equals `id`.
   */
  findById(id: string): CibElement | undefined {
    if (this.id === id) {
      return this;
    }
    for (const node of this.descendants()) {
      if (node.id === id) {
        return node;
      }
    }
    return undefined;
  }
}

/**
 * Builds a subtree in one expression.
 *
 * @param tag - Tag of the new node.
 * @param attributes - Attributes of the new node.
 * @param children - Children appended in order.
 */
export function element(
  tag: string,
  attributes: Readonly<Record<string, string>> = {},
  children: readonly CibElement[] = []
): CibElement {
  const node = new CibElement(tag, attributes);
  for (const child of children) {
    node.appendChild(child);
  }
  return node;
}
