import type { DocumentNode, QName } from '@invoice-codec/contracts';
import { TagMismatchError } from '@invoice-codec/shared';
import { clark, sameQName } from '@invoice-codec/xml';
import { tagOf, type ContainerItem } from './fields.js';
import { decodeLeaf, encodeLeaf } from './leaf-codec.js';

function encodeItem(item: ContainerItem): DocumentNode {
  return item.kind === 'element' ? item.encode() : encodeLeaf(item);
}

/**
 * Ordered, repeatable run of same-tagged siblings (line items, notes, tax
 * breakdowns). Encodes to one node per item and nothing when empty.
 */
export class Container<T extends ContainerItem> {
  readonly kind = 'container';
  readonly itemTag: QName;

  private readonly factory: () => T;
  private readonly list: T[] = [];

  constructor(factory: () => T, items: Iterable<T> = []) {
    this.factory = factory;
    this.itemTag = tagOf(factory());
    for (const item of items) {
      this.append(item);
    }
  }

  get items(): readonly T[] {
    return this.list;
  }

  get length(): number {
    return this.list.length;
  }

  /**
   * @throws TagMismatchError when the item's tag differs from the container's
   */
  append(item: T): this {
    if (!sameQName(item.tag, this.itemTag)) {
      throw new TagMismatchError(clark(this.itemTag), clark(item.tag));
    }
    this.list.push(item);
    return this;
  }

  /**
   * Append a fresh item from the factory and return it.
   */
  add(): T {
    const item = this.factory();
    this.list.push(item);
    return item;
  }

  /**
   * Decode a node into a fresh item and append it.
   */
  decodeAppend(node: DocumentNode): T {
    const item = this.factory();
    const target: ContainerItem = item;
    if (target.kind === 'element') {
      target.decode(node);
    } else {
      decodeLeaf(target, node);
    }
    this.list.push(item);
    return item;
  }

  encode(): DocumentNode[] {
    return this.list.map(encodeItem);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.list[Symbol.iterator]();
  }
}
