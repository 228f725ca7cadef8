/**
 * Element
 *
 * Base class of every composite document part. Subclasses declare their
 * children with `registerField` and their tag with `meta`; an instance owns
 * one slot per declared field, in declaration order, and encodes to and
 * decodes from a DocumentNode in that order.
 */

import type { DocumentNode, QName } from '@invoice-codec/contracts';
import {
  ConfigurationError,
  FieldTypeError,
  MissingValueError,
  TagMismatchError,
  UnknownElementError,
  UnknownFieldError,
} from '@invoice-codec/shared';
import { clark, qname, sameQName } from '@invoice-codec/xml';
import { decodeLeaf, encodeLeaf } from './leaf-codec.js';
import { describeValue, fieldsOf, tagOf, type FieldSchema, type Value } from './fields.js';

/**
 * Static description of an element class
 */
export interface ElementMeta {
  namespace: string;
  tag: string;
  /** Fixed attributes written on every encode */
  attributes?: Readonly<Record<string, string>>;
}

export abstract class Element {
  /**
   * Tag and fixed attributes of the class; null for classes that are reused
   * under several tags and take theirs from the constructor
   */
  static readonly meta: ElementMeta | null = null;

  readonly kind = 'element';
  readonly tag: QName;
  readonly attributes: Readonly<Record<string, string>>;

  private readonly fields: readonly FieldSchema[];
  private readonly slots = new Map<string, Value | null>();

  constructor(tag?: QName) {
    const { meta } = new.target;

    if (tag !== undefined) {
      this.tag = tag;
    } else if (meta !== null) {
      this.tag = qname(meta.namespace, meta.tag);
    } else {
      throw new ConfigurationError(`${new.target.name} has no tag`, { type: new.target.name });
    }

    this.attributes = meta?.attributes ?? {};
    this.fields = fieldsOf(new.target);

    for (const field of this.fields) {
      this.slots.set(field.name, field.hasDefault ? field.defaultFactory() : null);
    }
  }

  private slot(field: FieldSchema): Value | null {
    if (!this.fields.includes(field)) {
      throw new UnknownFieldError(field.name, clark(this.tag));
    }
    return this.slots.get(field.name) ?? null;
  }

  /**
   * Current value of a field, or null when unset.
   */
  get<V extends Value>(field: FieldSchema<V>): V | null {
    const value = this.slot(field);
    if (value === null || field.accepts(value)) {
      return value;
    }
    throw new FieldTypeError(field.name, describeValue(field.defaultFactory()), describeValue(value));
  }

  /**
   * Current value of a field.
   * @throws MissingValueError when the slot is null
   */
  require<V extends Value>(field: FieldSchema<V>): V {
    const value = this.get(field);
    if (value === null) {
      throw new MissingValueError(`Field '${field.name}' of ${clark(this.tag)} is not set`, {
        field: field.name,
        tag: clark(this.tag),
      });
    }
    return value;
  }

  /**
   * Assign a field. The value must have the variant and tag the field
   * declares; null empties the slot.
   */
  set<V extends Value>(field: FieldSchema<V>, value: V | null): this {
    this.slot(field);
    if (value !== null && !field.accepts(value)) {
      throw new FieldTypeError(
        field.name,
        describeValue(field.defaultFactory()),
        describeValue(value),
      );
    }
    this.slots.set(field.name, value);
    return this;
  }

  /**
   * Current value of a field, materializing it from the factory when unset.
   */
  ensure<V extends Value>(field: FieldSchema<V>): V {
    const current = this.get(field);
    if (current !== null) {
      return current;
    }
    const created = field.defaultFactory();
    this.slots.set(field.name, created);
    return created;
  }

  clear(field: FieldSchema): this {
    this.slot(field);
    this.slots.set(field.name, null);
    return this;
  }

  /**
   * Field names and values in declaration order.
   */
  entries(): [string, Value | null][] {
    return this.fields.map((field): [string, Value | null] => [
      field.name,
      this.slots.get(field.name) ?? null,
    ]);
  }

  /**
   * Encode to a node: fixed attributes, then every non-null slot in
   * declaration order.
   */
  encode(): DocumentNode {
    const node: DocumentNode = {
      tag: this.tag,
      attributes: { ...this.attributes },
      children: [],
    };

    for (const field of this.fields) {
      const value = this.slots.get(field.name) ?? null;
      if (value === null) {
        continue;
      }
      switch (value.kind) {
        case 'element':
          node.children.push(value.encode());
          break;
        case 'container':
          node.children.push(...value.encode());
          break;
        default:
          node.children.push(encodeLeaf(value));
      }
    }

    return node;
  }

  private childIndex(): Map<string, FieldSchema> {
    const index = new Map<string, FieldSchema>();

    for (const field of this.fields) {
      const value = this.slots.get(field.name) ?? null;
      const key = clark(value === null ? field.tag : tagOf(value));
      const clash = index.get(key);
      if (clash !== undefined) {
        throw new ConfigurationError(
          `Fields '${clash.name}' and '${field.name}' of ${clark(this.tag)} share the tag ${key}`,
          { tag: key },
        );
      }
      index.set(key, field);
    }

    return index;
  }

  /**
   * Decode a node into this element, in place.
   *
   * Every child must map to a declared field. Null slots are filled from the
   * field's factory before decoding; containers append. The first failure
   * aborts the call and leaves the element partially decoded.
   *
   * @throws TagMismatchError when the node's tag differs from this element's
   * @throws UnknownElementError for a child no field declares
   */
  decode(node: DocumentNode): this {
    if (!sameQName(node.tag, this.tag)) {
      throw new TagMismatchError(clark(this.tag), clark(node.tag));
    }

    const index = this.childIndex();

    for (const child of node.children) {
      const field = index.get(clark(child.tag));
      if (field === undefined) {
        throw new UnknownElementError(clark(child.tag), clark(this.tag));
      }

      let target = this.slots.get(field.name) ?? null;
      if (target === null) {
        target = field.defaultFactory();
        this.slots.set(field.name, target);
      }

      switch (target.kind) {
        case 'container':
          target.decodeAppend(child);
          break;
        case 'element':
          target.decode(child);
          break;
        default:
          decodeLeaf(target, child);
      }
    }

    return this;
  }
}
