/**
 * Field declarations
 *
 * Fields are registered once per element class and returned as typed
 * handles. The handle is the accessor key (`element.get(Header.fields.id)`)
 * and carries the runtime check used by `Element.set`.
 */

import type { QName } from '@invoice-codec/contracts';
import { ConfigurationError } from '@invoice-codec/shared';
import { clark, sameQName } from '@invoice-codec/xml';
import type { Container } from './container.js';
import type { Element } from './element.js';
import type { LeafValue } from './values.js';

export type ContainerItem = Element | LeafValue;

export type Value = LeafValue | Element | Container<ContainerItem>;

/**
 * Tag a value occupies in its parent; a container's items all share one.
 */
export function tagOf(value: Value): QName {
  return value.kind === 'container' ? value.itemTag : value.tag;
}

/**
 * Short description for error messages, e.g. `amount {urn:x}Total`
 */
export function describeValue(value: Value): string {
  return `${value.kind} ${clark(tagOf(value))}`;
}

function sameShape(value: Value, template: Value): boolean {
  if (value.kind !== template.kind || !sameQName(tagOf(value), tagOf(template))) {
    return false;
  }
  if (value.kind === 'element') {
    return Object.getPrototypeOf(value) === Object.getPrototypeOf(template);
  }
  return true;
}

export interface FieldSchema<V extends Value = Value> {
  readonly name: string;
  /** Whether a fresh element materializes this slot */
  readonly hasDefault: boolean;
  readonly defaultFactory: () => V;
  /** Tag the field occupies among its siblings */
  readonly tag: QName;
  /** Same variant and tag as the factory's values (same class for elements) */
  accepts(value: Value): value is V;
}

export interface FieldOptions {
  /**
   * Materialize the slot on construction
   * @default true
   */
  default?: boolean;
}

/** Any element class, abstract or not */
export type ElementClass = abstract new (...args: never[]) => Element;

const declaredFields = new WeakMap<object, FieldSchema[]>();
let resolvedFields = new WeakMap<object, readonly FieldSchema[]>();

/**
 * Declared fields of an element class: inherited first, then its own, in
 * registration order. The returned list is frozen and stable across calls.
 */
export function fieldsOf(type: object): readonly FieldSchema[] {
  const cached = resolvedFields.get(type);
  if (cached !== undefined) {
    return cached;
  }

  const parent: unknown = Object.getPrototypeOf(type);
  const inherited = typeof parent === 'function' ? fieldsOf(parent) : [];
  const fields = Object.freeze([...inherited, ...(declaredFields.get(type) ?? [])]);
  resolvedFields.set(type, fields);
  return fields;
}

/**
 * Declare a field on an element class.
 *
 * The factory is not called here, so it may reference classes declared later
 * in the module.
 *
 * @throws ConfigurationError when the class (or an ancestor) already has the name
 */
export function registerField<V extends Value>(
  owner: ElementClass,
  name: string,
  defaultFactory: () => V,
  options: FieldOptions = {},
): FieldSchema<V> {
  if (fieldsOf(owner).some((field) => field.name === name)) {
    throw new ConfigurationError(`Field '${name}' is already declared on ${owner.name}`, {
      field: name,
      owner: owner.name,
    });
  }

  let template: V | undefined;
  const sample = (): V => {
    template ??= defaultFactory();
    return template;
  };

  const field: FieldSchema<V> = {
    name,
    hasDefault: options.default ?? true,
    defaultFactory,
    get tag(): QName {
      return tagOf(sample());
    },
    accepts(value: Value): value is V {
      return sameShape(value, sample());
    },
  };

  const own = declaredFields.get(owner) ?? [];
  own.push(field);
  declaredFields.set(owner, own);
  // subclasses may have resolved against the old list
  resolvedFields = new WeakMap();

  return field;
}
