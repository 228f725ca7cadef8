/**
 * Field registration tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@invoice-codec/shared';
import { qname } from '@invoice-codec/xml';
import { Container } from './container.js';
import { Element, type ElementMeta } from './element.js';
import { fieldsOf, registerField } from './fields.js';
import { AmountValue, DecimalValue, TextValue } from './values.js';

const NS = 'urn:test:fields';
const t = (localName: string) => qname(NS, localName);

class BaseRecord extends Element {
  static override readonly meta: ElementMeta = { namespace: NS, tag: 'Record' };

  static readonly fields = {
    id: registerField(BaseRecord, 'id', () => new TextValue(t('ID'))),
    total: registerField(BaseRecord, 'total', () => new AmountValue(t('Total'))),
  };
}

class ExtendedRecord extends BaseRecord {
  static override readonly fields = {
    ...BaseRecord.fields,
    remark: registerField(ExtendedRecord, 'remark', () => new TextValue(t('Remark')), {
      default: false,
    }),
  };
}

describe('registerField', () => {
  it('should keep declaration order', () => {
    expect(fieldsOf(BaseRecord).map((field) => field.name)).toEqual(['id', 'total']);
  });

  it('should list inherited fields first', () => {
    expect(fieldsOf(ExtendedRecord).map((field) => field.name)).toEqual(['id', 'total', 'remark']);
  });

  it('should return the same list on every call', () => {
    expect(fieldsOf(ExtendedRecord)).toBe(fieldsOf(ExtendedRecord));
    expect(Object.isFrozen(fieldsOf(ExtendedRecord))).toBe(true);
  });

  it('should reject a name the class already declares', () => {
    expect(() => registerField(BaseRecord, 'id', () => new TextValue(t('Other')))).toThrow(
      ConfigurationError,
    );
  });

  it('should reject a name an ancestor declares', () => {
    expect(() => registerField(ExtendedRecord, 'total', () => new TextValue(t('Other')))).toThrow(
      ConfigurationError,
    );
  });

  it('should record the default flag', () => {
    expect(ExtendedRecord.fields.id.hasDefault).toBe(true);
    expect(ExtendedRecord.fields.remark.hasDefault).toBe(false);
  });

  it('should expose the tag of its values', () => {
    expect(BaseRecord.fields.total.tag).toEqual(t('Total'));
  });
});

describe('FieldSchema.accepts', () => {
  it('should match variant and tag', () => {
    const field = BaseRecord.fields.total;

    expect(field.accepts(new AmountValue(t('Total'), '1.00'))).toBe(true);
    expect(field.accepts(new AmountValue(t('Other')))).toBe(false);
    expect(field.accepts(new DecimalValue(t('Total')))).toBe(false);
  });

  it('should match element classes exactly', () => {
    const field = registerField(
      class Holder extends Element {
        static override readonly meta: ElementMeta = { namespace: NS, tag: 'Holder' };
      },
      'record',
      () => new BaseRecord(),
    );

    expect(field.accepts(new BaseRecord())).toBe(true);
    expect(field.accepts(new ExtendedRecord())).toBe(false);
  });

  it('should match containers by item tag', () => {
    const field = registerField(
      class Lines extends Element {
        static override readonly meta: ElementMeta = { namespace: NS, tag: 'Lines' };
      },
      'lines',
      () => new Container(() => new TextValue(t('Line'))),
    );

    expect(field.accepts(new Container(() => new TextValue(t('Line'))))).toBe(true);
    expect(field.accepts(new Container(() => new TextValue(t('Row'))))).toBe(false);
  });
});
