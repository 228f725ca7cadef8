import type { QName } from '@invoice-codec/contracts';
import { Element } from '../core/element.js';
import { registerField } from '../core/fields.js';
import { DateValue, TextValue } from '../core/values.js';
import { ram } from '../namespaces.js';

/**
 * Reference to an order, contract or delivery note; the tag names which
 */
export class ReferencedDocument extends Element {
  static readonly fields = {
    issueDate: registerField(
      ReferencedDocument,
      'issueDate',
      () => new DateValue(ram('IssueDateTime')),
      { default: false },
    ),
    id: registerField(ReferencedDocument, 'id', () => new TextValue(ram('ID'))),
  };

  constructor(tag: QName) {
    super(tag);
  }
}
