import { Container } from '../core/container.js';
import { Element, type ElementMeta } from '../core/element.js';
import { registerField } from '../core/fields.js';
import { DateValue, IndicatorValue, TextValue } from '../core/values.js';
import { NS_RAM, NS_RSM, ram } from '../namespaces.js';

/** UNTDID 1001 commercial invoice */
export const INVOICE_TYPE_CODE = '380';

/**
 * Free-text note; `subjectCode` qualifies it (UNTDID 4451, e.g. REG)
 */
export class Note extends Element {
  static override readonly meta: ElementMeta = { namespace: NS_RAM, tag: 'IncludedNote' };

  static readonly fields = {
    content: registerField(Note, 'content', () => new TextValue(ram('Content'))),
    subjectCode: registerField(Note, 'subjectCode', () => new TextValue(ram('SubjectCode')), {
      default: false,
    }),
  };
}

export class Header extends Element {
  static override readonly meta: ElementMeta = { namespace: NS_RSM, tag: 'HeaderExchangedDocument' };

  static readonly fields = {
    id: registerField(Header, 'id', () => new TextValue(ram('ID'))),
    name: registerField(Header, 'name', () => new TextValue(ram('Name'), 'RECHNUNG')),
    typeCode: registerField(Header, 'typeCode', () => new TextValue(ram('TypeCode'), INVOICE_TYPE_CODE)),
    issueDate: registerField(Header, 'issueDate', () => new DateValue(ram('IssueDateTime')), {
      default: false,
    }),
    copyIndicator: registerField(
      Header,
      'copyIndicator',
      () => new IndicatorValue(ram('CopyIndicator')),
      { default: false },
    ),
    languageId: registerField(Header, 'languageId', () => new TextValue(ram('LanguageID')), {
      default: false,
    }),
    notes: registerField(Header, 'notes', () => new Container(() => new Note())),
  };
}
