import { Element, type ElementMeta } from '../core/element.js';
import { registerField } from '../core/fields.js';
import { IndicatorValue, TextValue } from '../core/values.js';
import { NS_RAM, NS_RSM, ram } from '../namespaces.js';

/** ZUGFeRD conformance level URNs */
export const ZUGFERD_PROFILES = {
  basic: 'urn:ferd:CrossIndustryDocument:invoice:1p0:basic',
  comfort: 'urn:ferd:CrossIndustryDocument:invoice:1p0:comfort',
  extended: 'urn:ferd:CrossIndustryDocument:invoice:1p0:extended',
} as const;

export class GuidelineParameter extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RAM,
    tag: 'GuidelineSpecifiedDocumentContextParameter',
  };

  static readonly fields = {
    id: registerField(GuidelineParameter, 'id', () => new TextValue(ram('ID'), ZUGFERD_PROFILES.basic)),
  };
}

export class DocumentContext extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RSM,
    tag: 'SpecifiedExchangedDocumentContext',
  };

  static readonly fields = {
    testIndicator: registerField(
      DocumentContext,
      'testIndicator',
      () => new IndicatorValue(ram('TestIndicator')),
      { default: false },
    ),
    guideline: registerField(DocumentContext, 'guideline', () => new GuidelineParameter()),
  };
}
