/**
 * Render rule tests - format filter, navigation filter, template indentation
 * and the detection of unresolved elements
 */

import { describe, it, expect } from 'vitest';
import { InvalidBlock, Paragraph, TargetFormat } from '../ast/blocks.js';
import { NavigationItem, NavigationList } from '../ast/navigation.js';
import { IconReference, InvalidSpan, SpanSequence, Text } from '../ast/spans.js';
import { TemplateElement, TemplateString } from '../ast/templates.js';
import { noAttributes } from '../directive/api.js';
import { BlockDirectiveInstance } from '../directive/instances.js';
import { callout } from '../directive/std/standard.js';
import { OutputContext } from './phases.js';
import { formatFilterRules, indentTemplateSpans, navigationFilterRules, unresolvedDetectorRules } from './render-rules.js';

const html = new OutputContext('html');
const p1 = new Paragraph([new Text('one')]);
const p2 = new Paragraph([new Text('two')]);

describe('formatFilterRules', () => {
  it('should unwrap blocks for the current format and remove all others', () => {
    const blocks = [new TargetFormat(['html'], p1), new TargetFormat(['pdf'], p2)];
    expect(formatFilterRules(html).rewriteBlocks(blocks)).toEqual([p1]);
  });

  it('should match the file suffix as well as the format selector', () => {
    const epub = new OutputContext('xhtml', 'epub.xhtml');
    const blocks = [new TargetFormat(['xhtml'], p1), new TargetFormat(['epub.xhtml'], p2), new TargetFormat(['epub'], p1)];
    expect(formatFilterRules(epub).rewriteBlocks(blocks)).toEqual([p1, p2]);
  });
});

describe('navigationFilterRules', () => {
  it('should remove items for documents not rendered in the current format', () => {
    const pdfOnly = new NavigationItem(SpanSequence.text('PDF'), [], undefined, ['pdf']);
    const all = new NavigationItem(SpanSequence.text('All'), []);
    const htmlOnly = new NavigationItem(SpanSequence.text('HTML'), [], undefined, ['html']);
    const list = new NavigationList([pdfOnly, all, htmlOnly]);
    expect(navigationFilterRules(html).rewriteBlock(list)).toEqual(new NavigationList([all, htmlOnly]));
  });
});

describe('indentTemplateSpans', () => {
  it('should indent elements that follow a whitespace-only line', () => {
    const spans = [
      new TemplateString('<div>\n    '),
      new TemplateElement(p1),
      new TemplateString('x'),
      new TemplateElement(p2)
    ];
    expect(indentTemplateSpans(spans)).toEqual([
      new TemplateString('<div>\n    '),
      new TemplateElement(p1, 4),
      new TemplateString('x'),
      new TemplateElement(p2)
    ]);
  });

  it('should not indent elements on a line with other text', () => {
    const spans = [new TemplateString('<div>\n  <p>'), new TemplateElement(p1)];
    expect(indentTemplateSpans(spans)).toEqual(spans);
  });
});

describe('unresolvedDetectorRules', () => {
  it('should replace unresolved spans with invalid spans', () => {
    expect(unresolvedDetectorRules.rewriteSpans([new Text('a'), new IconReference('x', '@:icon(x)')])).toEqual([
      new Text('a'),
      new InvalidSpan("Unresolved icon reference with key 'x'", '@:icon(x)')
    ]);
  });

  it('should replace unresolved blocks with invalid blocks', () => {
    const instance = new BlockDirectiveInstance(callout, noAttributes, undefined, '@:callout');
    expect(unresolvedDetectorRules.rewriteBlocks([instance])).toEqual([
      new InvalidBlock("Unresolved block directive instance with name 'callout'", '@:callout')
    ]);
  });
});
