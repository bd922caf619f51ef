/**
 * Render phase rules
 *
 * Format filter, navigation filter, template formatting and the detection
 * of resolvers that are still unresolved when rendering starts.
 */

import { InvalidBlock, TargetFormat } from '../ast/blocks.js';
import type { TemplateSpan } from '../ast/element.js';
import { NavigationItem } from '../ast/navigation.js';
import { BlockResolver, SpanResolver, TemplateSpanResolver } from '../ast/resolvers.js';
import { InvalidSpan } from '../ast/spans.js';
import { EmbeddedRoot, TemplateElement, TemplateRoot, TemplateSpanSequence, TemplateString } from '../ast/templates.js';
import type { OutputContext } from './phases.js';
import { Remove, Replace, RewriteRules } from './rewrite-rules.js';

function matchesFormat(formats: readonly string[], context: OutputContext): boolean {
  return formats.includes(context.formatSelector) || formats.includes(context.fileSuffix);
}

/**
 * TargetFormat blocks for the current format get unwrapped, all others removed
 */
export function formatFilterRules(context: OutputContext): RewriteRules {
  return RewriteRules.forBlocks(block => {
    if (!(block instanceof TargetFormat)) return undefined;
    return matchesFormat(block.formats, context) ? Replace(block.element) : Remove;
  });
}

/**
 * Navigation items pointing to documents that are not rendered for the current format get removed
 */
export function navigationFilterRules(context: OutputContext): RewriteRules {
  return RewriteRules.forBlocks(block => {
    if (!(block instanceof NavigationItem) || block.targetFormats === undefined) return undefined;
    return matchesFormat(block.targetFormats, context) ? undefined : Remove;
  });
}

/**
 * The indentation of a line that only contains whitespace so far,
 * undefined if the text does not end with such a line
 */
function trailingIndent(text: string): number | undefined {
  const newline = text.lastIndexOf('\n');
  if (newline < 0) return undefined;
  const lastLine = text.slice(newline + 1);
  return /^[ \t]*$/.test(lastLine) ? lastLine.length : undefined;
}

/**
 * Give embedded elements the indentation of the template line they appear on,
 * so that renderers can indent multi-line output consistently
 */
export function indentTemplateSpans(spans: readonly TemplateSpan[]): TemplateSpan[] {
  let indent: number | undefined;
  return spans.map(span => {
    const previous = indent;
    indent = span instanceof TemplateString ? trailingIndent(span.content) : undefined;
    if (previous === undefined) return span;
    if (span instanceof TemplateElement || span instanceof EmbeddedRoot) return span.withIndent(previous);
    return span;
  });
}

export function formatTemplate(root: TemplateRoot): TemplateRoot {
  return root.withContent(indentTemplateSpans(root.content));
}

export const templateFormatterRules = RewriteRules.forTemplates(span => {
  if (!(span instanceof TemplateSpanSequence)) return undefined;
  return Replace(span.withContent(indentTemplateSpans(span.content)));
});

/**
 * Replace every resolver left in the tree with an invalid element.
 * Must run after the resolvers of the render phase had their chance.
 */
export const unresolvedDetectorRules = new RewriteRules({
  blockRules: [
    block => block instanceof BlockResolver
      ? Replace(new InvalidBlock(block.unresolvedMessage, block.source, block.options))
      : undefined
  ],
  spanRules: [
    span => span instanceof SpanResolver
      ? Replace(new InvalidSpan(span.unresolvedMessage, span.source, span.options))
      : undefined
  ],
  templateRules: [
    span => span instanceof TemplateSpanResolver
      ? Replace(new TemplateElement(new InvalidSpan(span.unresolvedMessage, span.source), 0, span.options))
      : undefined
  ]
});

export function renderRules(context: OutputContext): RewriteRules {
  return RewriteRules.concatAll([
    formatFilterRules(context),
    navigationFilterRules(context),
    templateFormatterRules
  ]);
}
