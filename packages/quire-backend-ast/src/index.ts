/**
 * AST Backend for Quire - element trees as an indented outline
 *
 * Prints every element on its own line, prefixed with one '. ' per nesting
 * level. Used to inspect the result of the rewrite phases and as the
 * formatter for DEBUG_REWRITE output.
 *
 *   Document - /doc.md
 *   RootElement
 *   . Title [id: intro]
 *   . . Text - 'Intro'
 *   . Paragraph {color: red}
 *   . . Text - 'Hello'
 */

import {
  Choice,
  DocumentFragment,
  ExternalTarget,
  Header,
  Icon,
  IconReference,
  Image,
  InternalTarget,
  InvalidBlock,
  InvalidSpan,
  OutputContext,
  RawLink,
  SectionNumber,
  Selection,
  SpanLink,
  StyleDeclarationSet,
  TargetFormat,
  isTextContainer
} from 'quire-core';
import type { Document, DocumentRenderer, Element, ElementFormatter, Options, Target } from 'quire-core';

function escapeText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/\n/g, '\\n')
    .replace(/'/g, "\\'");
}

function formatTarget(target: Target): string {
  if (target instanceof ExternalTarget) return target.url;
  if (target instanceof InternalTarget) return target.path.toString();
  return `${target.absolutePath} (${target.relativePath})`;
}

function formatOptions(options: Options): string {
  const parts: string[] = [];
  if (options.id !== undefined) parts.push(`id: ${options.id}`);
  if (options.styles.size > 0) parts.push(`styles: ${[...options.styles].join(', ')}`);
  return parts.length > 0 ? ` [${parts.join(', ')}]` : '';
}

/**
 * The element specific properties shown after the kind
 */
function details(element: Element): string[] {
  if (isTextContainer(element)) return [`'${escapeText(element.content)}'`];
  if (element instanceof Header) return [`level: ${element.level}`];
  if (element instanceof SpanLink || element instanceof RawLink || element instanceof Image) {
    return [`target: ${formatTarget(element.target)}`];
  }
  if (element instanceof InvalidBlock || element instanceof InvalidSpan) return [`message: ${element.message}`];
  if (element instanceof DocumentFragment) return [`name: ${element.name}`];
  if (element instanceof TargetFormat) return [`formats: ${element.formats.join(', ')}`];
  if (element instanceof SectionNumber) return [`position: ${element.position.join('.')}`];
  if (element instanceof Icon) return [`key: ${element.key}`, `glyph: ${element.glyph}`];
  if (element instanceof IconReference) return [`key: ${element.key}`];
  if (element instanceof Selection) return [`name: ${element.name}`];
  if (element instanceof Choice) return [`name: ${element.name}`, `label: ${element.label}`];
  return [];
}

/**
 * AST Writer - builds the outline of one element tree
 */
export class AstWriter {
  private output: string = '';
  private indentLevel: number = 0;

  constructor(private readonly styles: StyleDeclarationSet = StyleDeclarationSet.empty) {}

  /**
   * Output a single line at the current indentation
   */
  line(text: string): void {
    this.output += '. '.repeat(this.indentLevel) + text + '\n';
  }

  /**
   * Output an element and its descendants
   * @param parents the ancestors of the element, nearest first
   */
  element(element: Element, parents: readonly Element[] = []): this {
    const detail = details(element);
    const styles = this.styles.collectStyles(element, parents);
    const styleText = styles.size > 0
      ? ` {${[...styles].map(([name, value]) => `${name}: ${value}`).join('; ')}}`
      : '';
    this.line(
      element.kind
        + formatOptions(element.options)
        + (detail.length > 0 ? ` - ${detail.join(', ')}` : '')
        + styleText
    );

    this.indentLevel++;
    const ancestors = [element, ...parents];
    for (const child of element.childElements()) {
      this.element(child, ancestors);
    }
    this.indentLevel--;
    return this;
  }

  /**
   * Output a document with its content and its fragments
   */
  document(document: Document): this {
    this.line(`Document - ${document.path}`);
    this.element(document.content);
    for (const [name, fragment] of document.fragments) {
      this.line(`Fragment - ${name}`);
      this.indentLevel++;
      this.element(fragment);
      this.indentLevel--;
    }
    return this;
  }

  getOutput(): string {
    return this.output;
  }
}

/**
 * Renderer producing the outline of every document, for the `txt` output format
 */
export class AstRenderer implements DocumentRenderer {
  readonly outputContext = new OutputContext('txt');

  render(document: Document, styles: StyleDeclarationSet): string {
    return new AstWriter(styles).document(document).getOutput();
  }
}

/**
 * Formatter for debug output of the rewrite pipeline
 */
export const formatElement: ElementFormatter = element => new AstWriter().element(element).getOutput();

export function createAstRenderer(): DocumentRenderer {
  return new AstRenderer();
}
