/**
 * AST Backend tests - outline formatting and rendering of processed trees
 */

import { describe, it, expect } from 'vitest';
import {
  Document,
  DocumentFragment,
  DocumentTree,
  DocumentTreeRoot,
  Emphasized,
  ExternalTarget,
  Header,
  InternalTarget,
  InvalidSpan,
  Options,
  Paragraph,
  Path,
  Root,
  RootElement,
  SpanLink,
  StyleDeclaration,
  StyleDeclarationSet,
  StylePredicate,
  Text,
  renderTree
} from 'quire-core';
import { AstRenderer, formatElement } from './index.js';

const redParagraphs = new StyleDeclarationSet([Root], [
  StyleDeclaration.of(StylePredicate.ElementType('Paragraph'), { color: 'red', margin: '0' })
]);

describe('formatElement', () => {
  it('should print one line per element with the nesting level', () => {
    const paragraph = new Paragraph([new Text('Hello '), new Emphasized([new Text('world')])]);
    expect(formatElement(paragraph)).toBe(
      'Paragraph\n'
      + ". Text - 'Hello '\n"
      + '. Emphasized\n'
      + ". . Text - 'world'\n"
    );
  });

  it('should print id and styles', () => {
    const paragraph = new Paragraph([], new Options('intro', new Set(['note', 'wide'])));
    expect(formatElement(paragraph)).toBe('Paragraph [id: intro, styles: note, wide]\n');
    expect(formatElement(new Paragraph([], Options.styles('note')))).toBe('Paragraph [styles: note]\n');
  });

  it('should escape line breaks and quotes in text', () => {
    expect(formatElement(new Text("it's\nnew"))).toBe("Text - 'it\\'s\\nnew'\n");
  });

  it('should print the details of headers, links and invalid elements', () => {
    expect(formatElement(new Header(2, []))).toBe('Header - level: 2\n');
    expect(formatElement(new SpanLink([], new ExternalTarget('https://example.com'))))
      .toBe('SpanLink - target: https://example.com\n');
    expect(formatElement(new SpanLink([], new InternalTarget(Path.parse('/a/b.md')).relativeTo(Path.parse('/a/c.md')))))
      .toBe('SpanLink - target: /a/b.md (b.md)\n');
    expect(formatElement(new InvalidSpan('broken', '@:x'))).toBe('InvalidSpan - message: broken\n');
  });
});

describe('AstRenderer', () => {
  it('should render the content and the fragments of a document', () => {
    const document = new Document({
      path: Path.parse('/doc.md'),
      content: new RootElement([new Paragraph([new Text('Hello')])]),
      fragments: new Map([['side', new Paragraph([new Text('Aside')])]])
    });
    expect(new AstRenderer().render(document, StyleDeclarationSet.empty)).toBe(
      'Document - /doc.md\n'
      + 'RootElement\n'
      + '. Paragraph\n'
      + ". . Text - 'Hello'\n"
      + 'Fragment - side\n'
      + '. Paragraph\n'
      + ". . Text - 'Aside'\n"
    );
  });

  it('should print the collected styles', () => {
    const document = new Document({
      path: Path.parse('/doc.md'),
      content: new RootElement([new DocumentFragment('f', new Paragraph([]))])
    });
    expect(new AstRenderer().render(document, redParagraphs)).toBe(
      'Document - /doc.md\n'
      + 'RootElement\n'
      + '. DocumentFragment - name: f\n'
      + '. . Paragraph {color: red; margin: 0}\n'
    );
  });

  it('should render for the txt format', () => {
    expect(new AstRenderer().outputContext.fileSuffix).toBe('txt');
  });
});

describe('renderTree with the AST renderer', () => {
  it('should render the documents after all rewrite phases', () => {
    const doc = new Document({
      path: Path.parse('/doc.md'),
      content: new RootElement([new Header(1, [new Text('Intro')]), new Paragraph([new Text('Hello')])])
    });
    const root = new DocumentTreeRoot({
      tree: new DocumentTree({ path: Root, content: [doc] }),
      styles: new Map([['txt', redParagraphs]])
    });
    const result = renderTree(root, new AstRenderer());
    expect(result.ok && result.value.map(rendered => rendered.path.toString())).toEqual(['/doc.md']);
    expect(result.ok && result.value[0]?.content).toBe(
      'Document - /doc.md\n'
      + 'RootElement\n'
      + '. Title [id: intro]\n'
      + ". . Text - 'Intro'\n"
      + '. Paragraph {color: red; margin: 0}\n'
      + ". . Text - 'Hello'\n"
    );
  });
});
