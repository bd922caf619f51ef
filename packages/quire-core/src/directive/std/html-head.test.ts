/**
 * HTML head directive tests - linkCSS and linkJS
 */

import { describe, it, expect } from 'vitest';
import { RootElement } from '../../ast/blocks.js';
import { Document, DocumentTree, DocumentTreeRoot, StaticDocument } from '../../ast/documents.js';
import { Path, Root } from '../../ast/path.js';
import { RawLink } from '../../ast/spans.js';
import { InternalTarget } from '../../ast/targets.js';
import { TemplateElement, TemplateSpanSequence, TemplateString } from '../../ast/templates.js';
import { configOf } from '../../config/config.js';
import type { ConfigObject } from '../../config/config.js';
import { RootCursor } from '../../rewrite/cursor.js';
import { OutputContext, RewritePhase } from '../../rewrite/phases.js';
import type { Directive } from '../api.js';
import type { TemplateSpan } from '../../ast/element.js';
import { linkCSS, linkJS } from './html-head.js';

const statics = [
  new StaticDocument(Path.parse('/css/main.css'), ['html']),
  new StaticDocument(Path.parse('/guide/extra.css'), ['html']),
  new StaticDocument(Path.parse('/api/api.css'), ['html']),
  new StaticDocument(Path.parse('/print.css'), ['pdf']),
  new StaticDocument(Path.parse('/book/book.css'), ['epub.xhtml']),
  new StaticDocument(Path.parse('/js/app.js'), ['html'])
];

function run(directive: Directive<TemplateSpan>, context: OutputContext | undefined, config: ConfigObject = {}) {
  const doc = new Document({ path: Path.parse('/guide/doc.md'), content: new RootElement([]), config: configOf(config) });
  const tree = new DocumentTree({ path: Root, content: [new DocumentTree({ path: Path.parse('/guide'), content: [doc] })] });
  const root = new DocumentTreeRoot({ tree, staticDocuments: statics });
  const [cursor] = new RootCursor(root, context).allDocuments;
  if (!cursor) throw new Error('cursor missing');
  return directive.process({
    name: directive.name,
    attributes: { positional: [], named: {} },
    cursor,
    source: `@:${directive.name}`,
    phase: RewritePhase.Build
  });
}

function cssLink(path: string): TemplateSpan[] {
  return [
    new TemplateString('<link rel="stylesheet" type="text/css" href="'),
    new TemplateElement(new RawLink(new InternalTarget(Path.parse(path)).relativeTo(Path.parse('/guide/doc.md')))),
    new TemplateString('" />')
  ];
}

const html = new OutputContext('html');

describe('linkCSS directive', () => {
  it('should link all CSS documents for the format outside of the API path', () => {
    expect(run(linkCSS, html)).toEqual({
      ok: true,
      value: new TemplateSpanSequence([...cssLink('/css/main.css'), new TemplateString('\n    '), ...cssLink('/guide/extra.css')])
    });
  });

  it('should render the links relative to the document', () => {
    const result = run(linkCSS, html);
    const links = result.ok && result.value instanceof TemplateSpanSequence ? result.value.content : [];
    const targets = links.flatMap(span =>
      span instanceof TemplateElement && span.element instanceof RawLink && span.element.target.type === 'resolved'
        ? [span.element.target.relativePath.toString()]
        : []
    );
    expect(targets).toEqual(['../css/main.css', 'extra.css']);
  });

  it('should restrict the documents to the configured search paths', () => {
    const config: ConfigObject = { site: { css: { globalSearchPaths: ['/css'] } } };
    expect(run(linkCSS, html, config)).toEqual({ ok: true, value: new TemplateSpanSequence(cssLink('/css/main.css')) });
  });

  it('should add documents from the local search paths after the global ones', () => {
    const config: ConfigObject = { site: { css: { globalSearchPaths: ['/guide'], searchPaths: ['/css'] } } };
    expect(run(linkCSS, html, config)).toEqual({
      ok: true,
      value: new TemplateSpanSequence([...cssLink('/guide/extra.css'), new TemplateString('\n    '), ...cssLink('/css/main.css')])
    });
  });

  it('should link the EPUB documents for EPUB output', () => {
    expect(run(linkCSS, new OutputContext('xhtml', 'epub.xhtml')))
      .toEqual({ ok: true, value: new TemplateSpanSequence(cssLink('/book/book.css')) });
  });

  it('should render nothing for formats without link config', () => {
    expect(run(linkCSS, new OutputContext('pdf'))).toEqual({ ok: true, value: new TemplateSpanSequence([]) });
  });

  it('should render nothing without output context', () => {
    expect(run(linkCSS, undefined)).toEqual({ ok: true, value: TemplateSpanSequence.empty });
  });

  it('should run in the render phase', () => {
    expect(linkCSS.phase).toBe('render');
  });
});

describe('linkJS directive', () => {
  it('should render script elements', () => {
    expect(run(linkJS, html)).toEqual({
      ok: true,
      value: new TemplateSpanSequence([
        new TemplateString('<script src="'),
        new TemplateElement(new RawLink(new InternalTarget(Path.parse('/js/app.js')).relativeTo(Path.parse('/guide/doc.md')))),
        new TemplateString('"></script>')
      ])
    });
  });
});
