/**
 * Standard directive tests - styles, formats, fragments, images and links
 */

import { describe, it, expect } from 'vitest';
import { BlockSequence, DocumentFragment, PageBreak, Paragraph, RootElement, TargetFormat } from '../../ast/blocks.js';
import { Document, DocumentTree, DocumentTreeRoot } from '../../ast/documents.js';
import { Options } from '../../ast/element.js';
import type { Element } from '../../ast/element.js';
import { Path, Root } from '../../ast/path.js';
import { Icon, IconReference, Image, InvalidSpan, RawLink, SpanLink, SpanSequence, Text } from '../../ast/spans.js';
import { ExternalTarget, InternalTarget, ResolvedInternalTarget } from '../../ast/targets.js';
import { TemplateElement, TemplateString } from '../../ast/templates.js';
import { configOf } from '../../config/config.js';
import type { ConfigObject, ConfigValue } from '../../config/config.js';
import { ok } from '../../result.js';
import { RootCursor } from '../../rewrite/cursor.js';
import type { DocumentCursor } from '../../rewrite/cursor.js';
import { RewritePhase } from '../../rewrite/phases.js';
import { RewriteRules } from '../../rewrite/rewrite-rules.js';
import type { Directive, DirectiveContext } from '../api.js';
import { SpanDirectiveInstance } from '../instances.js';
import {
  api,
  attribute,
  blockFragment,
  blockImage,
  blockStyle,
  callout,
  format,
  pageBreak,
  sourceLink,
  spanIcon,
  spanImage,
  spanStyle,
  target
} from './standard.js';

function cursorFor(config: ConfigObject = {}): DocumentCursor {
  const doc = new Document({ path: Path.parse('/a/doc.md'), content: new RootElement([]), config: configOf(config) });
  const other = new Document({ path: Path.parse('/a/b.md'), content: new RootElement([]) });
  const root = new DocumentTreeRoot({
    tree: new DocumentTree({ path: Root, content: [new DocumentTree({ path: Path.parse('/a'), content: [doc, other] })] })
  });
  const [cursor] = new RootCursor(root).allDocuments;
  if (!cursor) throw new Error('cursor missing');
  return cursor;
}

interface Invocation {
  readonly positional?: ConfigValue[];
  readonly named?: ConfigObject;
  readonly body?: Element[];
  readonly config?: ConfigObject;
}

function run<E extends Element>(directive: Directive<E>, invocation: Invocation = {}) {
  const context: DirectiveContext = {
    name: directive.name,
    attributes: { positional: invocation.positional ?? [], named: invocation.named ?? {} },
    body: invocation.body ? { content: invocation.body, separators: [] } : undefined,
    cursor: cursorFor(invocation.config),
    source: `@:${directive.name}`,
    phase: RewritePhase.Build
  };
  return directive.process(context);
}

const p1 = new Paragraph([new Text('one')]);
const p2 = new Paragraph([new Text('two')]);

describe('Block directives - Styles and formats', () => {
  it('should wrap the body of a callout with the info style by default', () => {
    expect(run(callout, { body: [p1] })).toEqual({ ok: true, value: new BlockSequence([p1], Options.styles('callout', 'info')) });
  });

  it('should use the positional attribute as callout style', () => {
    expect(run(callout, { positional: ['warning'], body: [p1] }))
      .toEqual({ ok: true, value: new BlockSequence([p1], Options.styles('callout', 'warning')) });
  });

  it('should restrict the body to the listed formats', () => {
    expect(run(format, { positional: ['html', 'epub'], body: [p1] }))
      .toEqual({ ok: true, value: new TargetFormat(['html', 'epub'], p1) });
  });

  it('should reject a format directive without formats', () => {
    expect(run(format, { body: [p1] })).toEqual({ ok: false, error: ['no formats provided'] });
  });

  it('should add the style to a single block', () => {
    expect(run(blockStyle, { positional: ['note'], body: [p1] })).toEqual({ ok: true, value: p1.withStyles('note') });
  });

  it('should wrap several blocks in a styled sequence', () => {
    expect(run(blockStyle, { positional: ['note'], body: [p1, p2] }))
      .toEqual({ ok: true, value: new BlockSequence([p1, p2], Options.styles('note')) });
  });

  it('should style spans', () => {
    expect(run(spanStyle, { positional: ['key'], body: [new Text('a'), new Text('b')] }))
      .toEqual({ ok: true, value: new SpanSequence([new Text('a'), new Text('b')], Options.styles('key')) });
  });

  it('should require the body', () => {
    expect(run(blockStyle, { positional: ['note'] })).toEqual({ ok: false, error: ['required body is missing'] });
  });

  it('should reject elements of the wrong kind in the body', () => {
    expect(run(spanStyle, { positional: ['key'], body: [p1] }))
      .toEqual({ ok: false, error: ['unexpected Paragraph in the body of a span directive'] });
  });

  it('should create a page break', () => {
    expect(run(pageBreak)).toEqual({ ok: true, value: new PageBreak() });
  });
});

describe('Fragments', () => {
  it('should create a styled fragment', () => {
    expect(run(blockFragment, { positional: ['sidebar'], body: [p1] }))
      .toEqual({ ok: true, value: new DocumentFragment('sidebar', p1.withStyles('sidebar')) });
  });

  it('should move fragments out of the content when a document gets rewritten', () => {
    const doc = new Document({
      path: Path.parse('/doc.md'),
      content: new RootElement([p1, new BlockSequence([new DocumentFragment('side', p2)])])
    });
    const root = new DocumentTreeRoot({ tree: new DocumentTree({ path: Root, content: [doc] }) });
    const result = new RootCursor(root).rewriteTarget(() => ok(RewriteRules.empty));
    const [rewritten] = result.ok ? result.value.allDocuments : [];
    expect(rewritten?.content).toEqual(new RootElement([p1, new BlockSequence([])]));
    expect(rewritten?.fragments.get('side')).toEqual(p2);
  });
});

describe('Images and icons', () => {
  it('should create an image with a target relative to the document', () => {
    const result = run(spanImage, { positional: ['img/logo.png'], named: { alt: 'Logo', style: 'wide', width: '20px' } });
    expect(result).toEqual({
      ok: true,
      value: new Image(
        new InternalTarget(Path.parse('/a/img/logo.png')),
        { alt: 'Logo', width: '20px' },
        Options.styles('wide')
      )
    });
  });

  it('should wrap a block image in a paragraph', () => {
    const result = run(blockImage, { positional: ['https://example.com/x.png'] });
    expect(result).toEqual({
      ok: true,
      value: new Paragraph([new Image(new ExternalTarget('https://example.com/x.png'))], Options.styles('image-block'))
    });
  });

  it('should report invalid named attributes', () => {
    expect(run(spanImage, { positional: ['x.png'], named: { width: 20 } }))
      .toEqual({ ok: false, error: ["error converting attribute 'width': Expected string, received number"] });
  });

  it('should create an icon reference', () => {
    expect(run(spanIcon, { positional: ['warning'] })).toEqual({ ok: true, value: new IconReference('warning', '@:icon') });
  });

  it('should resolve icon references from the icons config when rendering', () => {
    const reference = new IconReference('warning', '@:icon(warning)');
    expect(reference.runsIn(RewritePhase.Build)).toBe(false);
    expect(reference.resolve(cursorFor({ icons: { warning: '!' } }))).toEqual(new Icon('warning', '!'));
    expect(reference.resolve(cursorFor())).toEqual(
      new InvalidSpan("Unresolved icon reference with key 'warning'", '@:icon(warning)')
    );
  });
});

describe('Links', () => {
  const apiConfig: ConfigObject = {
    links: {
      api: [
        { baseUri: 'https://api.example.com/' },
        { baseUri: 'https://internal.example.com/', packagePrefix: 'com.example.internal' },
        { baseUri: 'https://example.com/', packagePrefix: 'com.example' }
      ]
    }
  };

  const link = (text: string, uri: string): SpanLink => new SpanLink([new Text(text)], new ExternalTarget(uri));

  it('should link a method of a type', () => {
    expect(run(api, { positional: ['org.lib.Parser#parse'], config: apiConfig }))
      .toEqual({ ok: true, value: link('Parser.parse', 'https://api.example.com/org/lib/Parser.html#parse') });
  });

  it('should use the entry with the longest matching package prefix', () => {
    expect(run(api, { positional: ['com.example.internal.Impl'], config: apiConfig }))
      .toEqual({ ok: true, value: link('Impl', 'https://internal.example.com/com/example/internal/Impl.html') });
    expect(run(api, { positional: ['com.example.Api'], config: apiConfig }))
      .toEqual({ ok: true, value: link('Api', 'https://example.com/com/example/Api.html') });
  });

  it('should link the summary of a package', () => {
    expect(run(api, { positional: ['org.lib.package'], config: apiConfig }))
      .toEqual({ ok: true, value: link('org.lib', 'https://api.example.com/org/lib/index.html') });
  });

  it('should fail without a matching base URI', () => {
    expect(run(api, { positional: ['org.lib.Parser'] }))
      .toEqual({ ok: false, error: ["No base URI defined for 'org.lib.Parser' and no default URI available."] });
  });

  it('should link to the source of a type', () => {
    const config: ConfigObject = { links: { source: [{ baseUri: 'https://src.example.com/', suffix: 'ts' }] } };
    expect(run(sourceLink, { positional: ['org.lib.Parser'], config }))
      .toEqual({ ok: true, value: link('Parser', 'https://src.example.com/org/lib/Parser.ts') });
  });

  it('should turn a failing span directive into an invalid span', () => {
    const instance = new SpanDirectiveInstance(api, { positional: [], named: {} }, undefined, '@:api');
    expect(instance.resolve(cursorFor(), RewritePhase.Build)).toEqual(new InvalidSpan(
      "One or more errors processing directive 'api': required positional attribute at index 0 is missing",
      '@:api'
    ));
  });
});

describe('Template directives', () => {
  it('should render an attribute from a config value', () => {
    expect(run(attribute, { positional: ['title', 'site.title'], config: { site: { title: 'Home' } } }))
      .toEqual({ ok: true, value: new TemplateString(' title="Home"') });
  });

  it('should render nothing for a missing attribute value', () => {
    expect(run(attribute, { positional: ['title', 'site.title'] })).toEqual({ ok: true, value: new TemplateString('') });
  });

  it('should reject structured attribute values', () => {
    expect(run(attribute, { positional: ['title', 'site'], config: { site: { title: 'Home' } } })).toEqual({
      ok: false,
      error: ["value with key 'site' is a structured value (Array, Object, AST) which is not supported by this directive"]
    });
  });

  it('should render a validated target relative to the document', () => {
    expect(run(target, { positional: ['b.md'] })).toEqual({
      ok: true,
      value: new TemplateElement(new RawLink(new ResolvedInternalTarget(Path.parse('/a/b.md'), Path.parse('/a/b.md').relativeTo(Path.parse('/a')))))
    });
    expect(target.phase).toBe('render');
  });

  it('should pass external targets through', () => {
    expect(run(target, { positional: ['https://example.com'] }))
      .toEqual({ ok: true, value: new TemplateElement(new RawLink(new ExternalTarget('https://example.com'))) });
  });

  it('should report a missing target document', () => {
    expect(run(target, { positional: ['missing.md'] }))
      .toEqual({ ok: false, error: ['unresolved internal reference: /a/missing.md'] });
  });
});
