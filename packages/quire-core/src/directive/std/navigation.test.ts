/**
 * Navigation directive tests - navigationTree, breadcrumb and toc
 */

import { describe, it, expect } from 'vitest';
import { BlockSequence, Header, Paragraph, RootElement, Section } from '../../ast/blocks.js';
import { Document, DocumentTree, DocumentTreeRoot } from '../../ast/documents.js';
import { Options, extractText } from '../../ast/element.js';
import type { Block } from '../../ast/element.js';
import { NavigationList } from '../../ast/navigation.js';
import type { NavigationItem } from '../../ast/navigation.js';
import { Path, Root } from '../../ast/path.js';
import { Text } from '../../ast/spans.js';
import { ExternalTarget, ResolvedInternalTarget } from '../../ast/targets.js';
import { configOf } from '../../config/config.js';
import type { ConfigObject } from '../../config/config.js';
import { RootCursor } from '../../rewrite/cursor.js';
import type { DocumentCursor } from '../../rewrite/cursor.js';
import { RewritePhase } from '../../rewrite/phases.js';
import type { Directive } from '../api.js';
import { blockBreadcrumb, blockNavigationTree, blockToc } from './navigation.js';

const sections = new RootElement([
  new Section(new Header(1, [new Text('Intro')], Options.id('intro')), [
    new Section(new Header(2, [new Text('Details')], Options.id('details')), [])
  ])
]);

function cursorAt(path: string): DocumentCursor {
  const doc1 = new Document({ path: Path.parse('/doc1.md'), content: new RootElement([]), config: configOf({ title: 'Doc 1' }) });
  const readme = new Document({ path: Path.parse('/sub/README.md'), content: new RootElement([]), config: configOf({ title: 'Sub' }) });
  const doc2 = new Document({ path: Path.parse('/sub/doc2.md'), content: sections, config: configOf({ title: 'Doc 2' }) });
  const tree = new DocumentTree({
    path: Root,
    config: configOf({ title: 'Home' }),
    content: [doc1, new DocumentTree({ path: Path.parse('/sub'), content: [doc2], titleDocument: readme })]
  });
  const cursor = new RootCursor(new DocumentTreeRoot({ tree })).allDocuments.find(doc => doc.path.toString() === path);
  if (!cursor) throw new Error(`no cursor for ${path}`);
  return cursor;
}

interface ItemSummary {
  readonly title: string;
  readonly link?: string;
  readonly styles: string[];
  readonly children: ItemSummary[];
}

function summarize(item: NavigationItem): ItemSummary {
  const target = item.link?.target;
  const link = target instanceof ResolvedInternalTarget
    ? target.relativePath.toString()
    : target instanceof ExternalTarget ? target.url : undefined;
  return {
    title: extractText(item.title.content),
    link,
    styles: [...item.options.styles],
    children: item.content.map(summarize)
  };
}

function run(directive: Directive<Block>, named: ConfigObject, path = '/sub/doc2.md') {
  return directive.process({
    name: directive.name,
    attributes: { positional: [], named },
    cursor: cursorAt(path),
    source: `@:${directive.name}`,
    phase: RewritePhase.Resolve
  });
}

function items(named: ConfigObject): ItemSummary[] {
  const result = run(blockNavigationTree, named);
  if (!result.ok) throw new Error(result.error.join(', '));
  if (!(result.value instanceof NavigationList)) throw new Error('navigation list expected');
  return result.value.content.map(summarize);
}

const doc2Item: ItemSummary = {
  title: 'Doc 2',
  link: 'doc2.md',
  styles: ['level2'],
  children: [{
    title: 'Intro',
    link: 'doc2.md#intro',
    styles: ['level3'],
    children: [{ title: 'Details', link: 'doc2.md#details', styles: ['level4'], children: [] }]
  }]
};

describe('navigationTree directive', () => {
  it('should generate the items of the whole tree below the excluded root', () => {
    expect(items({ entries: [{ target: '/', excludeRoot: true }] })).toEqual([
      { title: 'Doc 1', link: '../doc1.md', styles: ['level1'], children: [] },
      { title: 'Sub', link: 'README.md', styles: ['level1'], children: [doc2Item] }
    ]);
  });

  it('should limit the depth', () => {
    expect(items({ entries: [{ target: '/', excludeRoot: true, depth: 1 }] })).toEqual([
      { title: 'Doc 1', link: '../doc1.md', styles: ['level1'], children: [] },
      { title: 'Sub', link: 'README.md', styles: ['level1'], children: [] }
    ]);
  });

  it('should leave out sections when configured', () => {
    expect(items({ entries: [{ target: '/sub' }], excludeSections: true })).toEqual([
      { title: 'Sub', link: 'README.md', styles: ['level1'], children: [{ ...doc2Item, children: [] }] }
    ]);
  });

  it('should override the title of a generated entry and add item styles', () => {
    expect(items({ entries: [{ target: '../doc1.md', title: 'First' }], itemStyles: ['nav'] })).toEqual([
      { title: 'First', link: '../doc1.md', styles: ['level1', 'nav'], children: [] }
    ]);
  });

  it('should mark the link to the current document', () => {
    const result = run(blockNavigationTree, { entries: [{ target: 'doc2.md', excludeSections: true }] });
    const [item] = result.ok && result.value instanceof NavigationList ? result.value.content : [];
    expect(item?.link?.selfLink).toBe(true);
  });

  it('should create manual entries with external links', () => {
    const named: ConfigObject = {
      entries: [{ title: 'Project', entries: [{ title: 'Issues', target: 'https://example.com/issues' }] }]
    };
    expect(items(named)).toEqual([{
      title: 'Project',
      styles: ['level1'],
      children: [{ title: 'Issues', link: 'https://example.com/issues', styles: ['level2'], children: [] }]
    }]);
  });

  it('should collect all errors', () => {
    const named: ConfigObject = { entries: [{ target: 'https://example.com' }, { target: '/missing' }] };
    expect(run(blockNavigationTree, named)).toEqual({
      ok: false,
      error: ['One or more errors generating navigation: manual navigation entries need a title,'
        + 'Unable to resolve document or tree with path: /missing']
    });
  });

  it('should report invalid attributes', () => {
    expect(run(blockNavigationTree, { defaultDepth: 'x' }))
      .toEqual({ ok: false, error: ['defaultDepth: Expected number, received string'] });
  });
});

describe('breadcrumb directive', () => {
  it('should list the trees from the root down to the document', () => {
    const result = run(blockBreadcrumb, {});
    expect(result.ok && result.value.options).toEqual(Options.styles('breadcrumb'));
    const list = result.ok && result.value instanceof NavigationList ? result.value.content : [];
    expect(list.map(summarize)).toEqual([
      { title: 'Home', styles: ['level1'], children: [] },
      { title: 'Sub', link: 'README.md', styles: ['level2'], children: [] },
      { title: 'Doc 2', link: 'doc2.md', styles: ['level3'], children: [] }
    ]);
  });

  it('should not repeat the title document of a tree', () => {
    const result = run(blockBreadcrumb, {}, '/sub/README.md');
    const list = result.ok && result.value instanceof NavigationList ? result.value.content : [];
    expect(list.map(item => extractText(item.title.content))).toEqual(['Home', 'Sub']);
  });
});

describe('toc directive', () => {
  it('should list the sections of the document below a title', () => {
    const result = run(blockToc, { title: 'Contents', depth: 1 });
    const content = result.ok && result.value instanceof BlockSequence ? result.value.content : [];
    const [title, list] = content;
    expect(result.ok && result.value.options).toEqual(Options.styles('toc'));
    expect(title).toEqual(new Paragraph([new Text('Contents')], Options.styles('toc', 'title')));
    expect(list instanceof NavigationList && list.content.map(summarize)).toEqual([
      { title: 'Intro', link: 'doc2.md#intro', styles: ['level1'], children: [] }
    ]);
  });

  it('should not provide the title of a document without title', () => {
    const result = run(blockToc, { title: 'Contents' });
    const blocks = result.ok ? [result.value] : [];
    const doc = new Document({ path: Path.parse('/plain.md'), content: new RootElement(blocks) });
    expect(blocks).toHaveLength(1);
    expect(doc.title).toBeUndefined();
  });

  it('should include nested sections without depth', () => {
    const result = run(blockToc, {});
    const [list] = result.ok && result.value instanceof BlockSequence ? result.value.content : [];
    expect(list instanceof NavigationList && list.content.map(summarize)).toEqual([{
      title: 'Intro',
      link: 'doc2.md#intro',
      styles: ['level1'],
      children: [{ title: 'Details', link: 'doc2.md#details', styles: ['level2'], children: [] }]
    }]);
  });
});
