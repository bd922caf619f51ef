/**
 * Style selector tests - matching, specificity and merging
 */

import { describe, it, expect } from 'vitest';
import { BlockSequence, Paragraph, QuotedBlock } from '../ast/blocks.js';
import { Options } from '../ast/element.js';
import { Path, Root } from '../ast/path.js';
import { Text } from '../ast/spans.js';
import { Specificity, StyleDeclaration, StyleDeclarationSet, StylePredicate, StyleSelector } from './selectors.js';
import type { ParentSelector } from './selectors.js';

function declaration(predicates: StylePredicate[], styles: Record<string, string>, order: number, parent?: ParentSelector): StyleDeclaration {
  return new StyleDeclaration(new StyleSelector(predicates, parent, order), new Map(Object.entries(styles)));
}

function set(...styles: StyleDeclaration[]): StyleDeclarationSet {
  return new StyleDeclarationSet([Root], styles);
}

const paragraph = new Paragraph([new Text('p')], new Options('intro', new Set(['note'])));

describe('Specificity', () => {
  it('should compare ids before classes, types and order', () => {
    expect(new Specificity(1, 0, 0, 0).compare(new Specificity(0, 5, 5, 9))).toBe(1);
    expect(new Specificity(0, 1, 0, 0).compare(new Specificity(0, 0, 3, 9))).toBe(1);
    expect(new Specificity(0, 0, 1, 0).compare(new Specificity(0, 0, 1, 2))).toBe(-1);
    expect(new Specificity(0, 1, 1, 4).compare(new Specificity(0, 1, 1, 4))).toBe(0);
  });

  it('should add the specificity of the parent selector', () => {
    const parent: ParentSelector = { selector: new StyleSelector([StylePredicate.Id('main')]), immediate: false };
    const selector = new StyleSelector([StylePredicate.ElementType('Paragraph'), StylePredicate.StyleName('note')], parent, 7);
    expect(selector.specificity).toEqual(new Specificity(1, 1, 1, 7));
  });
});

describe('StyleSelector - Matching', () => {
  it('should require all predicates to match', () => {
    const selector = new StyleSelector([StylePredicate.ElementType('Paragraph'), StylePredicate.StyleName('note')]);
    expect(selector.matches(paragraph, [])).toBe(true);
    expect(selector.matches(new Paragraph([]), [])).toBe(false);
  });

  it('should match an immediate parent only when it is the direct parent', () => {
    const callout = new BlockSequence([], Options.styles('callout'));
    const quote = new QuotedBlock([], []);
    const selector = (immediate: boolean): StyleSelector => new StyleSelector(
      [StylePredicate.ElementType('Paragraph')],
      { selector: new StyleSelector([StylePredicate.StyleName('callout')]), immediate }
    );
    expect(selector(true).matches(paragraph, [callout, quote])).toBe(true);
    expect(selector(true).matches(paragraph, [quote, callout])).toBe(false);
    expect(selector(false).matches(paragraph, [quote, callout])).toBe(true);
    expect(selector(false).matches(paragraph, [quote])).toBe(false);
  });
});

describe('StyleDeclarationSet - collectStyles', () => {
  it('should let an id selector win over a style name selector declared later', () => {
    const styles = set(
      declaration([StylePredicate.Id('intro')], { color: 'red' }, 0),
      declaration([StylePredicate.StyleName('note')], { color: 'blue' }, 1)
    );
    expect(styles.collectStyles(paragraph, []).get('color')).toBe('red');
  });

  it('should let an id selector win over a style name selector declared earlier', () => {
    const styles = set(
      declaration([StylePredicate.StyleName('note')], { color: 'blue' }, 0),
      declaration([StylePredicate.Id('intro')], { color: 'red' }, 1)
    );
    expect(styles.collectStyles(paragraph, []).get('color')).toBe('red');
  });

  it('should let a style name selector win over a type selector', () => {
    const styles = set(
      declaration([StylePredicate.StyleName('note')], { color: 'blue' }, 0),
      declaration([StylePredicate.ElementType('Paragraph')], { color: 'black' }, 1)
    );
    expect(styles.collectStyles(paragraph, []).get('color')).toBe('blue');
  });

  it('should break ties by declaration order', () => {
    const styles = set(
      declaration([StylePredicate.StyleName('note')], { color: 'green' }, 2),
      declaration([StylePredicate.StyleName('note')], { color: 'blue' }, 1)
    );
    expect(styles.collectStyles(paragraph, []).get('color')).toBe('green');
  });

  it('should merge the properties of all matching declarations', () => {
    const styles = set(
      declaration([StylePredicate.ElementType('Paragraph')], { 'font-size': '10pt', color: 'black' }, 0),
      declaration([StylePredicate.StyleName('note')], { color: 'blue' }, 1),
      declaration([StylePredicate.StyleName('other')], { margin: '0' }, 2)
    );
    expect(Object.fromEntries(styles.collectStyles(paragraph, []))).toEqual({ 'font-size': '10pt', color: 'blue' });
  });
});

describe('StyleDeclarationSet - merge', () => {
  it('should move the declarations of the other set after the own declarations', () => {
    const own = new StyleDeclarationSet([Root], [
      declaration([StylePredicate.StyleName('note')], { color: 'blue' }, 0),
      declaration([StylePredicate.StyleName('note')], { margin: '1em' }, 3)
    ]);
    const other = new StyleDeclarationSet([Root, Path.parse('/guide')], [
      declaration([StylePredicate.StyleName('note')], { color: 'red' }, 0)
    ]);
    const merged = own.merge(other);
    expect(merged.styles.map(decl => decl.selector.order)).toEqual([0, 3, 4]);
    expect(merged.paths.map(path => path.toString())).toEqual(['/', '/guide']);
    expect(merged.collectStyles(paragraph, []).get('color')).toBe('red');
  });

  it('should merge into a set with a large number of declarations', () => {
    const own = set(...Array.from({ length: 200_000 }, (_, i) => declaration([StylePredicate.StyleName('note')], {}, i)));
    const merged = own.merge(set(declaration([StylePredicate.Id('x')], {}, 0)));
    expect(merged.styles.length).toBe(200_001);
    expect(merged.styles[200_000]?.selector.order).toBe(200_000);
  });

  it('should keep the orders when merging into an empty set', () => {
    const merged = new StyleDeclarationSet([Root], []).merge(set(declaration([StylePredicate.Id('x')], {}, 2)));
    expect(merged.styles.map(decl => decl.selector.order)).toEqual([2]);
  });
});

describe('StyleDeclarationSet - appliesToPath', () => {
  it('should apply to paths below its trees', () => {
    const styles = StyleDeclarationSet.forPaths([Path.parse('/guide')], []);
    expect(styles.appliesToPath(Path.parse('/guide/intro.md'))).toBe(true);
    expect(styles.appliesToPath(Path.parse('/api/index.md'))).toBe(false);
    expect(StyleDeclarationSet.empty.appliesToPath(Path.parse('/api/index.md'))).toBe(true);
  });
});
