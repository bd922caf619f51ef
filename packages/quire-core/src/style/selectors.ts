/**
 * Style selectors
 *
 * A CSS-like selector model for renderers that apply styles themselves
 * (e.g. page-oriented formats). Selectors match elements by type name,
 * id and style name, optionally constrained by a parent selector.
 * Precedence follows CSS specificity: ids, then style names, then types,
 * then declaration order.
 */

import type { Element } from '../ast/element.js';
import { Root } from '../ast/path.js';
import type { Path } from '../ast/path.js';

export class Specificity {
  static readonly zero = new Specificity(0, 0, 0, 0);

  constructor(
    readonly ids: number,
    readonly classes: number,
    readonly types: number,
    readonly order: number
  ) {}

  /**
   * Sum of the counts, the order of this instance is kept
   */
  add(other: Specificity): Specificity {
    return new Specificity(this.ids + other.ids, this.classes + other.classes, this.types + other.types, this.order);
  }

  withOrder(order: number): Specificity {
    return new Specificity(this.ids, this.classes, this.types, order);
  }

  compare(other: Specificity): number {
    return Math.sign(
      this.ids !== other.ids ? this.ids - other.ids
        : this.classes !== other.classes ? this.classes - other.classes
          : this.types !== other.types ? this.types - other.types
            : this.order - other.order
    );
  }
}

export type StylePredicate =
  | { readonly type: 'elementType'; readonly name: string }
  | { readonly type: 'id'; readonly id: string }
  | { readonly type: 'styleName'; readonly name: string };

export const StylePredicate = {
  ElementType: (name: string): StylePredicate => ({ type: 'elementType', name }),
  Id: (id: string): StylePredicate => ({ type: 'id', id }),
  StyleName: (name: string): StylePredicate => ({ type: 'styleName', name })
};

function predicateSpecificity(predicate: StylePredicate): Specificity {
  switch (predicate.type) {
    case 'id':
      return new Specificity(1, 0, 0, 0);
    case 'styleName':
      return new Specificity(0, 1, 0, 0);
    case 'elementType':
      return new Specificity(0, 0, 1, 0);
  }
}

function evaluate(predicate: StylePredicate, element: Element): boolean {
  switch (predicate.type) {
    case 'elementType':
      return element.kind === predicate.name;
    case 'id':
      return element.options.id === predicate.id;
    case 'styleName':
      return element.options.styles.has(predicate.name);
  }
}

export interface ParentSelector {
  readonly selector: StyleSelector;
  /** Only the direct parent may match, instead of any ancestor */
  readonly immediate: boolean;
}

export class StyleSelector {
  constructor(
    readonly predicates: readonly StylePredicate[] = [],
    readonly parent?: ParentSelector,
    readonly order: number = 0
  ) {}

  get specificity(): Specificity {
    const own = this.predicates
      .map(predicateSpecificity)
      .reduce((acc, spec) => acc.add(spec), Specificity.zero)
      .withOrder(this.order);
    return this.parent ? own.add(this.parent.selector.specificity) : own;
  }

  withOrder(order: number): StyleSelector {
    return new StyleSelector(this.predicates, this.parent, order);
  }

  /**
   * @param parents the ancestors of the target, innermost first
   */
  matches(target: Element, parents: readonly Element[]): boolean {
    if (!this.predicates.every(predicate => evaluate(predicate, target))) return false;
    const parent = this.parent;
    if (!parent) return true;
    if (parent.immediate) {
      const [direct, ...rest] = parents;
      return direct !== undefined && parent.selector.matches(direct, rest);
    }
    return parents.some((ancestor, index) => parent.selector.matches(ancestor, parents.slice(index + 1)));
  }
}

export class StyleDeclaration {
  constructor(
    readonly selector: StyleSelector,
    readonly styles: ReadonlyMap<string, string>
  ) {}

  static of(predicate: StylePredicate, styles: Record<string, string>): StyleDeclaration {
    return new StyleDeclaration(new StyleSelector([predicate]), new Map(Object.entries(styles)));
  }

  appliesTo(element: Element, parents: readonly Element[]): boolean {
    return this.selector.matches(element, parents);
  }

  increaseOrderBy(amount: number): StyleDeclaration {
    if (amount === 0) return this;
    return new StyleDeclaration(this.selector.withOrder(this.selector.order + amount), this.styles);
  }
}

export class StyleDeclarationSet {
  static readonly empty = new StyleDeclarationSet([Root], []);

  constructor(
    /** The trees the declarations apply to */
    readonly paths: readonly Path[],
    readonly styles: readonly StyleDeclaration[]
  ) {}

  static forPaths(paths: readonly Path[], styles: readonly StyleDeclaration[]): StyleDeclarationSet {
    return new StyleDeclarationSet(paths, styles);
  }

  appliesToPath(path: Path): boolean {
    return this.paths.some(root => path.isSubPath(root));
  }

  /**
   * The merged styles of all matching declarations. Declarations with
   * higher specificity override declarations with lower specificity.
   */
  collectStyles(target: Element, parents: readonly Element[]): Map<string, string> {
    const matching = this.styles
      .filter(decl => decl.appliesTo(target, parents))
      .sort((a, b) => a.selector.specificity.compare(b.selector.specificity));
    const result = new Map<string, string>();
    for (const decl of matching) {
      for (const [key, value] of decl.styles) result.set(key, value);
    }
    return result;
  }

  /**
   * Combine both sets. The declarations of the other set come after all
   * declarations of this set, so they win over equal specificity.
   */
  merge(other: StyleDeclarationSet): StyleDeclarationSet {
    const maxOrder = this.styles.reduce((max, decl) => Math.max(max, decl.selector.order + 1), 0);
    const paths = [...this.paths, ...other.paths.filter(path => !this.paths.some(own => own.equals(path)))];
    return new StyleDeclarationSet(paths, [...this.styles, ...other.styles.map(decl => decl.increaseOrderBy(maxOrder))]);
  }

  increaseOrderBy(amount: number): StyleDeclarationSet {
    return new StyleDeclarationSet(this.paths, this.styles.map(decl => decl.increaseOrderBy(amount)));
  }
}
