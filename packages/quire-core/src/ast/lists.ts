/**
 * List, table and selection elements
 *
 * These containers have structural slots that are not plain block or span
 * sequences, so each one decides how its children get rewritten.
 */

import { Block, Element, Options, StructuralElement } from './element.js';
import type { RewritableContainer, Span } from './element.js';
import { BlockContainer } from './blocks.js';
import type { RewriteRules } from '../rewrite/rewrite-rules.js';

export class BulletListItem extends BlockContainer {
  readonly kind = 'BulletListItem';

  constructor(readonly content: readonly Block[], readonly bullet: string = '*', options?: Options) {
    super(options);
  }
}

export class EnumListItem extends BlockContainer {
  readonly kind = 'EnumListItem';

  constructor(readonly content: readonly Block[], readonly position: number, options?: Options) {
    super(options);
  }
}

/**
 * Rewrites list items as blocks and drops anything a rule replaced
 * with a block of another type
 */
function rewriteItems<T extends Block>(
  rules: RewriteRules,
  items: readonly T[],
  guard: (block: Block) => block is T
): T[] {
  return rules.rewriteBlocks(items).filter(guard);
}

export class BulletList extends Block implements RewritableContainer {
  readonly kind = 'BulletList';

  constructor(readonly content: readonly BulletListItem[], options?: Options) {
    super(options);
  }

  rewriteChildren(rules: RewriteRules): this {
    const isItem = (block: Block): block is BulletListItem => block instanceof BulletListItem;
    return this.copy({ content: rewriteItems(rules, this.content, isItem) });
  }

  override childElements(): readonly Element[] {
    return this.content;
  }
}

export class EnumList extends Block implements RewritableContainer {
  readonly kind = 'EnumList';

  constructor(readonly content: readonly EnumListItem[], options?: Options) {
    super(options);
  }

  rewriteChildren(rules: RewriteRules): this {
    const isItem = (block: Block): block is EnumListItem => block instanceof EnumListItem;
    return this.copy({ content: rewriteItems(rules, this.content, isItem) });
  }

  override childElements(): readonly Element[] {
    return this.content;
  }
}

export type CellType = 'head' | 'body';

export class Cell extends StructuralElement implements RewritableContainer {
  readonly kind = 'Cell';

  constructor(
    readonly type: CellType,
    readonly content: readonly Block[],
    readonly colspan: number = 1,
    readonly rowspan: number = 1,
    options?: Options
  ) {
    super(options);
  }

  rewriteChildren(rules: RewriteRules): this {
    return this.copy({ content: rules.rewriteBlocks(this.content) });
  }

  override childElements(): readonly Element[] {
    return this.content;
  }
}

export class Row extends StructuralElement implements RewritableContainer {
  readonly kind = 'Row';

  constructor(readonly content: readonly Cell[], options?: Options) {
    super(options);
  }

  rewriteChildren(rules: RewriteRules): this {
    return this.copy({ content: this.content.map(cell => cell.rewriteChildren(rules)) });
  }

  override childElements(): readonly Element[] {
    return this.content;
  }
}

export class TableHead extends StructuralElement implements RewritableContainer {
  readonly kind = 'TableHead';

  constructor(readonly content: readonly Row[], options?: Options) {
    super(options);
  }

  rewriteChildren(rules: RewriteRules): this {
    return this.copy({ content: this.content.map(row => row.rewriteChildren(rules)) });
  }

  override childElements(): readonly Element[] {
    return this.content;
  }
}

export class TableBody extends StructuralElement implements RewritableContainer {
  readonly kind = 'TableBody';

  constructor(readonly content: readonly Row[], options?: Options) {
    super(options);
  }

  rewriteChildren(rules: RewriteRules): this {
    return this.copy({ content: this.content.map(row => row.rewriteChildren(rules)) });
  }

  override childElements(): readonly Element[] {
    return this.content;
  }
}

export class Table extends Block implements RewritableContainer {
  readonly kind = 'Table';

  constructor(
    readonly head: TableHead,
    readonly body: TableBody,
    readonly caption: readonly Span[] = [],
    options?: Options
  ) {
    super(options);
  }

  rewriteChildren(rules: RewriteRules): this {
    return this.copy({
      head: this.head.rewriteChildren(rules),
      body: this.body.rewriteChildren(rules),
      caption: rules.rewriteSpans(this.caption)
    });
  }

  override childElements(): readonly Element[] {
    return [...this.caption, this.head, this.body];
  }
}

/**
 * One alternative of a Selection, e.g. the npm variant of an install instruction
 */
export class Choice extends StructuralElement implements RewritableContainer {
  readonly kind = 'Choice';

  constructor(
    readonly name: string,
    readonly label: string,
    readonly content: readonly Block[],
    options?: Options
  ) {
    super(options);
  }

  rewriteChildren(rules: RewriteRules): this {
    return this.copy({ content: rules.rewriteBlocks(this.content) });
  }

  override childElements(): readonly Element[] {
    return this.content;
  }
}

/**
 * Alternative content of which a renderer shows one choice at a time
 */
export class Selection extends Block implements RewritableContainer {
  readonly kind = 'Selection';

  constructor(readonly name: string, readonly choices: readonly Choice[], options?: Options) {
    super(options);
  }

  rewriteChildren(rules: RewriteRules): this {
    return this.copy({ choices: this.choices.map(choice => choice.rewriteChildren(rules)) });
  }

  override childElements(): readonly Element[] {
    return this.choices;
  }
}
