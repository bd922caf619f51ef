/**
 * Navigation elements
 */

import { Block, Element, Options } from './element.js';
import type { RewritableContainer } from './element.js';
import { SpanSequence } from './spans.js';
import type { Target } from './targets.js';
import type { RewriteRules } from '../rewrite/rewrite-rules.js';

export class NavigationLink {
  constructor(readonly target: Target, readonly selfLink: boolean = false) {}
}

function rewriteNavigationItems(rules: RewriteRules, items: readonly NavigationItem[]): NavigationItem[] {
  return rules.rewriteBlocks(items).filter((block): block is NavigationItem => block instanceof NavigationItem);
}

/**
 * An entry of a navigation tree. Entries without link act as headers
 * for their children.
 */
export class NavigationItem extends Block implements RewritableContainer {
  readonly kind = 'NavigationItem';

  constructor(
    readonly title: SpanSequence,
    readonly content: readonly NavigationItem[],
    readonly link?: NavigationLink,
    readonly targetFormats?: readonly string[],
    options?: Options
  ) {
    super(options);
  }

  withTitle(title: SpanSequence): this {
    return this.copy({ title });
  }

  rewriteChildren(rules: RewriteRules): this {
    const title = rules.rewriteSpan(this.title);
    return this.copy({
      title: title instanceof SpanSequence ? title : new SpanSequence([title]),
      content: rewriteNavigationItems(rules, this.content)
    });
  }

  override childElements(): readonly Element[] {
    return [this.title, ...this.content];
  }
}

export class NavigationList extends Block implements RewritableContainer {
  readonly kind = 'NavigationList';

  constructor(readonly content: readonly NavigationItem[], options?: Options) {
    super(options);
  }

  withContent(content: readonly NavigationItem[]): this {
    return this.copy({ content });
  }

  rewriteChildren(rules: RewriteRules): this {
    return this.withContent(rewriteNavigationItems(rules, this.content));
  }

  override childElements(): readonly Element[] {
    return this.content;
  }
}
