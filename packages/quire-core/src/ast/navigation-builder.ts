/**
 * Navigation builder
 *
 * Creates navigation items for documents, trees and document sections.
 * The structure follows the tree: a tree item links to the title document
 * of the tree (if it has one) and contains the items of its content,
 * a document item contains the items of its sections.
 */

import { Document } from './documents.js';
import type { DocumentTree, SectionInfo } from './documents.js';
import { Options } from './element.js';
import { NavigationItem, NavigationLink } from './navigation.js';
import { Root } from './path.js';
import type { Path } from './path.js';
import { SpanSequence } from './spans.js';
import { InternalTarget } from './targets.js';

export interface NavigationBuilderContext {
  /** The path of the document the navigation gets rendered in */
  readonly refPath: Path;
  readonly itemStyles: readonly string[];
  readonly maxLevels: number;
  readonly currentLevel: number;
  readonly excludeSections: boolean;
  /** Leave out the item for the document the navigation gets rendered in */
  readonly excludeSelf: boolean;
}

export function navigationContext(init: Partial<NavigationBuilderContext> = {}): NavigationBuilderContext {
  return {
    refPath: Root,
    itemStyles: [],
    maxLevels: Number.MAX_SAFE_INTEGER,
    currentLevel: 1,
    excludeSections: false,
    excludeSelf: false,
    ...init
  };
}

function nextLevel(context: NavigationBuilderContext): NavigationBuilderContext {
  return { ...context, currentLevel: context.currentLevel + 1 };
}

function isComplete(context: NavigationBuilderContext): boolean {
  return context.currentLevel >= context.maxLevels;
}

function newItem(
  context: NavigationBuilderContext,
  title: SpanSequence,
  target: Path | undefined,
  children: readonly NavigationItem[],
  targetFormats?: readonly string[]
): NavigationItem {
  const options = Options.styles(`level${context.currentLevel}`, ...context.itemStyles);
  const link = target
    ? new NavigationLink(new InternalTarget(target).relativeTo(context.refPath), target.equals(context.refPath))
    : undefined;
  return new NavigationItem(title, children, link, targetFormats, options);
}

function hasLinks(item: NavigationItem): boolean {
  return item.link !== undefined || item.content.some(hasLinks);
}

function sectionItem(section: SectionInfo, docPath: Path, context: NavigationBuilderContext): NavigationItem {
  const children = isComplete(context)
    ? []
    : section.content.map(child => sectionItem(child, docPath, nextLevel(context)));
  return newItem(context, section.title, docPath.withFragment(section.id), children);
}

/**
 * Navigation items for the sections of a document, at the level of the context
 */
export function sectionNavigationItems(document: Document, context: NavigationBuilderContext): NavigationItem[] {
  return document.sections.map(section => sectionItem(section, document.path, context));
}

function documentItem(document: Document, context: NavigationBuilderContext): NavigationItem {
  const children = isComplete(context) || context.excludeSections
    ? []
    : sectionNavigationItems(document, nextLevel(context));
  return newItem(
    context,
    document.title ?? SpanSequence.text(document.path.name),
    document.path,
    children,
    document.targetFormats
  );
}

function treeItem(tree: DocumentTree, context: NavigationBuilderContext): NavigationItem {
  const isSelf = (content: Document | DocumentTree): boolean =>
    context.excludeSelf && content.path.equals(context.refPath);
  const children = isComplete(context)
    ? []
    : tree.content
      .filter(content => !isSelf(content))
      .map(content => navigationItemFor(content, nextLevel(context)))
      .filter(hasLinks);
  const title = tree.title ?? SpanSequence.text(tree.name);
  return newItem(context, title, tree.titleDocument?.path, children, tree.titleDocument?.targetFormats);
}

export function navigationItemFor(content: Document | DocumentTree, context: NavigationBuilderContext): NavigationItem {
  return content instanceof Document ? documentItem(content, context) : treeItem(content, context);
}
