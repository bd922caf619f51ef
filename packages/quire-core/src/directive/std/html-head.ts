/**
 * linkCSS and linkJS
 *
 * Template directives for the head of HTML and EPUB templates. They render
 * a link element for every static CSS or JavaScript document that is
 * published for the current output format. Both run in the render phase,
 * since the selection depends on the format.
 *
 * The documents are searched in the paths configured under `site.css` and
 * `site.js` (HTML) or `epub.css` and `epub.js` (EPUB):
 *
 *   site.css {
 *     globalSearchPaths = ["/css"]   # rendered for every document
 *     searchPaths = ["/guide/css"]   # per document, by config inheritance
 *   }
 *
 * Documents below `site.apiPath` (default /api) are never linked.
 */

import { z } from 'zod';
import type { TemplateSpan } from '../../ast/element.js';
import { Root } from '../../ast/path.js';
import type { Path } from '../../ast/path.js';
import type { StaticDocument } from '../../ast/documents.js';
import { RawLink } from '../../ast/spans.js';
import { InternalTarget } from '../../ast/targets.js';
import { TemplateElement, TemplateSpanSequence, TemplateString } from '../../ast/templates.js';
import { ConfigDecoders } from '../../config/decoders.js';
import { err, ok } from '../../result.js';
import type { Result } from '../../result.js';
import type { DocumentCursor } from '../../rewrite/cursor.js';
import { Templates, cursor } from '../api.js';
import type { Directive } from '../api.js';

const SearchPaths = z.object({
  globalSearchPaths: ConfigDecoders.pathList.default(['/']),
  searchPaths: ConfigDecoders.pathList.default([])
});

interface LinkFormat {
  readonly suffix: string;
  readonly start: string;
  readonly end: string;
}

const cssFormat: LinkFormat = {
  suffix: 'css',
  start: '<link rel="stylesheet" type="text/css" href="',
  end: '" />'
};

const jsFormat: LinkFormat = {
  suffix: 'js',
  start: '<script src="',
  end: '"></script>'
};

/**
 * The config key holding the search paths, undefined for formats without links
 */
function configKeyFor(formatSelector: string, suffix: string): string | undefined {
  if (formatSelector === 'html') return `site.${suffix}`;
  if (formatSelector === 'epub' || formatSelector === 'epub.xhtml') return `epub.${suffix}`;
  return undefined;
}

function isBelowAny(path: Path, searchPaths: readonly Path[]): boolean {
  return searchPaths.some(searchPath => path.isSubPath(searchPath));
}

function findDocuments(
  docCursor: DocumentCursor,
  linkFormat: LinkFormat,
  formatSelector: string
): Result<Path[], string> {
  const key = configKeyFor(formatSelector, linkFormat.suffix);
  if (key === undefined) return ok([]);

  const apiPath = docCursor.config.get('site.apiPath', ConfigDecoders.absolutePath, Root.child('api'));
  const paths = docCursor.config.get(key, SearchPaths, { globalSearchPaths: [Root], searchPaths: [] });
  if (!apiPath.ok) return err(apiPath.error.message);
  if (!paths.ok) return err(paths.error.message);

  const candidates = docCursor.root.target.staticDocuments.filter((doc: StaticDocument) =>
    doc.path.suffix === linkFormat.suffix
    && doc.formats.includes(formatSelector)
    && !doc.path.isSubPath(apiPath.value)
  );
  const global = candidates.filter(doc => isBelowAny(doc.path, paths.value.globalSearchPaths));
  const local = candidates.filter(doc => !global.includes(doc) && isBelowAny(doc.path, paths.value.searchPaths));
  return ok([...global, ...local].map(doc => doc.path));
}

function renderLinks(paths: readonly Path[], docCursor: DocumentCursor, linkFormat: LinkFormat): TemplateSpan {
  const links = paths.flatMap((path, index): TemplateSpan[] => [
    ...(index > 0 ? [new TemplateString('\n    ')] : []),
    new TemplateString(linkFormat.start),
    new TemplateElement(new RawLink(new InternalTarget(path).relativeTo(docCursor.path))),
    new TemplateString(linkFormat.end)
  ]);
  return new TemplateSpanSequence(links);
}

function linkDirective(name: string, linkFormat: LinkFormat): Directive<TemplateSpan> {
  return Templates.evaluate(name, cursor().map((docCursor): Result<TemplateSpan, string> => {
    const context = docCursor.root.outputContext;
    if (!context) return ok(TemplateSpanSequence.empty);
    const paths = findDocuments(docCursor, linkFormat, context.formatSelector);
    return paths.ok ? ok(renderLinks(paths.value, docCursor, linkFormat)) : paths;
  }), { phase: 'render' });
}

export const linkCSS = linkDirective('linkCSS', cssFormat);

export const linkJS = linkDirective('linkJS', jsFormat);
