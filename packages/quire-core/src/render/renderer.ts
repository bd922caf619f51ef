/**
 * Renderer interface
 *
 * The backend abstraction that receives the fully rewritten documents.
 * A renderer declares the output context it renders for; the tree is
 * processed for that context (all rewrite phases plus templates) before
 * any document reaches the renderer.
 */

import type { Document, DocumentTreeRoot } from '../ast/documents.js';
import type { Path } from '../ast/path.js';
import type { ConfigResult } from '../config/errors.js';
import { ok } from '../result.js';
import type { RewriteRulesBuilder } from '../rewrite/cursor.js';
import type { OutputContext } from '../rewrite/phases.js';
import { processTree } from '../rewrite/pipeline.js';
import type { ElementFormatter } from '../rewrite/pipeline.js';
import { StyleDeclarationSet } from '../style/selectors.js';

export interface DocumentRenderer {
  readonly outputContext: OutputContext;

  /**
   * Render a single document
   * @param styles the declarations for the output format, empty if the tree has none
   *   or if they are scoped to trees that do not contain the document
   */
  render(document: Document, styles: StyleDeclarationSet): string;
}

export interface RenderedDocument {
  readonly path: Path;
  readonly content: string;
}

export interface RenderOptions {
  /** Additional rewrite rules, applied in every phase */
  readonly rules?: readonly RewriteRulesBuilder[];
  /** Used for the processed documents when DEBUG_REWRITE is set */
  readonly formatter?: ElementFormatter;
}

/**
 * Process the tree for the output context of the renderer and render
 * every document that is targeted at that format, cover document first
 */
export function renderTree(
  root: DocumentTreeRoot,
  renderer: DocumentRenderer,
  options: RenderOptions = {}
): ConfigResult<RenderedDocument[]> {
  const context = renderer.outputContext;
  const processed = processTree(root, { outputContext: context, rules: options.rules, formatter: options.formatter });
  if (!processed.ok) return processed;
  const styles = processed.value.styles.get(context.formatSelector) ?? StyleDeclarationSet.empty;
  return ok(processed.value.allDocuments.map(document => ({
    path: document.path,
    content: renderer.render(document, styles.appliesToPath(document.path) ? styles : StyleDeclarationSet.empty)
  })));
}
