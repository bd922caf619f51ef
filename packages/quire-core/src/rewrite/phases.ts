/**
 * Rewrite phases
 *
 * Documents are rewritten three times, always in this order:
 * - build: directives that produce structure (for, if, section building)
 * - resolve: everything that needs the final shape of the whole tree (links, navigation)
 * - render: everything that depends on the output format
 */

/**
 * The output format a render phase runs for. EPUB output for example uses
 * the file suffix "xhtml" while directives select on "epub.xhtml".
 */
export class OutputContext {
  constructor(
    readonly fileSuffix: string,
    readonly formatSelector: string = fileSuffix
  ) {}

  toString(): string {
    return this.fileSuffix === this.formatSelector
      ? this.fileSuffix
      : `${this.fileSuffix} (${this.formatSelector})`;
  }
}

export type RewritePhase =
  | { readonly name: 'build' }
  | { readonly name: 'resolve' }
  | { readonly name: 'render'; readonly context: OutputContext };

export type PhaseName = RewritePhase['name'];

export const RewritePhase = {
  Build: { name: 'build' } satisfies RewritePhase,
  Resolve: { name: 'resolve' } satisfies RewritePhase,
  Render(context: OutputContext): RewritePhase {
    return { name: 'render', context };
  }
};

export function phaseLabel(phase: RewritePhase): string {
  return phase.name === 'render' ? `render ${phase.context}` : phase.name;
}
