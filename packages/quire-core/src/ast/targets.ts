/**
 * Link targets
 *
 * External targets are URLs rendered verbatim. Internal targets point to a
 * document (optionally with a fragment) in the virtual tree and get resolved
 * against the path of the document that contains the link.
 */

import { Path, RelativePath } from './path.js';

export class ExternalTarget {
  readonly type = 'external' as const;

  constructor(readonly url: string) {}
}

export class InternalTarget {
  readonly type = 'internal' as const;

  constructor(readonly path: Path) {}

  /**
   * Resolve this target for a link inside the document with the specified path
   */
  relativeTo(refPath: Path): ResolvedInternalTarget {
    return new ResolvedInternalTarget(this.path, this.path.relativeTo(refPath.parent));
  }
}

export class ResolvedInternalTarget {
  readonly type = 'resolved' as const;

  constructor(
    readonly absolutePath: Path,
    readonly relativePath: RelativePath
  ) {}
}

export type Target = ExternalTarget | InternalTarget | ResolvedInternalTarget;

export function isExternalUrl(str: string): boolean {
  return str.startsWith('http:') || str.startsWith('https:') || str.startsWith('mailto:');
}

/**
 * Interpret a target string found in markup or config. Relative paths are
 * interpreted relative to the directory of the referring document.
 */
export function parseTarget(str: string, refPath: Path): ExternalTarget | InternalTarget {
  if (isExternalUrl(str)) return new ExternalTarget(str);
  if (str.startsWith('#')) return new InternalTarget(refPath.withoutFragment().withFragment(str.slice(1)));
  if (str.startsWith('/')) return new InternalTarget(Path.parse(str));
  return new InternalTarget(refPath.parent.resolve(RelativePath.parse(str)));
}
