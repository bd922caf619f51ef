/**
 * Virtual Paths
 *
 * Paths address documents and trees in a virtual hierarchy that is independent
 * of any file system. Absolute paths are either Root or a non-empty segment list,
 * relative paths carry a number of parent levels plus segments.
 *
 * The last segment may contain a suffix ("doc.md") and a fragment ("doc.md#intro").
 * Both are derived from the segment on demand.
 */

function splitFragment(segment: string): { name: string; fragment?: string } {
  const index = segment.lastIndexOf('#');
  if (index < 0) return { name: segment };
  return { name: segment.slice(0, index), fragment: segment.slice(index + 1) };
}

function splitSuffix(name: string): { basename: string; suffix?: string } {
  const index = name.lastIndexOf('.');
  if (index <= 0) return { basename: name };
  return { basename: name.slice(0, index), suffix: name.slice(index + 1) };
}

function lastSegmentWith(segments: readonly string[], last: string): string[] {
  return [...segments.slice(0, -1), last];
}

function formatLast(basename: string, suffix: string | undefined, fragment: string | undefined): string {
  return basename + (suffix !== undefined ? `.${suffix}` : '') + (fragment !== undefined ? `#${fragment}` : '');
}

/**
 * Members shared by absolute and relative paths
 */
abstract class PathBase {
  abstract readonly segments: readonly string[];

  /** The last segment without fragment, including the suffix */
  get name(): string {
    const last = this.segments[this.segments.length - 1];
    return last === undefined ? '' : splitFragment(last).name;
  }

  get basename(): string {
    return splitSuffix(this.name).basename;
  }

  get suffix(): string | undefined {
    return splitSuffix(this.name).suffix;
  }

  get fragment(): string | undefined {
    const last = this.segments[this.segments.length - 1];
    return last === undefined ? undefined : splitFragment(last).fragment;
  }

  protected lastSegment(change: (basename: string, suffix?: string, fragment?: string) => string): string[] {
    return lastSegmentWith(this.segments, change(this.basename, this.suffix, this.fragment));
  }

  abstract toString(): string;

  equals(other: PathBase): boolean {
    return this.constructor === other.constructor && this.toString() === other.toString();
  }
}

/**
 * An absolute path, either Root or a segmented path
 */
export abstract class Path extends PathBase {
  abstract get depth(): number;
  abstract get parent(): Path;

  get isRoot(): boolean {
    return this.segments.length === 0;
  }

  /**
   * Create a path from a list of segments, an empty list yields Root
   */
  static of(segments: readonly string[]): Path {
    return segments.length === 0 ? Root : new SegmentedPath(segments);
  }

  /**
   * Parse an absolute path. The string must start with a slash.
   */
  static parse(str: string): Path {
    if (!str.startsWith('/')) {
      throw new Error(`Not an absolute path: '${str}'`);
    }
    if (str === '/') return Root;
    const trimmed = str.slice(1).replace(/\/$/, '');
    return Path.of(trimmed.split('/'));
  }

  /**
   * Append a single segment
   */
  child(name: string): Path {
    return new SegmentedPath([...this.segments, name]);
  }

  /**
   * Combine with a relative path. Parent levels beyond the available
   * segments clamp to Root.
   */
  resolve(path: RelativePath): Path {
    const kept = path.parentLevels >= this.segments.length
      ? []
      : this.segments.slice(0, this.segments.length - path.parentLevels);
    return Path.of([...kept, ...path.segments]);
  }

  /**
   * The shortest relative path that leads from the specified path to this one,
   * so that `other.resolve(this.relativeTo(other))` equals this path.
   */
  relativeTo(other: Path): RelativePath {
    let a = [...other.segments];
    let b = this.isRoot ? [] : [...this.segments.slice(0, -1), this.name];
    while (a.length > 0 && b.length > 0 && a[0] === b[0]) {
      a = a.slice(1);
      b = b.slice(1);
    }
    const base: RelativePath = a.length === 0 ? Current : new Parent(a.length);
    const withSegments = b.length === 0 ? base : base.resolveRelative(new SegmentedRelativePath(b));
    const fragment = this.fragment;
    if (fragment === undefined) return withSegments;
    return withSegments.isCurrent
      ? new SegmentedRelativePath([`#${fragment}`])
      : withSegments.withFragment(fragment);
  }

  isSubPath(other: Path): boolean {
    if (other.isRoot) return true;
    if (other.segments.length > this.segments.length) return false;
    return other.segments.every((segment, i) => this.segments[i] === segment);
  }

  /** This path as a relative path from Root */
  get relative(): RelativePath {
    return this.relativeTo(Root);
  }

  withSuffix(suffix: string): Path {
    if (this.isRoot || this.suffix === suffix) return this;
    return Path.of(this.lastSegment((basename, _, fragment) => formatLast(basename, suffix, fragment)));
  }

  withoutSuffix(): Path {
    if (this.suffix === undefined) return this;
    return Path.of(this.lastSegment((basename, _, fragment) => formatLast(basename, undefined, fragment)));
  }

  withBasename(name: string): Path {
    if (this.isRoot) return this;
    return Path.of(this.lastSegment((_, suffix, fragment) => formatLast(name, suffix, fragment)));
  }

  withFragment(fragment: string): Path {
    if (this.isRoot || this.fragment === fragment) return this;
    return Path.of(this.lastSegment((basename, suffix) => formatLast(basename, suffix, fragment)));
  }

  withoutFragment(): Path {
    if (this.fragment === undefined) return this;
    return Path.of(this.lastSegment((basename, suffix) => formatLast(basename, suffix, undefined)));
  }
}

class RootPath extends Path {
  readonly segments: readonly string[] = [];

  get depth(): number {
    return 0;
  }

  get parent(): Path {
    return this;
  }

  override get name(): string {
    return '/';
  }

  toString(): string {
    return '/';
  }
}

export class SegmentedPath extends Path {
  constructor(readonly segments: readonly string[]) {
    super();
    if (segments.length === 0) {
      throw new Error('SegmentedPath requires at least one segment');
    }
  }

  get depth(): number {
    return this.segments.length;
  }

  get parent(): Path {
    return Path.of(this.segments.slice(0, -1));
  }

  toString(): string {
    return '/' + this.segments.join('/');
  }
}

export const Root: Path = new RootPath();

/**
 * A relative path: a number of parent levels followed by zero or more segments
 */
export abstract class RelativePath extends PathBase {
  abstract readonly parentLevels: number;

  get isCurrent(): boolean {
    return this.parentLevels === 0 && this.segments.length === 0;
  }

  static of(segments: readonly string[], parentLevels: number = 0): RelativePath {
    if (segments.length > 0) return new SegmentedRelativePath(segments, parentLevels);
    return parentLevels === 0 ? Current : new Parent(parentLevels);
  }

  /**
   * Parse a relative path, interpreting leading "../" prefixes as parent levels.
   * A leading slash is discarded, "" and "." denote the current path.
   */
  static parse(str: string): RelativePath {
    const trimmed = str.replace(/^\//, '').replace(/\/$/, '');
    if (trimmed === '' || trimmed === '.') return Current;
    let levels = 0;
    let rest = trimmed;
    while (rest.startsWith('..')) {
      levels++;
      rest = rest.slice(2).replace(/^\//, '');
    }
    return RelativePath.of(rest === '' ? [] : rest.split('/'), levels);
  }

  get parent(): RelativePath {
    if (this.segments.length === 0) return new Parent(this.parentLevels + 1);
    return RelativePath.of(this.segments.slice(0, -1), this.parentLevels);
  }

  child(name: string): RelativePath {
    return new SegmentedRelativePath([...this.segments, name], this.parentLevels);
  }

  /**
   * Combine two relative paths. Parent levels of the other path first consume
   * this path's segments, any remainder adds to the parent levels.
   */
  resolveRelative(other: RelativePath): RelativePath {
    const consumed = Math.min(other.parentLevels, this.segments.length);
    const levels = this.parentLevels + (other.parentLevels - consumed);
    const segments = [...this.segments.slice(0, this.segments.length - consumed), ...other.segments];
    return RelativePath.of(segments, levels);
  }

  withSuffix(suffix: string): RelativePath {
    if (this.segments.length === 0 || this.suffix === suffix) return this;
    return RelativePath.of(
      this.lastSegment((basename, _, fragment) => formatLast(basename, suffix, fragment)),
      this.parentLevels
    );
  }

  withFragment(fragment: string): RelativePath {
    if (this.segments.length === 0) return new SegmentedRelativePath([`#${fragment}`], this.parentLevels);
    if (this.fragment === fragment) return this;
    return RelativePath.of(
      this.lastSegment((basename, suffix) => formatLast(basename, suffix, fragment)),
      this.parentLevels
    );
  }

  withoutFragment(): RelativePath {
    if (this.fragment === undefined) return this;
    return RelativePath.of(
      this.lastSegment((basename, suffix) => formatLast(basename, suffix, undefined)),
      this.parentLevels
    );
  }

  toString(): string {
    if (this.isCurrent) return '.';
    return '../'.repeat(this.parentLevels) + this.segments.join('/');
  }
}

export class SegmentedRelativePath extends RelativePath {
  constructor(readonly segments: readonly string[], readonly parentLevels: number = 0) {
    super();
  }
}

export class Parent extends RelativePath {
  readonly segments: readonly string[] = [];

  constructor(readonly parentLevels: number) {
    super();
  }
}

class CurrentPath extends RelativePath {
  readonly segments: readonly string[] = [];
  readonly parentLevels = 0;
}

export const Current: RelativePath = new CurrentPath();

/**
 * Parse either an absolute or a relative path, depending on the leading slash
 */
export function parseVirtualPath(str: string): Path | RelativePath {
  return str.startsWith('/') ? Path.parse(str) : RelativePath.parse(str);
}
