/**
 * Configuration
 *
 * A minimal key-value abstraction over nested configuration objects.
 * Concrete formats (HOCON, YAML front matter) are parsed elsewhere and
 * handed to the core as plain objects.
 *
 * Configs form a fallback chain (document -> tree -> parent tree -> root).
 * Typed access goes through zod schemas, decode failures report every
 * issue of the schema in a single DecodingFailed error.
 */

import type { z } from 'zod';
import type { Element } from '../ast/element.js';
import { Path, Root } from '../ast/path.js';
import type { RelativePath } from '../ast/path.js';
import { Key } from './key.js';
import { DecodingFailed, NotFound } from './errors.js';
import type { ConfigResult } from './errors.js';
import { err, ok } from '../result.js';

export type ConfigValue =
  | string
  | number
  | boolean
  | null
  | Path
  | RelativePath
  | Element
  | readonly ConfigValue[]
  | ConfigObject;

export interface ConfigObject {
  readonly [key: string]: ConfigValue;
}

export type ConfigDecoder<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type Scope = 'global' | 'tree' | 'document' | 'template' | 'directive';

/**
 * Where a config instance came from, used for diagnostics and for
 * resolving relative paths found in config values
 */
export class Origin {
  static readonly root = new Origin('global', Root);

  constructor(
    readonly scope: Scope,
    readonly path: Path,
    readonly sourcePath?: string
  ) {}
}

export interface Config {
  readonly origin: Origin;

  /** Look up a raw value, consulting the fallback chain */
  lookup(key: Key | string): ConfigValue | undefined;

  /** Look up a raw value in this instance only, ignoring fallbacks */
  lookupLocal(key: Key | string): ConfigValue | undefined;

  hasKey(key: Key | string): boolean;

  /**
   * Decode the value for the specified key. Without default value a
   * missing key results in a NotFound error.
   */
  get<T>(key: Key | string, decoder: ConfigDecoder<T>, defaultValue?: T): ConfigResult<T>;

  /** Decode the value for the specified key if it is present */
  getOpt<T>(key: Key | string, decoder: ConfigDecoder<T>): ConfigResult<T | undefined>;

  withValue(key: Key | string, value: ConfigValue): Config;

  withFallback(fallback: Config): Config;

  withOrigin(origin: Origin): Config;
}

export function isConfigObject(value: unknown): value is ConfigObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Merge two objects recursively, values of the primary object win
 */
function mergeObjects(primary: ConfigObject, secondary: ConfigObject): ConfigObject {
  const merged: Record<string, ConfigValue> = { ...secondary };
  for (const [key, value] of Object.entries(primary)) {
    const other = secondary[key];
    merged[key] = isConfigObject(value) && isConfigObject(other) ? mergeObjects(value, other) : value;
  }
  return merged;
}

function lookupIn(root: ConfigObject, key: Key): ConfigValue | undefined {
  let current: ConfigValue = root;
  for (const segment of key.segments) {
    if (!isConfigObject(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return undefined;
    }
    const next: ConfigValue | undefined = current[segment];
    if (next === undefined) return undefined;
    current = next;
  }
  return current;
}

function setIn(root: ConfigObject, segments: readonly string[], value: ConfigValue): ConfigObject {
  const [head, ...rest] = segments;
  if (head === undefined) return isConfigObject(value) ? value : root;
  const existing = root[head];
  const child = rest.length === 0
    ? value
    : setIn(isConfigObject(existing) ? existing : {}, rest, value);
  return { ...root, [head]: child };
}

function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ` : '') + issue.message)
    .join('; ');
}

/**
 * Config implementation backed by a plain nested object
 */
export class ObjectConfig implements Config {
  static readonly empty = new ObjectConfig({});

  constructor(
    readonly root: ConfigObject,
    readonly origin: Origin = Origin.root,
    readonly fallback?: Config
  ) {}

  lookupLocal(key: Key | string): ConfigValue | undefined {
    return lookupIn(this.root, Key.of(key));
  }

  lookup(key: Key | string): ConfigValue | undefined {
    const local = this.lookupLocal(key);
    const inherited = this.fallback?.lookup(key);
    if (local === undefined) return inherited;
    if (isConfigObject(local) && isConfigObject(inherited)) return mergeObjects(local, inherited);
    return local;
  }

  hasKey(key: Key | string): boolean {
    return this.lookup(key) !== undefined;
  }

  get<T>(key: Key | string, decoder: ConfigDecoder<T>, defaultValue?: T): ConfigResult<T> {
    const parsedKey = Key.of(key);
    const value = this.lookup(parsedKey);
    if (value === undefined) {
      return defaultValue !== undefined ? ok(defaultValue) : err(new NotFound(parsedKey));
    }
    const decoded = decoder.safeParse(value);
    return decoded.success
      ? ok(decoded.data)
      : err(new DecodingFailed(parsedKey, formatIssues(decoded.error.issues)));
  }

  getOpt<T>(key: Key | string, decoder: ConfigDecoder<T>): ConfigResult<T | undefined> {
    if (!this.hasKey(key)) return ok(undefined);
    return this.get(key, decoder);
  }

  withValue(key: Key | string, value: ConfigValue): Config {
    return new ObjectConfig(setIn(this.root, Key.of(key).segments, value), this.origin, this.fallback);
  }

  withFallback(fallback: Config): Config {
    if (fallback === this) return this;
    const chained = this.fallback ? this.fallback.withFallback(fallback) : fallback;
    return new ObjectConfig(this.root, this.origin, chained);
  }

  withOrigin(origin: Origin): Config {
    return new ObjectConfig(this.root, origin, this.fallback);
  }
}

/**
 * Create a config from a plain object, e.g. the result of parsing a front matter block
 */
export function configOf(values: ConfigObject, origin: Origin = Origin.root): Config {
  return new ObjectConfig(values, origin);
}
