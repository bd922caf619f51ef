/**
 * Configuration errors
 *
 * Returned (not thrown) from config lookups, template application and tree
 * rewrites. Multiple failures are aggregated so that a caller sees all of them.
 */

import type { Key } from './key.js';
import type { Path } from '../ast/path.js';
import type { Result } from '../result.js';

export type ConfigErrorKind =
  | 'notFound'
  | 'decodingFailed'
  | 'validationFailed'
  | 'templateNotFound'
  | 'duplicatePath'
  | 'multiple'
  | 'document'
  | 'tree';

export abstract class ConfigError extends Error {
  abstract readonly kind: ConfigErrorKind;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFound extends ConfigError {
  readonly kind = 'notFound';

  constructor(readonly key: Key) {
    super(`Not found: '${key}'`);
  }
}

export class DecodingFailed extends ConfigError {
  readonly kind = 'decodingFailed';

  constructor(readonly key: Key, readonly detail: string) {
    super(`Error decoding '${key}': ${detail}`);
  }
}

export class ValidationFailed extends ConfigError {
  readonly kind = 'validationFailed';

  constructor(message: string) {
    super(message);
  }
}

export class TemplateNotFound extends ConfigError {
  readonly kind = 'templateNotFound';

  constructor(readonly path: Path) {
    super(`Template with path '${path}' not found`);
  }
}

export class DuplicatePath extends ConfigError {
  readonly kind = 'duplicatePath';

  constructor(readonly path: Path) {
    super(`Duplicate path: ${path}`);
  }
}

export class ConfigErrors extends ConfigError {
  readonly kind = 'multiple';

  constructor(readonly errors: readonly ConfigError[]) {
    super(`Multiple errors processing configuration: ${errors.map(e => e.message).join(', ')}`);
  }
}

export class DocumentConfigErrors extends ConfigError {
  readonly kind = 'document';

  constructor(readonly path: Path, readonly errors: readonly ConfigError[]) {
    super(`One or more errors processing document '${path}': ${errors.map(e => e.message).join(', ')}`);
  }
}

export class TreeConfigErrors extends ConfigError {
  readonly kind = 'tree';

  constructor(readonly errors: readonly ConfigError[]) {
    super(`One or more errors processing the document tree:\n  ${errors.map(e => e.message).join('\n  ')}`);
  }

  /**
   * Flatten nested tree errors so that each document failure appears once
   */
  static of(errors: readonly ConfigError[]): TreeConfigErrors {
    const flattened = errors.flatMap(error => error instanceof TreeConfigErrors ? error.errors : [error]);
    return new TreeConfigErrors(flattened);
  }
}

export type ConfigResult<T> = Result<T, ConfigError>;
