/**
 * Directive API
 *
 * A directive is defined by combining parts: attributes, the body, the
 * cursor of the current document. All parts of a directive are decoded
 * together and every failure is reported, not only the first one.
 *
 *   const forDirective = Templates.create('for',
 *     map3(positional(0, ConfigDecoders.string), Templates.separatedBody([emptySeparator]), cursor(),
 *       (ref, body, cursor) => ...)
 *   );
 *
 * Directives come in three kinds, for block, span and template elements.
 * Directives that need the body of another kind are not supported.
 */

import type { Block, Element, Span, TemplateSpan } from '../ast/element.js';
import { isBlock, isSpan, isTemplateSpan } from '../ast/element.js';
import type { ConfigDecoder, ConfigObject, ConfigValue } from '../config/config.js';
import { err, ok } from '../result.js';
import type { Result } from '../result.js';
import type { DocumentCursor } from '../rewrite/cursor.js';
import type { PhaseName, RewritePhase } from '../rewrite/phases.js';

export interface DirectiveAttributes {
  readonly positional: readonly ConfigValue[];
  readonly named: ConfigObject;
}

export const noAttributes: DirectiveAttributes = { positional: [], named: {} };

/**
 * A separator directive inside a directive body, e.g. `@:empty` inside `@:for`,
 * with the part of the body up to the next separator
 */
export interface ParsedSeparator {
  readonly name: string;
  readonly attributes: DirectiveAttributes;
  readonly content: readonly Element[];
  readonly source: string;
}

export interface DirectiveBody {
  /** The body content before the first separator */
  readonly content: readonly Element[];
  readonly separators: readonly ParsedSeparator[];
}

export interface DirectiveContext {
  readonly name: string;
  readonly attributes: DirectiveAttributes;
  readonly body?: DirectiveBody;
  readonly cursor: DocumentCursor;
  readonly source: string;
  readonly phase: RewritePhase;
}

export interface PartRequirements {
  readonly body: boolean;
  readonly separators: readonly string[];
}

const noRequirements: PartRequirements = { body: false, separators: [] };

function combineRequirements(a: PartRequirements, b: PartRequirements): PartRequirements {
  return { body: a.body || b.body, separators: [...a.separators, ...b.separators] };
}

export type PartResult<T> = Result<T, string[]>;

/**
 * A single part of a directive or a combination of parts
 */
export class DirectivePart<T> {
  constructor(
    readonly decode: (context: DirectiveContext) => PartResult<T>,
    readonly requirements: PartRequirements = noRequirements
  ) {}

  map<U>(f: (value: T) => U): DirectivePart<U> {
    return new DirectivePart<U>(context => {
      const result = this.decode(context);
      return result.ok ? ok(f(result.value)) : result;
    }, this.requirements);
  }

  /**
   * Map with a function that may fail with a message
   */
  evalMap<U>(f: (value: T) => Result<U, string>): DirectivePart<U> {
    return new DirectivePart<U>(context => {
      const result = this.decode(context);
      if (!result.ok) return result;
      const mapped = f(result.value);
      return mapped.ok ? mapped : err([mapped.error]);
    }, this.requirements);
  }

  /**
   * Decode both parts, collecting the failures of both
   */
  and<U>(other: DirectivePart<U>): DirectivePart<[T, U]> {
    return new DirectivePart<[T, U]>(context => {
      const a = this.decode(context);
      const b = other.decode(context);
      if (a.ok && b.ok) {
        const pair: [T, U] = [a.value, b.value];
        return ok(pair);
      }
      return err([...(a.ok ? [] : a.error), ...(b.ok ? [] : b.error)]);
    }, combineRequirements(this.requirements, other.requirements));
  }
}

export function map2<A, B, R>(a: DirectivePart<A>, b: DirectivePart<B>, f: (a: A, b: B) => R): DirectivePart<R> {
  return a.and(b).map(([x, y]) => f(x, y));
}

export function map3<A, B, C, R>(
  a: DirectivePart<A>,
  b: DirectivePart<B>,
  c: DirectivePart<C>,
  f: (a: A, b: B, c: C) => R
): DirectivePart<R> {
  return a.and(b).and(c).map(([[x, y], z]) => f(x, y, z));
}

export function map4<A, B, C, D, R>(
  a: DirectivePart<A>,
  b: DirectivePart<B>,
  c: DirectivePart<C>,
  d: DirectivePart<D>,
  f: (a: A, b: B, c: C, d: D) => R
): DirectivePart<R> {
  return a.and(b).and(c).and(d).map(([[[w, x], y], z]) => f(w, x, y, z));
}

function decodeValue<T>(value: ConfigValue, decoder: ConfigDecoder<T>, description: string): PartResult<T> {
  const decoded = decoder.safeParse(value);
  if (decoded.success) return ok(decoded.data);
  const detail = decoded.error.issues.map(issue => issue.message).join('; ');
  return err([`error converting ${description}: ${detail}`]);
}

function positionalValue(context: DirectiveContext, index: number): ConfigValue | undefined {
  return context.attributes.positional[index];
}

function namedValue(context: DirectiveContext, key: string): ConfigValue | undefined {
  return Object.prototype.hasOwnProperty.call(context.attributes.named, key) ? context.attributes.named[key] : undefined;
}

export function positional<T>(index: number, decoder: ConfigDecoder<T>): DirectivePart<T> {
  return new DirectivePart<T>(context => {
    const value = positionalValue(context, index);
    if (value === undefined) return err([`required positional attribute at index ${index} is missing`]);
    return decodeValue(value, decoder, `positional attribute at index ${index}`);
  });
}

export function positionalOpt<T>(index: number, decoder: ConfigDecoder<T>): DirectivePart<T | undefined> {
  return new DirectivePart<T | undefined>(context => {
    const value = positionalValue(context, index);
    return value === undefined ? ok(undefined) : decodeValue(value, decoder, `positional attribute at index ${index}`);
  });
}

export function allPositional<T>(decoder: ConfigDecoder<T>): DirectivePart<T[]> {
  return new DirectivePart<T[]>(context => {
    const results = context.attributes.positional.map((value, index) =>
      decodeValue(value, decoder, `positional attribute at index ${index}`)
    );
    const errors = results.flatMap(result => (result.ok ? [] : result.error));
    return errors.length > 0 ? err(errors) : ok(results.flatMap(result => (result.ok ? [result.value] : [])));
  });
}

export function named<T>(key: string, decoder: ConfigDecoder<T>): DirectivePart<T> {
  return new DirectivePart<T>(context => {
    const value = namedValue(context, key);
    if (value === undefined) return err([`required attribute '${key}' is missing`]);
    return decodeValue(value, decoder, `attribute '${key}'`);
  });
}

export function namedOpt<T>(key: string, decoder: ConfigDecoder<T>): DirectivePart<T | undefined> {
  return new DirectivePart<T | undefined>(context => {
    const value = namedValue(context, key);
    return value === undefined ? ok(undefined) : decodeValue(value, decoder, `attribute '${key}'`);
  });
}

/**
 * A part for directives without attributes or body, always producing the same value
 */
export function empty<T>(value: T): DirectivePart<T> {
  return new DirectivePart<T>(() => ok(value));
}

export function allAttributes(): DirectivePart<DirectiveAttributes> {
  return new DirectivePart(context => ok(context.attributes));
}

export function cursor(): DirectivePart<DocumentCursor> {
  return new DirectivePart(context => ok(context.cursor));
}

export function source(): DirectivePart<string> {
  return new DirectivePart(context => ok(context.source));
}

export function phase(): DirectivePart<RewritePhase> {
  return new DirectivePart(context => ok(context.phase));
}

export interface SeparatorLimits {
  readonly min?: number;
  readonly max?: number;
}

export interface SeparatorDirective<T> {
  readonly name: string;
  readonly part: DirectivePart<T>;
  readonly min: number;
  readonly max: number;
}

/**
 * The main body of a directive plus the decoded separators, in document order
 */
export interface Multipart<E, T> {
  readonly mainBody: E[];
  readonly children: T[];
}

export interface Directive<E extends Element> {
  readonly name: string;
  readonly phase: PhaseName;
  readonly hasBody: boolean;
  readonly separators: readonly string[];
  process(context: DirectiveContext): PartResult<E>;
}

export interface DirectiveOptions {
  /** The phase the directive runs in, build by default */
  readonly phase?: PhaseName;
}

/**
 * Directive factories for one element kind
 */
export class DirectiveKind<E extends Element> {
  constructor(
    readonly description: string,
    private readonly guard: (element: Element) => element is E
  ) {}

  create(name: string, part: DirectivePart<E>, options: DirectiveOptions = {}): Directive<E> {
    return {
      name,
      phase: options.phase ?? 'build',
      hasBody: part.requirements.body,
      separators: part.requirements.separators,
      process: context => part.decode(context)
    };
  }

  /**
   * Create a directive whose result function may fail with a message
   */
  evaluate(name: string, part: DirectivePart<Result<E, string>>, options: DirectiveOptions = {}): Directive<E> {
    return this.create(name, part.evalMap(result => result), options);
  }

  separator<T>(name: string, part: DirectivePart<T>, limits: SeparatorLimits = {}): SeparatorDirective<T> {
    return { name, part, min: limits.min ?? 0, max: limits.max ?? Number.MAX_SAFE_INTEGER };
  }

  body(): DirectivePart<E[]> {
    return new DirectivePart<E[]>(context => {
      if (!context.body) return err(['required body is missing']);
      return this.filter(context.body.content);
    }, { body: true, separators: [] });
  }

  separatedBody<T>(separators: readonly SeparatorDirective<T>[]): DirectivePart<Multipart<E, T>> {
    const names = separators.map(separator => separator.name);
    return new DirectivePart<Multipart<E, T>>(context => {
      if (!context.body) return err(['required body is missing']);
      const mainBody = this.filter(context.body.content);
      const errors: string[] = mainBody.ok ? [] : [...mainBody.error];
      const children: T[] = [];
      const counts = new Map<string, number>();

      for (const parsed of context.body.separators) {
        const separator = separators.find(candidate => candidate.name === parsed.name);
        if (!separator) {
          errors.push(`unknown separator directive '${parsed.name}'`);
          continue;
        }
        const result = separator.part.decode({
          ...context,
          name: parsed.name,
          attributes: parsed.attributes,
          body: { content: parsed.content, separators: [] },
          source: parsed.source
        });
        if (result.ok) {
          children.push(result.value);
          counts.set(parsed.name, (counts.get(parsed.name) ?? 0) + 1);
        } else {
          errors.push(`One or more errors processing separator directive '${parsed.name}': ${result.error.join(', ')}`);
        }
      }

      for (const separator of separators) {
        const count = counts.get(separator.name) ?? 0;
        if (count > separator.max) {
          errors.push(`too many occurrences of separator directive '${separator.name}': expected max: ${separator.max}, actual: ${count}`);
        }
        if (count < separator.min) {
          errors.push(`too few occurrences of separator directive '${separator.name}': expected min: ${separator.min}, actual: ${count}`);
        }
      }

      if (errors.length > 0 || !mainBody.ok) return err(errors);
      return ok({ mainBody: mainBody.value, children });
    }, { body: true, separators: names });
  }

  private filter(content: readonly Element[]): PartResult<E[]> {
    const invalid = content.filter(element => !this.guard(element));
    if (invalid.length > 0) {
      return err(invalid.map(element => `unexpected ${element.kind} in the body of a ${this.description} directive`));
    }
    return ok(content.filter(this.guard));
  }
}

export const Blocks = new DirectiveKind<Block>('block', isBlock);
export const Spans = new DirectiveKind<Span>('span', isSpan);
export const Templates = new DirectiveKind<TemplateSpan>('template', isTemplateSpan);

export function formatDirectiveErrors(name: string, errors: readonly string[]): string {
  return `One or more errors processing directive '${name}': ${errors.join(', ')}`;
}
