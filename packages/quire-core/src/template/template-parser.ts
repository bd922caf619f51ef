/**
 * Template Parser
 *
 * Parses template text into template spans:
 *
 *   <title>${cursor.currentDocument.title}</title>      required reference
 *   ${?cursor.nextDocument.title}                        optional reference
 *   @:linkCSS                                            directive without body
 *   @:for(persons) ${_.name} @:empty none @:@            directive with body and separator
 *   @:navigationTree { entries = [{ target = "/" }] }    named attributes
 *
 * `\@` and `\$` produce a literal `@` or `$`. Everything else is kept as
 * literal text, including all whitespace.
 *
 * Directives are looked up in the registry by name. Whether a directive
 * has a body, and which separators it accepts, is declared by the directive.
 * Unknown directives and malformed directive syntax produce inline invalid
 * elements, the rest of the template still gets parsed.
 */

import type { TemplateSpan } from '../ast/element.js';
import { InvalidSpan } from '../ast/spans.js';
import { TemplateContextReference, TemplateElement, TemplateRoot, TemplateString } from '../ast/templates.js';
import { isConfigObject } from '../config/config.js';
import type { ConfigObject, ConfigValue } from '../config/config.js';
import { Key } from '../config/key.js';
import type { DirectiveAttributes, DirectiveBody, ParsedSeparator } from '../directive/api.js';
import { TemplateDirectiveInstance } from '../directive/instances.js';
import type { DirectiveRegistry } from '../directive/registry.js';

/**
 * Malformed directive syntax. Caught at the directive that contains it.
 */
class TemplateSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TemplateSyntaxError';
  }
}

/**
 * Where a sequence of spans ended
 */
type SpansEnd =
  | { readonly type: 'eof' }
  | { readonly type: 'bodyEnd' }
  | { readonly type: 'separator'; readonly name: string; readonly start: number };

const NAME = /[A-Za-z][\w-]*/y;
const KEY = /[\w.-]+/y;
const NUMBER = /^-?\d+(\.\d+)?$/;

/**
 * Interpret an unquoted attribute value
 */
function unquotedValue(text: string): ConfigValue {
  if (text === 'true') return true;
  if (text === 'false') return false;
  if (text === 'null') return null;
  if (NUMBER.test(text)) return Number(text);
  return text;
}

/**
 * Add a value under a dotted key, creating nested objects
 */
function withNestedValue(target: ConfigObject, key: string, value: ConfigValue): ConfigObject {
  const [head, ...rest] = key.split('.');
  if (head === undefined || head === '') return target;
  if (rest.length === 0) return { ...target, [head]: value };
  const existing = target[head];
  const nested = isConfigObject(existing) ? existing : {};
  return { ...target, [head]: withNestedValue(nested, rest.join('.'), value) };
}

export class TemplateParser {
  private pos = 0;

  constructor(
    private readonly input: string,
    private readonly registry: DirectiveRegistry
  ) {}

  parse(): TemplateSpan[] {
    return this.parseSpans([], false).spans;
  }

  /**
   * Parse spans up to the end of the input or, inside a directive body,
   * up to `@:@` or one of the separators of the directive
   */
  private parseSpans(separators: readonly string[], inBody: boolean): { spans: TemplateSpan[]; end: SpansEnd } {
    const spans: TemplateSpan[] = [];
    let text = '';
    const flush = (): void => {
      if (text.length > 0) spans.push(new TemplateString(text));
      text = '';
    };

    while (!this.isAtEnd()) {
      if (this.lookingAt('\\@') || this.lookingAt('\\$')) {
        text += this.input.charAt(this.pos + 1);
        this.pos += 2;
        continue;
      }
      if (this.lookingAt('${')) {
        const reference = this.parseReference();
        if (reference) {
          flush();
          spans.push(reference);
        } else {
          text += this.advance();
        }
        continue;
      }
      if (this.lookingAt('@:')) {
        const start = this.pos;
        if (inBody && this.lookingAt('@:@')) {
          this.pos += 3;
          flush();
          return { spans, end: { type: 'bodyEnd' } };
        }
        const name = this.matchAt(NAME, start + 2);
        if (name === undefined) {
          text += this.advance();
          continue;
        }
        this.pos = start + 2 + name.length;
        flush();
        if (inBody && separators.includes(name)) {
          return { spans, end: { type: 'separator', name, start } };
        }
        spans.push(this.parseDirective(name, start));
        continue;
      }
      text += this.advance();
    }

    flush();
    return { spans, end: { type: 'eof' } };
  }

  /**
   * `${key}` or `${?key}`, undefined if the reference is not terminated
   */
  private parseReference(): TemplateContextReference | undefined {
    const close = this.input.indexOf('}', this.pos + 2);
    if (close < 0) return undefined;
    const source = this.input.slice(this.pos, close + 1);
    const content = this.input.slice(this.pos + 2, close).trim();
    const optional = content.startsWith('?');
    const key = (optional ? content.slice(1) : content).trim();
    if (key === '') return undefined;
    this.pos = close + 1;
    return new TemplateContextReference(Key.parse(key), !optional, source);
  }

  /**
   * Parse the attributes and the body of a directive. The position is
   * right after the directive name.
   */
  private parseDirective(name: string, start: number): TemplateSpan {
    try {
      const attributes = this.parseAttributes();
      const directive = this.registry.template(name);
      if (!directive) {
        return new TemplateElement(
          new InvalidSpan(`No template directive registered with name: ${name}`, this.input.slice(start, this.pos))
        );
      }
      const body = directive.hasBody ? this.parseBody(directive.separators) : undefined;
      return new TemplateDirectiveInstance(directive, attributes, body, this.input.slice(start, this.pos));
    } catch (error) {
      if (!(error instanceof TemplateSyntaxError)) throw error;
      const message = `Invalid syntax in directive '${name}': ${error.message}`;
      return new TemplateElement(new InvalidSpan(message, this.input.slice(start, this.pos)));
    }
  }

  private parseBody(separators: readonly string[]): DirectiveBody {
    const main = this.parseSpans(separators, true);
    const parsed: ParsedSeparator[] = [];
    let end = main.end;
    while (end.type === 'separator') {
      const separator = end;
      const attributes = this.parseAttributes();
      const source = this.input.slice(separator.start, this.pos);
      const next = this.parseSpans(separators, true);
      parsed.push({ name: separator.name, attributes, content: next.spans, source });
      end = next.end;
    }
    if (end.type === 'eof') throw new TemplateSyntaxError("missing end of directive body '@:@'");
    return { content: main.spans, separators: parsed };
  }

  /**
   * Optional positional attributes in parentheses, directly after the name,
   * followed by optional named attributes in braces
   */
  private parseAttributes(): DirectiveAttributes {
    const positional: ConfigValue[] = [];
    if (this.peek() === '(') {
      this.advance();
      this.skipWhitespace();
      while (this.peek() !== ')') {
        positional.push(this.parsePositionalValue());
        this.skipWhitespace();
        if (this.peek() === ',') {
          this.advance();
          this.skipWhitespace();
        } else if (this.peek() !== ')') {
          throw new TemplateSyntaxError("expected ',' or ')' in attribute list");
        }
      }
      this.advance();
    }

    const afterSpaces = this.skipSpacesFrom(this.pos);
    if (this.input.charAt(afterSpaces) !== '{') return { positional, named: {} };
    this.pos = afterSpaces + 1;
    return { positional, named: this.parseObject() };
  }

  private parsePositionalValue(): ConfigValue {
    if (this.isAtEnd()) throw new TemplateSyntaxError('unterminated attribute list');
    if (this.peek() === '"') return this.parseQuoted();
    return unquotedValue(this.readUntil(',)').trim());
  }

  /**
   * Key-value pairs up to the closing brace, separated by commas or newlines.
   * The opening brace has been consumed.
   */
  private parseObject(): ConfigObject {
    let result: ConfigObject = {};
    for (;;) {
      this.skipSeparators();
      if (this.isAtEnd()) throw new TemplateSyntaxError('unterminated attribute block');
      if (this.peek() === '}') {
        this.advance();
        return result;
      }
      const key = this.matchAt(KEY, this.pos);
      if (key === undefined) throw new TemplateSyntaxError(`unexpected character '${this.peek()}' in attribute block`);
      this.pos += key.length;
      this.skipWhitespace();
      const assign = this.peek();
      if (assign === '=' || assign === ':') {
        this.advance();
        this.skipWhitespace();
        result = withNestedValue(result, key, this.parseValue());
      } else if (assign === '{') {
        this.advance();
        result = withNestedValue(result, key, this.parseObject());
      } else {
        throw new TemplateSyntaxError(`expected '=' after key '${key}'`);
      }
    }
  }

  private parseArray(): ConfigValue[] {
    const values: ConfigValue[] = [];
    for (;;) {
      this.skipSeparators();
      if (this.isAtEnd()) throw new TemplateSyntaxError('unterminated array');
      if (this.peek() === ']') {
        this.advance();
        return values;
      }
      values.push(this.parseValue());
    }
  }

  private parseValue(): ConfigValue {
    const c = this.peek();
    if (c === '"') return this.parseQuoted();
    if (c === '[') {
      this.advance();
      return this.parseArray();
    }
    if (c === '{') {
      this.advance();
      return this.parseObject();
    }
    const text = this.readUntil(',\n}]').trim();
    if (text === '') throw new TemplateSyntaxError('missing value');
    return unquotedValue(text);
  }

  private parseQuoted(): string {
    this.advance();
    let value = '';
    while (!this.isAtEnd() && this.peek() !== '"') {
      const c = this.advance();
      value += c === '\\' && !this.isAtEnd() ? this.advance() : c;
    }
    if (this.isAtEnd()) throw new TemplateSyntaxError('unterminated string');
    this.advance();
    return value;
  }

  private readUntil(stopChars: string): string {
    const start = this.pos;
    while (!this.isAtEnd() && !stopChars.includes(this.peek())) this.pos++;
    return this.input.slice(start, this.pos);
  }

  private matchAt(pattern: RegExp, index: number): string | undefined {
    pattern.lastIndex = index;
    return pattern.exec(this.input)?.[0];
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd() && /\s/.test(this.peek())) this.pos++;
  }

  private skipSeparators(): void {
    while (!this.isAtEnd() && /[\s,]/.test(this.peek())) this.pos++;
  }

  /** Spaces and tabs only, named attributes must start on the directive line */
  private skipSpacesFrom(index: number): number {
    let i = index;
    while (this.input.charAt(i) === ' ' || this.input.charAt(i) === '\t') i++;
    return i;
  }

  private lookingAt(str: string): boolean {
    return this.input.startsWith(str, this.pos);
  }

  private peek(): string {
    return this.input.charAt(this.pos);
  }

  private advance(): string {
    return this.input.charAt(this.pos++);
  }

  private isAtEnd(): boolean {
    return this.pos >= this.input.length;
  }
}

/**
 * Parse a template with the template directives of the registry
 */
export function parseTemplate(text: string, registry: DirectiveRegistry): TemplateRoot {
  return new TemplateRoot(new TemplateParser(text, registry).parse());
}
