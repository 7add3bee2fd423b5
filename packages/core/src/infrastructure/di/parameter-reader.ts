/**
 * @fileoverview Parameter Reader - Parameter Names from Function Source
 *
 * @packageDocumentation
 * @module @lazywire/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * JavaScript keeps no parameter metadata at runtime, but
 * `Function.prototype.toString()` returns the source text of every
 * user-defined function. This module tokenizes that text just enough to find
 * the parameter list and read one name per parameter:
 *
 * ```
 * class PrintService {
 *   constructor(printer, { retries }, queue = [], ...rest) {}
 * }
 *
 * readParameterNames(PrintService); // ['printer', undefined, 'queue']
 * ```
 *
 * - Rest parameters are dropped.
 * - Destructured parameters have no name (`undefined`).
 * - Names are those of the code as it runs, after any transpiler renaming.
 * - A class without a constructor reads its parent's constructor.
 *
 * @version 1.0.0
 */

import { InvalidArgumentError } from '../../domain/di';

type TokenKind = 'identifier' | 'punctuator' | 'literal';

interface Token {
  readonly kind: TokenKind;
  readonly value: string;
}

const NATIVE_CODE = /\{\s*\[native code\]\s*\}\s*$/;

const IDENTIFIER_START = /[A-Za-z_$#\u0080-\uffff]/;

const IDENTIFIER_PART = /[A-Za-z0-9_$\u0080-\uffff]/;

/**
 * Punctuators after which a `/` starts a regular expression, not a division.
 */
const REGEX_PRECEDERS = new Set([
  '(', ',', '=', ':', '[', '!', '&', '|', '?', '{', '}', ';',
  '+', '-', '*', '%', '<', '>', '~', '^', '=>',
]);

/**
 * Keywords after which a `/` starts a regular expression.
 */
const REGEX_KEYWORDS = new Set([
  'return', 'typeof', 'instanceof', 'in', 'of', 'new', 'delete',
  'void', 'throw', 'case', 'do', 'else', 'yield', 'await',
]);

const OPENERS = new Set(['(', '[', '{']);

const CLOSERS = new Set([')', ']', '}']);

/**
 * Minimal JavaScript tokenizer.
 *
 * @remarks
 * Strings, template literals, regular expressions and numbers are emitted as
 * opaque `literal` tokens; comments and whitespace are skipped. Template
 * substitutions (`${...}`) are consumed as part of their template.
 *
 * @internal
 */
class SourceTokenizer {
  private pos = 0;

  private previous: Token | undefined;

  constructor(private readonly source: string) {}

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (let token = this.next(); token !== undefined; token = this.next()) {
      tokens.push(token);
    }
    return tokens;
  }

  private next(): Token | undefined {
    this.skipTrivia();
    if (this.pos >= this.source.length) {
      return undefined;
    }

    const token = this.readToken();
    this.previous = token;
    return token;
  }

  private readToken(): Token {
    const src = this.source;
    const ch = src.charAt(this.pos);

    if (ch === '"' || ch === "'") {
      return this.readString(ch);
    }
    if (ch === '`') {
      return this.readTemplate();
    }
    if (ch === '/' && this.regexAllowed()) {
      return this.readRegex();
    }
    if (IDENTIFIER_START.test(ch)) {
      const start = this.pos++;
      while (this.pos < src.length && IDENTIFIER_PART.test(src.charAt(this.pos))) {
        this.pos++;
      }
      return { kind: 'identifier', value: src.slice(start, this.pos) };
    }
    if (/[0-9]/.test(ch) || (ch === '.' && /[0-9]/.test(src.charAt(this.pos + 1)))) {
      const start = this.pos++;
      while (this.pos < src.length && /[0-9A-Za-z_.]/.test(src.charAt(this.pos))) {
        this.pos++;
      }
      return { kind: 'literal', value: src.slice(start, this.pos) };
    }
    if (src.startsWith('...', this.pos)) {
      this.pos += 3;
      return { kind: 'punctuator', value: '...' };
    }
    if (src.startsWith('=>', this.pos)) {
      this.pos += 2;
      return { kind: 'punctuator', value: '=>' };
    }

    this.pos++;
    return { kind: 'punctuator', value: ch };
  }

  private skipTrivia(): void {
    const src = this.source;
    while (this.pos < src.length) {
      const ch = src.charAt(this.pos);
      if (/\s/.test(ch)) {
        this.pos++;
      } else if (src.startsWith('//', this.pos)) {
        const end = src.indexOf('\n', this.pos);
        this.pos = end === -1 ? src.length : end + 1;
      } else if (src.startsWith('/*', this.pos)) {
        const end = src.indexOf('*/', this.pos + 2);
        this.pos = end === -1 ? src.length : end + 2;
      } else {
        return;
      }
    }
  }

  private readString(quote: string): Token {
    const start = this.pos++;
    while (this.pos < this.source.length) {
      const ch = this.source.charAt(this.pos++);
      if (ch === '\\') {
        this.pos++;
      } else if (ch === quote) {
        break;
      }
    }
    return { kind: 'literal', value: this.source.slice(start, this.pos) };
  }

  private readTemplate(): Token {
    const start = this.pos++;
    while (this.pos < this.source.length) {
      const ch = this.source.charAt(this.pos++);
      if (ch === '\\') {
        this.pos++;
      } else if (ch === '`') {
        break;
      } else if (ch === '$' && this.source.charAt(this.pos) === '{') {
        this.pos++;
        this.skipSubstitution();
      }
    }
    return { kind: 'literal', value: this.source.slice(start, this.pos) };
  }

  /**
   * Consume tokens up to and including the `}` closing a `${`.
   */
  private skipSubstitution(): void {
    let depth = 0;
    for (let token = this.next(); token !== undefined; token = this.next()) {
      if (token.kind !== 'punctuator') {
        continue;
      }
      if (token.value === '{') {
        depth++;
      } else if (token.value === '}') {
        if (depth === 0) {
          return;
        }
        depth--;
      }
    }
  }

  private regexAllowed(): boolean {
    const prev = this.previous;
    if (prev === undefined) {
      return true;
    }
    if (prev.kind === 'punctuator') {
      return REGEX_PRECEDERS.has(prev.value);
    }
    return prev.kind === 'identifier' && REGEX_KEYWORDS.has(prev.value);
  }

  private readRegex(): Token {
    const src = this.source;
    const start = this.pos++;
    let inClass = false;
    while (this.pos < src.length) {
      const ch = src.charAt(this.pos++);
      if (ch === '\\') {
        this.pos++;
      } else if (ch === '[') {
        inClass = true;
      } else if (ch === ']') {
        inClass = false;
      } else if (ch === '/' && !inClass) {
        break;
      }
    }
    while (this.pos < src.length && IDENTIFIER_PART.test(src.charAt(this.pos))) {
      this.pos++;
    }
    return { kind: 'literal', value: src.slice(start, this.pos) };
  }
}

function isPunctuator(token: Token | undefined, value: string): boolean {
  return token !== undefined && token.kind === 'punctuator' && token.value === value;
}

function isIdentifier(token: Token | undefined, value?: string): boolean {
  return (
    token !== undefined && token.kind === 'identifier' && (value === undefined || token.value === value)
  );
}

/**
 * Read the names of a parameter list starting at the `(` token at `open`.
 */
function readParameterList(tokens: Token[], open: number): Array<string | undefined> {
  const segments: Token[][] = [[]];
  let depth = 0;

  for (let i = open + 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) {
      break;
    }

    if (token.kind === 'punctuator') {
      if (CLOSERS.has(token.value)) {
        if (depth === 0) {
          break;
        }
        depth--;
      } else if (OPENERS.has(token.value)) {
        depth++;
      } else if (token.value === ',' && depth === 0) {
        segments.push([]);
        continue;
      }
    }

    segments[segments.length - 1]?.push(token);
  }

  const names: Array<string | undefined> = [];
  for (const segment of segments) {
    const [first] = segment;
    if (first === undefined || isPunctuator(first, '...') || isIdentifier(first, 'this')) {
      continue;
    }
    names.push(first.kind === 'identifier' ? first.value : undefined);
  }
  return names;
}

/**
 * Find the `(` opening the constructor parameters of a tokenized class.
 *
 * @returns the token index, or -1 when the class declares no constructor
 */
function findConstructor(tokens: Token[]): number {
  // Skip the heritage clause: the body is the first top-level `{`.
  let depth = 0;
  let body = -1;
  for (let i = 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (token?.kind !== 'punctuator') {
      continue;
    }
    if (token.value === '{' && depth === 0) {
      body = i;
      break;
    }
    if (OPENERS.has(token.value)) {
      depth++;
    } else if (CLOSERS.has(token.value)) {
      depth--;
    }
  }
  if (body === -1) {
    return -1;
  }

  depth = 0;
  for (let i = body + 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) {
      break;
    }

    if (token.kind === 'punctuator') {
      if (OPENERS.has(token.value)) {
        depth++;
      } else if (CLOSERS.has(token.value)) {
        if (depth === 0) {
          return -1;
        }
        depth--;
      }
      continue;
    }

    const previous = tokens[i - 1];
    if (
      depth === 0 &&
      isIdentifier(token, 'constructor') &&
      isPunctuator(tokens[i + 1], '(') &&
      !isPunctuator(previous, '.') &&
      !isIdentifier(previous, 'static')
    ) {
      return i + 1;
    }
  }
  return -1;
}

/**
 * Find the `(` opening the parameters of a tokenized function, arrow
 * function or method.
 */
function findFunctionParameters(tokens: Token[]): number {
  let depth = 0;
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token?.kind !== 'punctuator') {
      continue;
    }
    if (token.value === '(' && depth === 0) {
      return i;
    }
    if (OPENERS.has(token.value)) {
      depth++;
    } else if (CLOSERS.has(token.value)) {
      depth--;
    }
  }
  return -1;
}

function isNative(target: Function): boolean {
  return NATIVE_CODE.test(Function.prototype.toString.call(target));
}

function getSource(target: Function): string {
  if (isNative(target)) {
    throw new InvalidArgumentError(
      `Cannot read the parameters of '${target.name || 'anonymous'}': ` +
        'native and bound functions do not expose their source.',
    );
  }
  return Function.prototype.toString.call(target);
}

/**
 * Read the parameter names of a class constructor or a function.
 *
 * @param target - Class, function, arrow function or method
 * @returns One entry per non-rest parameter; `undefined` for destructured ones
 * @throws InvalidArgumentError if the source of `target` is not available
 */
export function readParameterNames(target: Function): Array<string | undefined> {
  const tokens = new SourceTokenizer(getSource(target)).tokenize();
  const [first, second] = tokens;

  if (isIdentifier(first, 'class')) {
    const open = findConstructor(tokens);
    if (open !== -1) {
      return readParameterList(tokens, open);
    }

    // No own constructor: the implicit one forwards to the parent.
    const parent: unknown = Object.getPrototypeOf(target);
    if (typeof parent === 'function' && parent !== Function.prototype && !isNative(parent)) {
      return readParameterNames(parent);
    }
    return [];
  }

  // `x => ...` and `async x => ...`
  if (first?.kind === 'identifier' && isPunctuator(second, '=>')) {
    return [first.value];
  }
  if (isIdentifier(first, 'async') && second?.kind === 'identifier' && isPunctuator(tokens[2], '=>')) {
    return [second.value];
  }

  const open = findFunctionParameters(tokens);
  return open === -1 ? [] : readParameterList(tokens, open);
}
