/**
 * S-expression reader
 *
 * Turns strategy source text into an AST. Lists use ( ), vectors [ ] and map
 * literals { }. Commas are whitespace and ';' starts a line comment.
 * Numbers are read straight into decimals, never through a binary float.
 */
import { ASTNode, ListSubtype, SourcePosition } from '../spec/types';
import { ParseError } from '../spec/errors';
import { Dec } from '../lib/decimal';
import { atom, list, numberAtom, stringAtom, symbol } from './ast';

export const DEFAULT_MAX_PARSE_DEPTH = 256;

export interface ParseOptions {
  /** Deepest list nesting accepted before failing */
  maxDepth?: number;
}

// ============================================================================
// Tokenizer
// ============================================================================

type TokenType = 'open' | 'close' | 'string' | 'word';

interface Token {
  type: TokenType;
  /** Raw text; for strings, the unescaped contents */
  text: string;
  position: SourcePosition;
}

const OPENERS: Record<string, ListSubtype> = {
  '(': 'plain',
  '[': 'vector',
  '{': 'map-literal',
};

const CLOSER_FOR: Record<ListSubtype, string> = {
  plain: ')',
  vector: ']',
  'map-literal': '}',
};

const ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  n: '\n',
  t: '\t',
  r: '\r',
};

const DELIMITERS = new Set(['(', ')', '[', ']', '{', '}', '"', ';', ',']);

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const LOOKS_NUMERIC = /^[+-]?\.?\d/;

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === ',';
}

class Tokenizer {
  private offset = 0;
  private line = 1;
  private column = 1;

  constructor(private readonly source: string) {}

  tokenize(): Token[] {
    const tokens: Token[] = [];

    while (this.offset < this.source.length) {
      const ch = this.source[this.offset];

      if (isWhitespace(ch)) {
        this.advance();
        continue;
      }

      if (ch === ';') {
        while (this.offset < this.source.length && this.source[this.offset] !== '\n') {
          this.advance();
        }
        continue;
      }

      const position = this.position();

      if (ch in OPENERS) {
        tokens.push({ type: 'open', text: ch, position });
        this.advance();
      } else if (ch === ')' || ch === ']' || ch === '}') {
        tokens.push({ type: 'close', text: ch, position });
        this.advance();
      } else if (ch === '"') {
        tokens.push({ type: 'string', text: this.readString(position), position });
      } else {
        tokens.push({ type: 'word', text: this.readWord(), position });
      }
    }

    return tokens;
  }

  endPosition(): SourcePosition {
    return this.position();
  }

  private readString(start: SourcePosition): string {
    this.advance(); // opening quote
    let value = '';

    while (this.offset < this.source.length) {
      const ch = this.source[this.offset];

      if (ch === '"') {
        this.advance();
        return value;
      }

      if (ch === '\\') {
        const escapePosition = this.position();
        this.advance();
        const next = this.source[this.offset];
        if (next === undefined) break;
        const replacement = ESCAPES[next];
        if (replacement === undefined) {
          throw new ParseError(`Unknown escape sequence \\${next}`, escapePosition);
        }
        value += replacement;
        this.advance();
        continue;
      }

      value += ch;
      this.advance();
    }

    throw new ParseError('Unterminated string literal', start);
  }

  private readWord(): string {
    const start = this.offset;
    while (this.offset < this.source.length) {
      const ch = this.source[this.offset];
      if (isWhitespace(ch) || DELIMITERS.has(ch)) break;
      this.advance();
    }
    return this.source.slice(start, this.offset);
  }

  private advance(): void {
    if (this.source[this.offset] === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    this.offset++;
  }

  private position(): SourcePosition {
    return { line: this.line, column: this.column, offset: this.offset };
  }
}

// ============================================================================
// Reader
// ============================================================================

class Reader {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly end: SourcePosition,
    private readonly maxDepth: number
  ) {}

  hasMore(): boolean {
    return this.index < this.tokens.length;
  }

  peek(): Token | undefined {
    return this.tokens[this.index];
  }

  readForm(depth: number): ASTNode {
    const token = this.tokens[this.index];
    if (!token) {
      throw new ParseError('Unexpected end of input', this.end);
    }
    this.index++;

    switch (token.type) {
      case 'open':
        return this.readList(token, depth + 1);
      case 'close':
        throw new ParseError(`Unexpected '${token.text}'`, token.position);
      case 'string':
        return stringAtom(token.text, token.position);
      case 'word':
        return readWord(token);
    }
  }

  private readList(open: Token, depth: number): ASTNode {
    if (depth > this.maxDepth) {
      throw new ParseError(`Maximum nesting depth of ${this.maxDepth} exceeded`, open.position);
    }

    const subtype = OPENERS[open.text];
    const expectedClose = CLOSER_FOR[subtype];
    const children: ASTNode[] = [];

    for (;;) {
      const next = this.peek();
      if (!next) {
        throw new ParseError(`Unclosed '${open.text}'`, open.position);
      }
      if (next.type === 'close') {
        if (next.text !== expectedClose) {
          throw new ParseError(
            `Mismatched bracket: expected '${expectedClose}' but found '${next.text}'`,
            next.position
          );
        }
        this.index++;
        break;
      }
      children.push(this.readForm(depth));
    }

    if (subtype === 'map-literal' && children.length % 2 !== 0) {
      const trailing = children[children.length - 1];
      throw new ParseError('unpaired map key', trailing.position ?? open.position);
    }

    return list(children, subtype, open.position);
  }
}

function readWord(token: Token): ASTNode {
  const { text, position } = token;

  if (text === 'true') return atom({ type: 'boolean', value: true }, position);
  if (text === 'false') return atom({ type: 'boolean', value: false }, position);
  if (text === 'nil') return atom({ type: 'nil' }, position);

  if (NUMBER_PATTERN.test(text)) {
    return numberAtom(new Dec(text), position);
  }
  if (LOOKS_NUMERIC.test(text)) {
    throw new ParseError(`Malformed numeric literal: ${text}`, position);
  }

  return symbol(text, position);
}

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Parse exactly one top-level form.
 */
export function parse(source: string, options: ParseOptions = {}): ASTNode {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_PARSE_DEPTH;
  const tokenizer = new Tokenizer(source);
  const tokens = tokenizer.tokenize();

  if (tokens.length === 0) {
    throw new ParseError('Empty source', { line: 1, column: 1, offset: 0 });
  }

  const reader = new Reader(tokens, tokenizer.endPosition(), maxDepth);
  const form = reader.readForm(0);

  const trailing = reader.peek();
  if (trailing) {
    throw new ParseError('Unexpected trailing form after top-level expression', trailing.position);
  }

  return form;
}
