/**
 * S-expression reader tests
 */
import { parse } from '../compiler/parser';
import { formatNode, list, symbol } from '../compiler/ast';
import { ParseError } from '../spec/errors';
import { ASTNode, ListNode, SymbolNode } from '../spec/types';

function asList(node: ASTNode): ListNode {
  if (node.kind !== 'list') {
    throw new Error(`expected a list, got ${node.kind}`);
  }
  return node;
}

function parseError(source: string, maxDepth?: number): ParseError {
  try {
    parse(source, { maxDepth });
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error(`expected ${JSON.stringify(source)} to fail`);
}

describe('parse', () => {
  describe('forms', () => {
    test('reads a call with string arguments', () => {
      const node = asList(parse('(weight-equal "AAPL" "MSFT")'));

      expect(node.subtype).toBe('plain');
      expect(node.children).toHaveLength(3);
      expect(node.children[0]).toMatchObject({ kind: 'symbol', name: 'weight-equal' });
      expect(node.children[1]).toMatchObject({ kind: 'atom', literal: { type: 'string', value: 'AAPL' } });
      expect(node.children[2]).toMatchObject({ kind: 'atom', literal: { type: 'string', value: 'MSFT' } });
    });

    test('distinguishes lists, vectors and map literals', () => {
      const node = asList(parse('(f [1 2] {:window 10})'));

      expect(asList(node.children[1]).subtype).toBe('vector');
      expect(asList(node.children[2]).subtype).toBe('map-literal');
      expect(asList(node.children[2]).children[0]).toMatchObject({ kind: 'symbol', name: ':window' });
    });

    test('reads numbers as exact decimals', () => {
      const node = asList(parse('[0.1 -2 1e3 .5]'));
      const values = node.children.map((child) =>
        child.kind === 'atom' && child.literal.type === 'number' ? child.literal.value.toString() : null
      );

      expect(values).toEqual(['0.1', '-2', '1000', '0.5']);
    });

    test('reads true, false and nil as literals', () => {
      const node = asList(parse('[true false nil]'));

      expect(node.children.map((child) => (child.kind === 'atom' ? child.literal.type : child.kind))).toEqual([
        'boolean',
        'boolean',
        'nil',
      ]);
    });

    test('treats commas as whitespace and skips comments', () => {
      const node = asList(parse('; header\n{:a 1, :b 2} ; trailing'));

      expect(node.children).toHaveLength(4);
    });

    test('unescapes string literals', () => {
      const node = parse('"say \\"hi\\"\\n"');

      expect(node).toMatchObject({ kind: 'atom', literal: { type: 'string', value: 'say "hi"\n' } });
    });

    test('keeps symbols that start with a sign', () => {
      expect(parse('-')).toMatchObject({ kind: 'symbol', name: '-' });
      expect(parse('>=')).toMatchObject({ kind: 'symbol', name: '>=' });
    });
  });

  describe('positions', () => {
    test('records 1-based line and column of each node', () => {
      const node = asList(parse('(if\n  (> x 1)\n  "A")'));

      expect(node.position).toEqual({ line: 1, column: 1, offset: 0 });
      expect(node.children[1].position).toEqual({ line: 2, column: 3, offset: 6 });
      expect(node.children[2].position).toEqual({ line: 3, column: 3, offset: 16 });
    });
  });

  describe('errors', () => {
    test('rejects empty source', () => {
      const error = parseError('  ; only a comment\n');

      expect(error.message).toBe('Empty source (line 1, column 1)');
      expect(error.line).toBe(1);
    });

    test('reports an unclosed list at its opening bracket', () => {
      const error = parseError('(a\n (b c)');

      expect(error.message).toBe("Unclosed '(' (line 1, column 1)");
    });

    test('reports mismatched brackets', () => {
      const error = parseError('(a b]');

      expect(error.message).toBe("Mismatched bracket: expected ')' but found ']' (line 1, column 5)");
      expect(error.column).toBe(5);
    });

    test('reports an unexpected closing bracket', () => {
      expect(parseError(')').message).toBe("Unexpected ')' (line 1, column 1)");
    });

    test('reports an unpaired map key at the trailing child', () => {
      const error = parseError('{:a 1 :b}');

      expect(error.message).toBe('unpaired map key (line 1, column 7)');
    });

    test('rejects unterminated strings', () => {
      expect(parseError('(asset "SPY)').message).toBe('Unterminated string literal (line 1, column 8)');
    });

    test('rejects unknown escapes', () => {
      expect(parseError('"a\\q"').message).toBe('Unknown escape sequence \\q (line 1, column 3)');
    });

    test('rejects malformed numbers', () => {
      expect(parseError('(> x 1.2.3)').message).toBe('Malformed numeric literal: 1.2.3 (line 1, column 6)');
    });

    test('rejects more than one top-level form', () => {
      expect(parseError('(a) (b)').message).toBe(
        'Unexpected trailing form after top-level expression (line 1, column 5)'
      );
    });

    test('enforces the nesting depth limit', () => {
      const deep = '('.repeat(5) + ')'.repeat(5);

      expect(() => parse(deep, { maxDepth: 5 })).not.toThrow();
      expect(parseError(deep, 4).message).toBe('Maximum nesting depth of 4 exceeded (line 1, column 5)');
    });
  });

  test('round-trips through formatNode', () => {
    const source = '(defsymphony "x" {:a 1} (weight-equal [(asset "SPY") (asset "TLT")]))';

    expect(formatNode(parse(source), 500)).toBe(source);
  });

  test('formatNode cuts long output', () => {
    expect(formatNode(parse('(asset A)'), 10)).toBe('(asset A)');
    expect(formatNode(parse('(asset "SPY")'), 10)).toBe('(asset ...');
  });

  test('formatNode stops rendering once past the limit', () => {
    const unreachable: SymbolNode = {
      kind: 'symbol',
      get name(): string {
        throw new Error('rendered past the limit');
      },
    };
    const node = list([symbol('a'.repeat(20)), unreachable]);

    expect(formatNode(node, 10)).toBe('(aaaaaa...');
  });
});
