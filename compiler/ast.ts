/**
 * AST constructors, predicates and rendering
 */
import {
  ASTNode,
  AtomLiteral,
  AtomNode,
  ListNode,
  ListSubtype,
  SourcePosition,
  SymbolNode,
} from '../spec/types';
import { Decimal, toDecimal } from '../lib/decimal';

// ============================================================================
// Constructors (nodes are frozen once built)
// ============================================================================

export function atom(literal: AtomLiteral, position?: SourcePosition): AtomNode {
  const node: AtomNode = { kind: 'atom', literal: Object.freeze(literal), position };
  return Object.freeze(node);
}

export function numberAtom(value: Decimal.Value, position?: SourcePosition): AtomNode {
  return atom({ type: 'number', value: toDecimal(value) }, position);
}

export function stringAtom(value: string, position?: SourcePosition): AtomNode {
  return atom({ type: 'string', value }, position);
}

export function symbol(name: string, position?: SourcePosition): SymbolNode {
  const node: SymbolNode = { kind: 'symbol', name, position };
  return Object.freeze(node);
}

export function list(
  children: readonly ASTNode[],
  subtype: ListSubtype = 'plain',
  position?: SourcePosition
): ListNode {
  const node: ListNode = {
    kind: 'list',
    subtype,
    children: Object.freeze([...children]),
    position,
  };
  return Object.freeze(node);
}

// ============================================================================
// Predicates
// ============================================================================

export function isKeyword(node: ASTNode): node is SymbolNode {
  return node.kind === 'symbol' && node.name.startsWith(':') && node.name.length > 1;
}

/**
 * Name of the head symbol when the node is a plain call form: (name ...)
 */
export function callName(node: ASTNode): string | null {
  if (node.kind !== 'list' || node.subtype !== 'plain') return null;
  const head = node.children[0];
  if (!head || head.kind !== 'symbol') return null;
  return head.name;
}

// ============================================================================
// Rendering
// ============================================================================

const BRACKETS: Record<ListSubtype, [string, string]> = {
  plain: ['(', ')'],
  'map-literal': ['{', '}'],
  vector: ['[', ']'],
};

function renderLiteral(literal: AtomLiteral): string {
  switch (literal.type) {
    case 'number':
      return literal.value.toString();
    case 'string':
      return JSON.stringify(literal.value);
    case 'boolean':
      return literal.value ? 'true' : 'false';
    case 'nil':
      return 'nil';
  }
}

/**
 * Render a node back to s-expression text. Output longer than maxLength is
 * cut and suffixed with "..."; rendering stops as soon as the limit is
 * passed.
 */
export function formatNode(node: ASTNode, maxLength: number = 120): string {
  const out: RenderBuffer = { text: '', limit: maxLength };
  if (renderInto(node, out)) {
    return out.text;
  }
  return `${out.text.slice(0, Math.max(0, maxLength - 3))}...`;
}

interface RenderBuffer {
  text: string;
  limit: number;
}

// false once the text is longer than the limit
function renderInto(node: ASTNode, out: RenderBuffer): boolean {
  switch (node.kind) {
    case 'atom':
      out.text += renderLiteral(node.literal);
      break;
    case 'symbol':
      out.text += node.name;
      break;
    case 'list': {
      const [open, close] = BRACKETS[node.subtype];
      out.text += open;
      for (let i = 0; i < node.children.length; i++) {
        if (i > 0) out.text += ' ';
        if (!renderInto(node.children[i], out)) return false;
      }
      out.text += close;
      break;
    }
  }
  return out.text.length <= out.limit;
}
