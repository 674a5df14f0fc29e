/**
 * Static operator checking
 * Finds unknown operators and wrong argument counts before evaluation
 */
import { ASTNode, SourcePosition } from '../spec/types';
import { OperatorRegistry, acceptsArgCount, formatArity } from '../runtime/operators/registry';

// ============================================================================
// Type Checker
// ============================================================================

export interface TypeCheckError {
  kind: 'unknown-operator' | 'arity';
  message: string;
  operators?: string[];
  position?: SourcePosition;
}

/**
 * Every call form reached by the walk, in source order
 */
export function extractCalls(node: ASTNode): Array<{ name: string; node: ASTNode; argCount: number }> {
  const calls: Array<{ name: string; node: ASTNode; argCount: number }> = [];

  function walk(n: ASTNode): void {
    if (n.kind !== 'list') return;
    const head = n.children[0];
    if (n.subtype === 'plain' && head && head.kind === 'symbol') {
      calls.push({ name: head.name, node: n, argCount: n.children.length - 1 });
    }
    for (const child of n.children) {
      walk(child);
    }
  }

  walk(node);
  return calls;
}

export function checkOperators(ast: ASTNode, registry: OperatorRegistry): TypeCheckError | null {
  const calls = extractCalls(ast);

  const unknown = calls.filter((call) => !registry.has(call.name));
  if (unknown.length > 0) {
    const names = Array.from(new Set(unknown.map((call) => call.name)));
    const first = unknown[0].node;
    return {
      kind: 'unknown-operator',
      message: `Unknown operator${names.length > 1 ? 's' : ''}: ${names.join(', ')}`,
      operators: names,
      position: first.kind === 'list' ? first.children[0].position : first.position,
    };
  }

  for (const call of calls) {
    const operator = registry.resolve(call.name);
    if (!acceptsArgCount(operator.arity, call.argCount)) {
      return {
        kind: 'arity',
        message: `${call.name} expects ${formatArity(operator.arity)} argument(s), got ${call.argCount}`,
        operators: [call.name],
        position: call.node.position,
      };
    }
  }

  return null;
}
