/**
 * Control flow: if, defsymphony
 *
 * Both are special forms. `if` evaluates only the branch it takes, so the
 * other branch leaves no trace entries and triggers no indicator lookups.
 */
import { DSLValue } from '../../spec/types';
import { EvaluationError } from '../../spec/errors';
import { formatNode } from '../../compiler/ast';
import { decisionEvaluatedEvent } from '../events';
import { typeName } from '../values';
import { OperatorCall, SpecialOperator } from './registry';

const ifOperator: SpecialOperator = {
  name: 'if',
  category: 'control-flow',
  form: 'special',
  arity: { min: 2, max: 3 },
  description: '(if condition then else?) evaluates only the taken branch',
  apply(call: OperatorCall): DSLValue {
    const [conditionNode, thenNode, elseNode] = call.args;

    const condition = call.evaluate(conditionNode);
    if (condition.kind !== 'bool') {
      throw new EvaluationError(`if condition must be a bool, got ${typeName(condition)}`, {
        position: conditionNode.position,
      });
    }

    const branch = condition.value ? 'then' : 'else';
    call.setBranch(branch);
    call.context.publish(
      decisionEvaluatedEvent(call.context.eventMeta(), {
        condition: formatNode(conditionNode),
        conditionResult: condition.value,
        branch,
        position: call.node.position,
      })
    );

    if (condition.value) {
      return call.evaluate(thenNode);
    }
    if (!elseNode) {
      throw new EvaluationError('if condition was false and there is no else branch');
    }
    return call.evaluate(elseNode);
  },
};

/**
 * (defsymphony "name" {config} body): the name and config are metadata,
 * only the body is evaluated.
 */
const defsymphonyOperator: SpecialOperator = {
  name: 'defsymphony',
  category: 'control-flow',
  form: 'special',
  arity: { min: 2, max: 3 },
  description: '(defsymphony name config? body) evaluates the strategy body',
  apply(call: OperatorCall): DSLValue {
    const nameNode = call.args[0];
    const body = call.args[call.args.length - 1];

    if (nameNode.kind === 'atom' && nameNode.literal.type === 'string') {
      call.setInputs([nameNode.literal.value]);
    } else {
      call.setInputs([formatNode(nameNode, 60)]);
    }

    return call.evaluate(body);
  },
};

export const CONTROL_FLOW_OPERATORS: SpecialOperator[] = [ifOperator, defsymphonyOperator];
