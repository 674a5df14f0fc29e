/**
 * Standard operator set
 */
import { COMPARISON_OPERATORS } from './comparison';
import { CONTROL_FLOW_OPERATORS } from './controlFlow';
import { INDICATOR_OPERATORS } from './indicators';
import { PORTFOLIO_OPERATORS } from './portfolio';
import { SELECTION_OPERATORS } from './selection';
import { OperatorDefinition, OperatorRegistry } from './registry';

export const STANDARD_OPERATORS: readonly OperatorDefinition[] = [
  ...COMPARISON_OPERATORS,
  ...CONTROL_FLOW_OPERATORS,
  ...INDICATOR_OPERATORS,
  ...PORTFOLIO_OPERATORS,
  ...SELECTION_OPERATORS,
];

export function createStandardRegistry(): OperatorRegistry {
  return new OperatorRegistry(STANDARD_OPERATORS);
}

export * from './registry';
