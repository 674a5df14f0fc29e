/**
 * Allocation DSL Engine
 * Public API
 */

// Core types
export * from './spec/types';
export * from './spec/errors';
export * from './spec/schema';

// Decimal helpers
export { Dec, ONE, ZERO, toDecimal, sumDecimals } from './lib/decimal';

// Compiler
export { parse, DEFAULT_MAX_PARSE_DEPTH } from './compiler/parser';
export type { ParseOptions } from './compiler/parser';
export { atom, numberAtom, stringAtom, symbol, list, isKeyword, callName, formatNode } from './compiler/ast';
export { checkOperators, extractCalls } from './compiler/typecheck';
export type { TypeCheckError } from './compiler/typecheck';
export { StrategyCompiler, strategyName } from './compiler/compile';
export type { CompiledStrategy } from './compiler/compile';

// Runtime
export { evaluate, DEFAULT_MAX_NODE_VISITS, DEFAULT_MAX_EVAL_DEPTH, NIL_KEY_SENTINEL } from './runtime/eval';
export type { EvaluateOptions } from './runtime/eval';
export { EvaluationContext } from './runtime/context';
export type { EvaluationContextOptions, ContextStats } from './runtime/context';
export { TraceBuilder, withFailureEntry } from './runtime/trace';
export * from './runtime/values';
export * from './runtime/operators';
export {
  toAllocation,
  normalizeWeights,
  validateAllocation,
  createFallbackAllocation,
  serializeAllocation,
  DEFAULT_PRECISION,
  DEFAULT_TOLERANCE,
  DEFAULT_FALLBACK_SYMBOL,
} from './runtime/allocation';
export type { AllocationMeta, AllocationOptions } from './runtime/allocation';
export { ProcessedRequestCache } from './runtime/idempotency';
export {
  strategyEvaluatedEvent,
  allocationProducedEvent,
  decisionEvaluatedEvent,
  InMemoryEventPublisher,
  LoggingEventPublisher,
} from './runtime/events';
export type { EventMeta } from './runtime/events';
export { StrategyEngine } from './runtime/engine';
export type {
  StrategyEngineOptions,
  StrategyInput,
  EvaluationMeta,
  ComputeResult,
  EngineResult,
} from './runtime/engine';
export { MultiStrategyEvaluator, normalizeManifestWeights } from './runtime/multiStrategy';
export type { MultiStrategyResult, StrategyOutcome } from './runtime/multiStrategy';

// Indicators & market data
export * from './features/indicators';
export { IndicatorRegistry, createStandardIndicatorRegistry, DEFAULT_INDICATOR_WINDOWS } from './features/registry';
export type { IndicatorDefinition } from './features/registry';
export { BarIndicatorService } from './features/barIndicatorService';
export { InMemoryMarketDataPort } from './marketData/InMemoryMarketDataPort';

// Configuration
export { loadEngineConfig, ENV_KEYS } from './config/engineConfig';
export { parseStrategyManifest, loadStrategyManifest, isManifestPath } from './config/manifest';

// Logging
export { Logger, LoggerFactory } from './logging/logger';
export type { LoggerOptions, LogMeta } from './logging/logger';
export { MemoryTransport } from './logging/MemoryTransport';
export type { MemoryLogRecord } from './logging/MemoryTransport';
