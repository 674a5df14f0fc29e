#!/usr/bin/env node
/**
 * Evaluate a strategy (or a YAML manifest of strategies) against a market
 * data snapshot and print the resulting allocation
 *
 * Usage:
 *   evaluate-strategy <strategy.clj|manifest.yaml> --snapshot <bars.json> [--as-of ISO] [--check]
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { StrategyAllocation, TraceEntry } from '../spec/types';
import { describeError } from '../spec/errors';
import { loadEngineConfig } from '../config/engineConfig';
import { isManifestPath, loadStrategyManifest } from '../config/manifest';
import { StrategyCompiler } from '../compiler/compile';
import { createStandardRegistry } from '../runtime/operators';
import { StrategyEngine } from '../runtime/engine';
import { MultiStrategyEvaluator } from '../runtime/multiStrategy';
import { LoggingEventPublisher } from '../runtime/events';
import { BarIndicatorService } from '../features/barIndicatorService';
import { InMemoryMarketDataPort } from '../marketData/InMemoryMarketDataPort';
import { LoggerFactory } from '../logging/logger';

dotenv.config();

interface CliArgs {
  file?: string;
  snapshot?: string;
  asOf?: string;
  check: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { check: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--snapshot') {
      args.snapshot = argv[++i];
    } else if (arg === '--as-of') {
      args.asOf = argv[++i];
    } else if (arg === '--check') {
      args.check = true;
    } else if (!arg.startsWith('--')) {
      args.file = arg;
    } else {
      throw new Error(`Unknown option: ${arg}`);
    }
  }
  return args;
}

function printUsage(): void {
  console.error('Usage: evaluate-strategy <strategy.clj|manifest.yaml> --snapshot <bars.json> [--as-of ISO] [--check]');
  console.error('');
  console.error('Examples:');
  console.error('  npm run evaluate -- strategies/risk-on-off.clj --snapshot examples/data/market-snapshot.json');
  console.error('  npm run evaluate -- strategies/portfolio.yaml --snapshot examples/data/market-snapshot.json');
  console.error('  npm run evaluate -- strategies/risk-on-off.clj --check');
}

function printAllocation(allocation: StrategyAllocation): void {
  console.log(allocation.isFallback ? '⚠️  Fallback allocation' : '✅ Allocation');
  for (const [symbol, weight] of allocation.weights) {
    console.log(`  ${symbol.padEnd(8)} ${weight.toFixed(6)}`);
  }
}

function printTraceSummary(trace: TraceEntry[]): void {
  const decisions = trace.filter((entry) => entry.branch !== undefined);
  const failures = trace.filter((entry) => entry.status === 'error');
  console.log(`\n=== Trace (${trace.length} steps) ===`);
  for (const decision of decisions) {
    console.log(`  if → ${decision.branch}: ${decision.node}`);
  }
  for (const failure of failures.slice(-1)) {
    console.log(`  ❌ ${failure.error?.type}: ${failure.error?.message}`);
  }
}

function checkFiles(files: string[]): number {
  const compiler = new StrategyCompiler(createStandardRegistry(), {
    maxDepth: loadEngineConfig().maxParseDepth,
  });
  let failed = 0;

  for (const file of files) {
    try {
      const compiled = compiler.compile(fs.readFileSync(file, 'utf-8'));
      console.log(`✅ ${file}${compiled.name ? ` (${compiled.name})` : ''}`);
      console.log(`   Operators: ${compiled.operators.join(', ')}`);
      console.log(`   Symbols: ${compiled.symbols.join(', ')}`);
    } catch (error) {
      failed++;
      const { type, message } = describeError(error);
      console.error(`❌ ${file}: ${type}: ${message}`);
    }
  }

  return failed === 0 ? 0 : 1;
}

function main(): number {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(describeError(error).message);
    printUsage();
    return 1;
  }

  if (!args.file || (!args.check && !args.snapshot)) {
    printUsage();
    return 1;
  }

  const file = path.resolve(args.file);
  const manifest = isManifestPath(file) ? loadStrategyManifest(file) : null;

  if (args.check) {
    return checkFiles(manifest ? manifest.strategies.map((entry) => entry.file) : [file]);
  }

  const config = loadEngineConfig(process.env, { strategiesDir: path.dirname(file) });
  LoggerFactory.configure({ logLevel: process.env.LOG_LEVEL || 'warn' });

  const snapshotPath = path.resolve(args.snapshot ?? '');
  const snapshot = InMemoryMarketDataPort.loadSnapshot(snapshotPath);
  const marketData = InMemoryMarketDataPort.fromSnapshot(snapshot);
  const engine = new StrategyEngine({
    indicators: new BarIndicatorService(marketData),
    marketData,
    publisher: new LoggingEventPublisher(),
    config,
  });

  const asOfText = args.asOf ?? snapshot.asOf;
  const asOf = asOfText ? new Date(asOfText) : marketData.latestTimestamp() ?? new Date();
  if (Number.isNaN(asOf.getTime())) {
    console.error(`Invalid --as-of timestamp: ${args.asOf}`);
    return 1;
  }

  const correlationId = uuidv4();
  console.log(`📄 ${path.relative(process.cwd(), file)} as of ${asOf.toISOString()}\n`);

  if (manifest) {
    const result = new MultiStrategyEvaluator(engine).evaluate(manifest, { correlationId, asOf });
    if (result.status === 'duplicate') return 1;
    for (const outcome of result.strategies) {
      const status = outcome.ok ? '✅' : `❌ ${outcome.error?.message ?? ''}`;
      console.log(`  ${outcome.strategy ?? outcome.file} (${outcome.weight.toFixed(4)}) ${status}`);
    }
    console.log('');
    printAllocation(result.allocation);
    return result.status === 'evaluated' ? 0 : 2;
  }

  const result = engine.evaluate(fs.readFileSync(file, 'utf-8'), { correlationId, asOf });
  if (result.status !== 'evaluated' && result.status !== 'fallback') {
    return 1;
  }
  if (result.strategy) {
    console.log(`Strategy: ${result.strategy}\n`);
  }
  printAllocation(result.allocation);
  printTraceSummary(result.trace);
  return result.status === 'evaluated' ? 0 : 2;
}

try {
  process.exitCode = main();
} catch (error) {
  const { type, message } = describeError(error);
  console.error(`❌ ${type}: ${message}`);
  process.exitCode = 1;
}
