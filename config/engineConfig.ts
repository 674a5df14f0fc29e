/**
 * Engine configuration from ENGINE_* environment variables
 */
import { EngineConfig, EngineConfigSchema, formatIssues } from '../spec/schema';

export const ENV_KEYS: Readonly<Record<keyof EngineConfig, string>> = {
  fallbackSymbol: 'ENGINE_FALLBACK_SYMBOL',
  precision: 'ENGINE_PRECISION',
  tolerance: 'ENGINE_TOLERANCE',
  maxParseDepth: 'ENGINE_MAX_PARSE_DEPTH',
  maxNodeVisits: 'ENGINE_MAX_NODE_VISITS',
  maxEvalDepth: 'ENGINE_MAX_EVAL_DEPTH',
  idempotencyCapacity: 'ENGINE_IDEMPOTENCY_CAPACITY',
  idempotencyTtlMs: 'ENGINE_IDEMPOTENCY_TTL_MS',
  strategiesDir: 'ENGINE_STRATEGIES_DIR',
};

/**
 * Read and validate the configuration. Empty variables count as unset;
 * explicit overrides win over the environment.
 */
export function loadEngineConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<EngineConfig> = {}
): EngineConfig {
  const raw: Record<string, unknown> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') {
      raw[key] = value.trim();
    }
  }

  const result = EngineConfigSchema.safeParse({ ...raw, ...overrides });
  if (!result.success) {
    throw new Error(`Invalid engine configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}
