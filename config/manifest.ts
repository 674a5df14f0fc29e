/**
 * Strategy manifest loading (YAML)
 *
 *   name: core-portfolio
 *   strategies:
 *     - file: nuclear.clj
 *       weight: 0.6
 *     - file: tecl.clj
 *       weight: 0.4
 *
 * Relative `file` paths resolve against the manifest's directory.
 */
import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import { StrategyManifest, formatIssues, StrategyManifestSchema } from '../spec/schema';

export function parseStrategyManifest(yamlContent: string, baseDir: string = process.cwd()): StrategyManifest {
  let parsed: unknown;
  try {
    parsed = YAML.parse(yamlContent);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid manifest YAML: ${message}`, { cause: error });
  }

  const result = StrategyManifestSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid strategy manifest: ${formatIssues(result.error)}`);
  }

  return {
    ...result.data,
    strategies: result.data.strategies.map((entry) => ({
      ...entry,
      file: path.resolve(baseDir, entry.file),
    })),
  };
}

export function loadStrategyManifest(manifestPath: string): StrategyManifest {
  const content = fs.readFileSync(manifestPath, 'utf-8');
  return parseStrategyManifest(content, path.dirname(path.resolve(manifestPath)));
}

export function isManifestPath(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return ext === '.yaml' || ext === '.yml';
}
