import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ModelCandidate } from '@hemascope/shared/src/types/analysis.types.js';
import { ConfigurationError } from '@hemascope/shared/src/utils/errors.js';
import { validateAnalysisConfig, validateModelCascadeConfig } from './validators.js';
import type { AnalysisConfig } from './analysis.schema.js';

export interface CascadeConfig {
  readonly rateLimitBackoffMs: number;
  /** Sorted by ascending priority and frozen. */
  readonly candidates: readonly ModelCandidate[];
}

export interface AppConfig {
  readonly cascade: CascadeConfig;
  readonly analysis: AnalysisConfig;
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

export function freezeCandidates(candidates: readonly ModelCandidate[]): readonly ModelCandidate[] {
  const ordered = [...candidates]
    .sort((a, b) => a.priority - b.priority)
    .map((candidate) =>
      Object.freeze({ ...candidate, endpoint: Object.freeze({ ...candidate.endpoint }) }),
    );
  return Object.freeze(ordered);
}

export async function loadConfig(configDir: string): Promise<AppConfig> {
  const modelsPath = join(configDir, 'models.json');
  const analysisPath = join(configDir, 'analysis.json');

  const [modelsRaw, analysisRaw] = await Promise.all([
    readJsonFile(modelsPath),
    readJsonFile(analysisPath),
  ]);

  const models = validateModelCascadeConfig(modelsRaw);
  const analysis = validateAnalysisConfig(analysisRaw);

  return {
    cascade: {
      rateLimitBackoffMs: models.rateLimitBackoffMs,
      candidates: freezeCandidates(models.candidates),
    },
    analysis,
  };
}
