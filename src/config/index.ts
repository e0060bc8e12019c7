import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';

const unit = z.number().min(0).max(1);
const weight = z.number().min(0);

export const StorageConfigSchema = z.object({
  dbFile: z.string().min(1).default('memory.db'),
});

export const EmbeddingsConfigSchema = z.object({
  provider: z.enum(['none', 'simple', 'ollama']).default('none'),
  ollamaUrl: z.string().default('http://127.0.0.1:11434'),
  model: z.string().default('nomic-embed-text'),
});

export const ExtractionConfigSchema = z.object({
  provider: z.enum(['heuristic', 'ollama']).default('heuristic'),
  ollamaUrl: z.string().default('http://127.0.0.1:11434'),
  model: z.string().default('llama3.2'),
});

export const RetrievalWeightsSchema = z.object({
  lexical: weight.default(0.3),
  recency: weight.default(0.2),
  confidence: weight.default(0.25),
  vector: weight.default(0.15),
  goal: weight.default(0.1),
});

export const RetrievalConfigSchema = z.object({
  weights: RetrievalWeightsSchema.default({}),
  recencyHalfLifeDays: z.number().positive().default(7),
  defaultTopK: z.number().int().positive().default(10),
});

export const ConsolidationConfigSchema = z.object({
  batchSize: z.number().int().positive().default(200),
  heuristicConfidence: unit.default(0.6),
  corroborationGain: z.number().gt(0).lt(1).default(0.3),
  maxReplayConfidence: z.number().gt(0).lt(1).default(0.99),
  contradictionThreshold: unit.default(0.6),
  disputePenalty: unit.default(0.15),
  disputeDecay: z.number().gt(0).max(1).default(0.85),
  supersedeFloor: unit.default(0.2),
  confirmThreshold: unit.default(0.85),
  skillHistoryLength: z.number().int().positive().default(20),
});

export const ForgettingConfigSchema = z.object({
  defaultSalience: z.number().min(0).default(1.0),
  salienceHalfLifeDays: z.number().positive().default(14),
  pruneFloor: z.number().min(0).default(0.1),
  retentionDays: z.number().min(0).default(30),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default('warn'),
});

export const ConfigSchema = z.object({
  version: z.number().default(1),
  storage: StorageConfigSchema.default({}),
  embeddings: EmbeddingsConfigSchema.default({}),
  extraction: ExtractionConfigSchema.default({}),
  retrieval: RetrievalConfigSchema.default({}),
  consolidation: ConsolidationConfigSchema.default({}),
  forgetting: ForgettingConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;
export type RetrievalWeights = z.infer<typeof RetrievalWeightsSchema>;
export type ConsolidationConfig = z.infer<typeof ConsolidationConfigSchema>;
export type ForgettingConfig = z.infer<typeof ForgettingConfigSchema>;

export const REVERIE_DIR = '.reverie';
export const CONFIG_FILE = 'config.json';

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  while (currentDir !== path.dirname(currentDir)) {
    const dirPath = path.join(currentDir, REVERIE_DIR);
    if (fs.existsSync(dirPath) && fs.statSync(dirPath).isDirectory()) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export function getReverieDir(projectRoot?: string): string {
  const root = projectRoot ?? findProjectRoot();
  if (!root) {
    throw new Error('No memory store found. Run `rv init` first.');
  }
  return path.join(root, REVERIE_DIR);
}

export function getConfigPath(projectRoot?: string): string {
  return path.join(getReverieDir(projectRoot), CONFIG_FILE);
}

export function getMemoryDbPath(projectRoot?: string, config?: Config): string {
  const dbFile = (config ?? loadConfig(projectRoot)).storage.dbFile;
  return path.join(getReverieDir(projectRoot), dbFile);
}

export function loadConfig(projectRoot?: string): Config {
  const configPath = getConfigPath(projectRoot);

  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }

  try {
    const rawConfig: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    return ConfigSchema.parse(rawConfig);
  } catch {
    // Corrupt or invalid config - fall back to defaults
    return defaultConfig();
  }
}

export function saveConfig(config: Config, projectRoot?: string): void {
  const configPath = getConfigPath(projectRoot);
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
}

export function initProject(targetDir: string = process.cwd(), force: boolean = false): void {
  const dirPath = path.join(targetDir, REVERIE_DIR);

  if (fs.existsSync(dirPath) && !force) {
    throw new Error('Memory store already initialized. Use --force to reinitialize.');
  }

  fs.mkdirSync(dirPath, { recursive: true, mode: 0o700 });

  fs.writeFileSync(
    path.join(dirPath, CONFIG_FILE),
    JSON.stringify(defaultConfig(), null, 2),
    { mode: 0o600 }
  );

  fs.writeFileSync(path.join(dirPath, '.gitignore'), `# Local memory store
*.db
*.db-journal
*.db-wal
*.db-shm
`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function setConfigValue(key: string, value: string, projectRoot?: string): void {
  const config: Record<string, unknown> = loadConfig(projectRoot);
  const keys = key.split('.');

  let current = config;
  for (let i = 0; i < keys.length - 1; i++) {
    const next = current[keys[i]];
    if (!isRecord(next)) {
      throw new Error(`Invalid config key: ${key}`);
    }
    current = next;
  }

  const lastKey = keys[keys.length - 1];
  if (!(lastKey in current)) {
    throw new Error(`Invalid config key: ${key}`);
  }

  const existingValue = current[lastKey];
  if (typeof existingValue === 'number') {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      throw new Error(`Config key ${key} expects a number, got "${value}"`);
    }
    current[lastKey] = parsed;
  } else if (typeof existingValue === 'boolean') {
    current[lastKey] = value === 'true';
  } else {
    current[lastKey] = value;
  }

  const validated = ConfigSchema.parse(config);
  saveConfig(validated, projectRoot);
}

export function getConfigValue(key: string, projectRoot?: string): unknown {
  const config = loadConfig(projectRoot);
  const keys = key.split('.');

  let current: unknown = config;
  for (const k of keys) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[k];
  }

  return current;
}
