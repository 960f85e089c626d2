import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

// Get directory of this file for reliable path resolution
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Repository root relative to this file: services/ -> src/ -> api/ -> apps/ -> project root
const REPO_ROOT = path.resolve(__dirname, '../../../../');
const DEFAULT_CONFIG_PATH = path.join(REPO_ROOT, 'config/default.json');

const LLMConfigSchema = z.object({
  baseUrl: z.string(),
  model: z.string(),
  maxTokens: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
  timeout: z.number().int().positive(),
});

const EmbeddingsConfigSchema = z.object({
  provider: z.enum(['hashing', 'openai']),
  model: z.string(),
  /** Only used by the hashing provider; remote models pick their own width */
  dimensions: z.number().int().positive(),
});

const RetrievalConfigSchema = z.object({
  topK: z.number().int().positive().default(5),
  maxDocumentContextChars: z.number().int().positive().default(500),
});

const DatabaseConfigSchema = z.object({
  path: z.string(),
});

const DataConfigSchema = z.object({
  invoiceSeedPath: z.string().optional(),
  corpusPath: z.string().optional(),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const AppConfigSchema = z.object({
  llm: LLMConfigSchema,
  embeddings: EmbeddingsConfigSchema,
  retrieval: RetrievalConfigSchema,
  database: DatabaseConfigSchema,
  data: DataConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

let cachedConfig: AppConfig | null = null;

/**
 * Resolve a path from config against cwd first, then the repository root.
 * `:memory:` is passed through for SQLite.
 */
export function resolveDataPath(rawPath: string): string {
  if (rawPath === ':memory:' || path.isAbsolute(rawPath)) {
    return rawPath;
  }
  const fromCwd = path.resolve(process.cwd(), rawPath);
  if (fs.existsSync(fromCwd)) {
    return fromCwd;
  }
  return path.resolve(REPO_ROOT, rawPath);
}

function resolveConfigPath(rawPath: string): string {
  const candidates: string[] = [];
  if (path.isAbsolute(rawPath)) {
    candidates.push(rawPath);
  } else {
    candidates.push(path.resolve(process.cwd(), rawPath));
    // Also resolve relative to repository root for monorepo/dev-server cwd drift.
    candidates.push(path.resolve(REPO_ROOT, rawPath));
  }

  for (const candidate of candidates) {
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }

  return candidates[0] || rawPath;
}

/**
 * Load application configuration from JSON file with environment overrides
 */
export function loadConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const requestedPath = process.env.CONFIG_PATH || DEFAULT_CONFIG_PATH;
  const configPath = resolveConfigPath(requestedPath);

  let config: AppConfig;

  try {
    const configFile = fs.readFileSync(configPath, 'utf-8');
    config = AppConfigSchema.parse(JSON.parse(configFile));
  } catch (error) {
    console.error(`[Config] Failed to load config from ${configPath} (requested: ${requestedPath}):`, error);
    throw new Error(`Configuration file not found or invalid: ${requestedPath}`);
  }

  // Override with environment variables if present
  if (process.env.LLM_BASE_URL) {
    config.llm.baseUrl = process.env.LLM_BASE_URL;
  }
  if (process.env.LLM_MODEL) {
    config.llm.model = process.env.LLM_MODEL;
  }
  if (process.env.DATABASE_PATH) {
    config.database.path = process.env.DATABASE_PATH;
  }
  const embeddingsProvider = EmbeddingsConfigSchema.shape.provider.safeParse(process.env.EMBEDDINGS_PROVIDER);
  if (embeddingsProvider.success) {
    config.embeddings.provider = embeddingsProvider.data;
  }
  const logLevel = LoggingConfigSchema.shape.level.safeParse(process.env.LOG_LEVEL);
  if (process.env.LOG_LEVEL && logLevel.success) {
    config.logging.level = logLevel.data;
  }

  cachedConfig = config;
  return config;
}

/**
 * Get the loaded config (loads on first use)
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
