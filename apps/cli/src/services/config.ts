import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { isLogLevel, setLogLevel } from './logger';

// Get directory of this file for reliable path resolution
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Config path relative to this file: services/ -> src/ -> cli/ -> apps/ -> project root
const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '../../../../config/default.json');

const userAgentSchema = z.object({
  appName: z.string().min(1),
  homepage: z.string().default(''),
  contact: z.string().default(''),
  /** Full override; wins over appName/homepage/contact */
  override: z.string().optional(),
});

const httpSchema = z.object({
  maxRetries: z.number().int().min(1),
  backoffBaseMs: z.number().int().min(0),
  backoffMaxMs: z.number().int().min(0),
  searchTimeoutMs: z.number().int().positive(),
  downloadTimeoutMs: z.number().int().positive(),
  maxConcurrent: z.number().int().min(1),
});

const providerSchema = z.object({
  baseUrl: z.string().url(),
  minIntervalMs: z.number().int().min(0),
});

const semanticScholarSchema = providerSchema.extend({
  apiKey: z.string().nullable().default(null),
});

const downloadsSchema = z.object({
  dir: z.string().min(1),
  chunkSize: z.number().int().positive(),
});

const loggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']),
});

const appConfigSchema = z.object({
  userAgent: userAgentSchema,
  http: httpSchema,
  arxiv: providerSchema,
  semanticScholar: semanticScholarSchema,
  downloads: downloadsSchema,
  logging: loggingSchema,
});

export type UserAgentConfig = z.infer<typeof userAgentSchema>;
export type HttpConfig = z.infer<typeof httpSchema>;
export type ProviderConfig = z.infer<typeof providerSchema>;
export type SemanticScholarConfig = z.infer<typeof semanticScholarSchema>;
export type DownloadsConfig = z.infer<typeof downloadsSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

let cachedConfig: AppConfig | null = null;

function resolveConfigPath(rawPath: string): string {
  const candidates: string[] = [];
  if (path.isAbsolute(rawPath)) {
    candidates.push(rawPath);
  } else {
    candidates.push(path.resolve(process.cwd(), rawPath));
    // Also resolve relative to repository root when run from a workspace directory.
    candidates.push(path.resolve(__dirname, '../../../../', rawPath));
    candidates.push(rawPath);
  }

  for (const candidate of candidates) {
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }

  return candidates[0] || rawPath;
}

function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  const next: AppConfig = {
    ...config,
    userAgent: { ...config.userAgent },
    semanticScholar: { ...config.semanticScholar },
    downloads: { ...config.downloads },
    logging: { ...config.logging },
  };

  if (env.PAPERHUB_USER_AGENT) {
    next.userAgent.override = env.PAPERHUB_USER_AGENT;
  }
  if (env.PAPERHUB_HOMEPAGE) {
    next.userAgent.homepage = env.PAPERHUB_HOMEPAGE;
  }
  if (env.PAPERHUB_CONTACT) {
    next.userAgent.contact = env.PAPERHUB_CONTACT;
  }
  if (env.SEMANTIC_SCHOLAR_API_KEY) {
    next.semanticScholar.apiKey = env.SEMANTIC_SCHOLAR_API_KEY;
  }
  if (env.PAPERHUB_DOWNLOADS_DIR) {
    next.downloads.dir = env.PAPERHUB_DOWNLOADS_DIR;
  }
  const level = env.LOG_LEVEL;
  if (isLogLevel(level)) {
    next.logging.level = level;
  }
  return next;
}

/**
 * Load configuration from JSON file with environment overrides
 */
export function loadConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const requestedPath = process.env.CONFIG_PATH || DEFAULT_CONFIG_PATH;
  const configPath = resolveConfigPath(requestedPath);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    console.error(`Failed to load config from ${configPath} (requested: ${requestedPath}):`, error);
    throw new Error(`Configuration file not found or invalid: ${requestedPath}`);
  }

  const parsed = appConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Configuration file ${requestedPath} is invalid: ${issues}`);
  }

  const config = applyEnvOverrides(parsed.data, process.env);
  setLogLevel(config.logging.level);

  cachedConfig = config;
  return config;
}

/**
 * Get the loaded config (loads it on first use)
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
