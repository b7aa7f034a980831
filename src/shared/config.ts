import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getImporterDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

const LimitsSchema = z.object({
  per_site: z.number().int().positive(),
  total_cap: z.number().int().positive(),
});

export const ConfigSchema = z.object({
  destination: z
    .object({
      base_url: z.string().default('http://mealie:9000'),
      api_token: z.string().default(''),
      timeout_ms: z.number().positive().default(30000),
      retries: z.number().int().min(1).default(3),
      retry_backoff_ms: z.number().min(0).default(2000),
      include_tags: z.boolean().default(true),
    })
    .default({}),

  discovery: z
    .object({
      user_agent: z.string().default('RecipeImporter/1.0 (+local homelab)'),
      throttle_seconds: z.number().min(0).default(1.0),
      timeout_ms: z.number().positive().default(30000),
      probe_timeout_ms: z.number().positive().default(5000),
      robots_timeout_ms: z.number().positive().default(10000),
      require_recipe_schema: z.boolean().default(false),
    })
    .default({}),

  limits: z
    .object({
      backfill: LimitsSchema.default({ per_site: 75, total_cap: 1500 }),
      delta: LimitsSchema.default({ per_site: 40, total_cap: 800 }),
    })
    .default({}),

  paths: z
    .object({
      sources: z.string().default('~/.recipe-importer/sources.yaml'),
      allowlist: z.string().default('~/.recipe-importer/allowlist.yaml'),
      db: z.string().default('~/.recipe-importer/importer_state.db'),
      run_log: z.string().default('~/.recipe-importer/import.log'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type RunMode = keyof Config['limits'];

export const RUN_MODES: readonly RunMode[] = ['backfill', 'delta'];

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function isSection(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function asSection(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (isSection(value)) return value;
  const section: Record<string, unknown> = {};
  raw[key] = section;
  return section;
}

function envNumber(name: string): number | undefined {
  const value = process.env[name];
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Environment variable ${name} is not a number: ${value}`, { name });
  }
  return parsed;
}

/**
 * Apply the environment variables the container deployment sets on top of the file config.
 */
export function applyEnvOverrides(rawConfig: Record<string, unknown>): Record<string, unknown> {
  const baseUrl = process.env['MEALIE_BASE_URL'];
  const token = process.env['MEALIE_IMPORTER_TOKEN'];
  const userAgent = process.env['USER_AGENT'];
  const throttle = envNumber('THROTTLE_SECONDS');
  const timeoutSeconds = envNumber('REQUEST_TIMEOUT');

  if (baseUrl || token || timeoutSeconds !== undefined) {
    const destination = asSection(rawConfig, 'destination');
    if (baseUrl) destination['base_url'] = baseUrl;
    if (token) destination['api_token'] = token;
    if (timeoutSeconds !== undefined) destination['timeout_ms'] = timeoutSeconds * 1000;
  }

  if (userAgent || throttle !== undefined || timeoutSeconds !== undefined) {
    const discovery = asSection(rawConfig, 'discovery');
    if (userAgent) discovery['user_agent'] = userAgent;
    if (throttle !== undefined) discovery['throttle_seconds'] = throttle;
    if (timeoutSeconds !== undefined) discovery['timeout_ms'] = timeoutSeconds * 1000;
  }

  const limitVars: Array<[string, RunMode, 'per_site' | 'total_cap']> = [
    ['BACKFILL_PER_SITE', 'backfill', 'per_site'],
    ['BACKFILL_TOTAL_CAP', 'backfill', 'total_cap'],
    ['DELTA_PER_SITE', 'delta', 'per_site'],
    ['DELTA_TOTAL_CAP', 'delta', 'total_cap'],
  ];
  for (const [name, mode, field] of limitVars) {
    const value = envNumber(name);
    if (value === undefined) continue;
    const limits = asSection(rawConfig, 'limits');
    const defaults = generateDefaultConfig().limits[mode];
    const modeLimits = limits[mode];
    const section: Record<string, unknown> = isSection(modeLimits) ? modeLimits : { ...defaults };
    section[field] = value;
    limits[mode] = section;
  }

  return rawConfig;
}

export function parseConfig(rawConfig: Record<string, unknown>): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('recipe-importer', {
    searchPlaces: [
      'recipe-importer.config.yaml',
      'recipe-importer.config.yml',
      '.recipe-importerrc.yaml',
      '.recipe-importerrc.yml',
    ],
  });

  const envConfigPath = process.env['RECIPE_IMPORTER_CONFIG'];
  const defaultConfigPath = path.join(getImporterDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = (result?.config as Record<string, unknown> | undefined) ?? {};
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    rawConfig = (result?.config as Record<string, unknown> | undefined) ?? {};
  } else {
    logger.debug('No config file found, using defaults');
  }

  cachedConfig = parseConfig(applyEnvOverrides(rawConfig));
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

/**
 * Ingestion needs an API token; discovery-only commands do not.
 */
export function assertCredentials(config: Config): void {
  if (!config.destination.api_token) {
    throw new ConfigError(
      'Destination API token is required (set destination.api_token or MEALIE_IMPORTER_TOKEN)',
    );
  }
}
