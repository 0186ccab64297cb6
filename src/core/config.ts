/**
 * Configuration loading.
 *
 * Precedence, lowest first: built-in defaults, the YAML file
 * (MODELGATE_CONFIG, default ./modelgate.yaml), environment variables,
 * then credentials kept in the database for cloud keys nobody else
 * supplied. The result lists providers in fixed family order and only
 * for families with a complete configuration.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import type { AppConfig, CloudProviderConfig, ModelDefinition, ProviderConfig } from '../types/index.js';
import { MODEL_CAPABILITIES } from '../types/index.js';

export const DEFAULT_CONFIG_FILE = 'modelgate.yaml';

const DEFAULTS = {
  host: '127.0.0.1',
  port: 3000,
  databasePath: './data/modelgate.db',
  ollamaTimeoutMs: 120_000,
  requestTimeoutMs: 60_000,
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
} as const;

type CloudType = CloudProviderConfig['type'];

const CLOUD_FAMILIES: readonly CloudType[] = ['openai', 'anthropic', 'google', 'mistral'];

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const ModelDefinitionSchema = z.object({
  displayName: z.string().optional(),
  contextLength: z.number().int().positive(),
  capabilities: z.array(z.enum(MODEL_CAPABILITIES)).default(['chat', 'completion']),
  costPer1kInputTokens: z.number().nonnegative(),
  costPer1kOutputTokens: z.number().nonnegative(),
});

const CloudSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().optional(),
  models: z.record(ModelDefinitionSchema).optional(),
});

const FileSchema = z.object({
  server: z.object({
    host: z.string().min(1).optional(),
    port: z.number().int().min(0).max(65535).optional(),
  }).default({}),
  database: z.object({
    path: z.string().min(1).optional(),
  }).default({}),
  providers: z.object({
    ollama: z.object({
      baseUrl: z.string().min(1).optional(),
      timeoutMs: z.number().int().positive().optional(),
    }).optional(),
    openai: CloudSchema.extend({ organization: z.string().optional() }).optional(),
    anthropic: CloudSchema.optional(),
    google: CloudSchema.optional(),
    mistral: CloudSchema.optional(),
  }).default({}),
  generation: z.object({
    timeoutMs: z.number().int().nonnegative().optional(),
    retry: z.object({
      maxAttempts: z.number().int().positive().optional(),
      baseDelayMs: z.number().int().nonnegative().optional(),
      maxDelayMs: z.number().int().nonnegative().optional(),
    }).default({}),
  }).default({}),
  usage: z.object({
    track: z.boolean().optional(),
  }).default({}),
  admin: z.object({
    token: z.string().min(1).optional(),
  }).default({}),
  logLevel: LogLevelSchema.optional(),
}).strict();

const Flag = z.enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  HOST: z.string().optional(),
  PORT: z.coerce.number().int().min(0).max(65535).optional(),
  DATABASE_PATH: z.string().optional(),
  OLLAMA_HOST: z.string().optional(),
  OLLAMA_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_ORG_ID: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  GOOGLE_API_KEY: z.string().optional(),
  MISTRAL_API_KEY: z.string().optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
  MAX_RETRIES: z.coerce.number().int().positive().optional(),
  ENABLE_COST_TRACKING: Flag.optional(),
  ADMIN_TOKEN: z.string().optional(),
  LOG_LEVEL: LogLevelSchema.optional(),
});

type FileConfig = z.infer<typeof FileSchema>;
type EnvConfig = z.infer<typeof EnvSchema>;

const ENV_KEYS: Record<CloudType, keyof EnvConfig> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  google: 'GOOGLE_API_KEY',
  mistral: 'MISTRAL_API_KEY',
};

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** YAML file; defaults to MODELGATE_CONFIG or ./modelgate.yaml */
  filePath?: string;
  /** Fallback credential lookup for cloud families without a key */
  credentials?: (provider: CloudType) => string | null;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

/** Unset and empty variables are the same thing */
function readEnv(env: NodeJS.ProcessEnv): EnvConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration:\n${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function readFile(filePath: string, required: boolean): FileConfig {
  if (!existsSync(filePath)) {
    if (required) {
      throw new Error(`Config not found at ${filePath}.`);
    }
    return FileSchema.parse({});
  }

  const raw: unknown = YAML.parse(readFileSync(filePath, 'utf-8')) ?? {};
  const parsed = FileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid config file ${filePath}:\n${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** OLLAMA_HOST is often given as host:port without a scheme */
export function normalizeHost(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

function toCatalog(models: FileConfig['providers']['google']): Record<string, ModelDefinition> | undefined {
  const defs = models?.models;
  if (!defs) return undefined;
  return Object.fromEntries(
    Object.entries(defs).map(([name, def]): [string, ModelDefinition] => [
      name,
      { ...def, displayName: def.displayName ?? name },
    ])
  );
}

function cloudConfig(
  type: CloudType,
  apiKey: string,
  file: FileConfig,
  env: EnvConfig
): CloudProviderConfig {
  const section = file.providers[type];
  const common = {
    apiKey,
    ...(section?.baseUrl ? { baseUrl: section.baseUrl } : {}),
    ...(section?.timeoutMs ? { timeoutMs: section.timeoutMs } : {}),
    ...(section?.models ? { models: toCatalog(section) } : {}),
  };

  if (type === 'openai') {
    const organization = env.OPENAI_ORG_ID ?? file.providers.openai?.organization;
    return { type, ...common, ...(organization ? { organization } : {}) };
  }
  return { type, ...common };
}

function buildProviders(
  file: FileConfig,
  env: EnvConfig,
  credentials: LoadConfigOptions['credentials']
): ProviderConfig[] {
  const providers: ProviderConfig[] = [];

  const ollamaHost = env.OLLAMA_HOST ?? file.providers.ollama?.baseUrl;
  if (ollamaHost) {
    providers.push({
      type: 'ollama',
      baseUrl: normalizeHost(ollamaHost),
      timeoutMs: env.OLLAMA_TIMEOUT_MS ?? file.providers.ollama?.timeoutMs ?? DEFAULTS.ollamaTimeoutMs,
    });
  }

  for (const type of CLOUD_FAMILIES) {
    const fromEnv = env[ENV_KEYS[type]];
    const apiKey = (typeof fromEnv === 'string' ? fromEnv : undefined)
      ?? file.providers[type]?.apiKey
      ?? credentials?.(type)
      ?? undefined;
    if (apiKey) providers.push(cloudConfig(type, apiKey, file, env));
  }

  return providers;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const rawEnv = options.env ?? process.env;
  const env = readEnv(rawEnv);

  const explicitFile = options.filePath ?? rawEnv.MODELGATE_CONFIG;
  const file = readFile(resolve(explicitFile ?? DEFAULT_CONFIG_FILE), explicitFile !== undefined);

  const retry = file.generation.retry;

  return {
    server: {
      host: env.HOST ?? file.server.host ?? DEFAULTS.host,
      port: env.PORT ?? file.server.port ?? DEFAULTS.port,
    },
    database: {
      path: env.DATABASE_PATH ?? file.database.path ?? DEFAULTS.databasePath,
    },
    providers: buildProviders(file, env, options.credentials),
    generation: {
      timeoutMs: env.REQUEST_TIMEOUT_MS ?? file.generation.timeoutMs ?? DEFAULTS.requestTimeoutMs,
      retry: {
        maxAttempts: env.MAX_RETRIES ?? retry.maxAttempts ?? DEFAULTS.maxAttempts,
        baseDelayMs: retry.baseDelayMs ?? DEFAULTS.baseDelayMs,
        maxDelayMs: retry.maxDelayMs ?? DEFAULTS.maxDelayMs,
      },
    },
    usage: {
      track: env.ENABLE_COST_TRACKING ?? file.usage.track ?? true,
    },
    admin: {
      token: env.ADMIN_TOKEN ?? file.admin.token ?? null,
    },
    logLevel: env.LOG_LEVEL ?? file.logLevel ?? 'info',
  };
}
