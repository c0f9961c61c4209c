/**
 * Configuration loader
 * Reads the environment once into a frozen AppConfig, and the LLM prompt
 * settings from config/llm-*.json with fallback to defaults
 */

import { readFile } from 'fs/promises';
import { join, dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import logger from './logger.js';
import { ConfigError } from './errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_CONFIG_DIR = join(__dirname, '../../config');

export interface LLMConfig {
  model: string;
  max_output_tokens: number;
  temperature: number;
  system_prompt: string;
  /** Template for the user message; `{{email}}` is replaced by the input text */
  user_prompt: string;
}

export type ConfigType = 'summary' | 'tone';

const CONFIG_FILES: Record<ConfigType, string> = {
  summary: 'llm-summary.json',
  tone: 'llm-tone.json'
};

const DEFAULT_CONFIGS: Record<ConfigType, LLMConfig> = {
  summary: {
    model: 'mistral-small-latest',
    max_output_tokens: 300,
    temperature: 0.2,
    system_prompt:
      'You are an email assistant. Summarize the email in clear bullet points, focusing on key information, ' +
      'deadlines, tasks, sender intent, and urgency. Limit answer to 50 words. Return only the summary.',
    user_prompt: 'Summarize the following email in clear and concise bullet points.\n\nEmail:\n{{email}}\n\nSummary:'
  },
  tone: {
    model: 'mistral-small-latest',
    max_output_tokens: 30,
    temperature: 0.2,
    system_prompt:
      'You are an email tone analysis assistant. Identify the overall tone of the email in a short phrase ' +
      '(for example: formal, urgent, friendly, frustrated, promotional, neutral). Return 2-3 words.',
    user_prompt: 'Analyze the tone of the following email. Answer in 2-3 words.\n\nEmail:\n{{email}}\n\nTone:'
  }
};

export type MailSourceType = 'gmail' | 'directory';

export interface AppConfig {
  readonly mistralApiKey: string;
  readonly mistralTimeoutMs: number;
  readonly dryRun: boolean;
  readonly summaryConcurrency: number;
  readonly messageTimeoutMs: number;
  readonly storagePath: string;
  readonly uploadDir: string;
  readonly resultDir: string;
  readonly inboxDir: string;
  readonly pollIntervalSeconds: number;
  readonly mailSource: MailSourceType;
  readonly gmail: {
    readonly credentialsFile: string;
    readonly tokenFile: string;
    readonly includeUpdates: boolean;
    readonly includePromotions: boolean;
  };
  readonly llm: Readonly<Record<ConfigType, Readonly<LLMConfig>>>;
}

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`Invalid ${name}: expected a positive integer, got "${raw}"`, name);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw.trim().toLowerCase() === 'true';
}

function readMailSource(env: Env): MailSourceType {
  const raw = (env.MAIL_SOURCE || 'gmail').trim().toLowerCase();
  if (raw === 'gmail' || raw === 'directory') return raw;
  throw new ConfigError(`Invalid MAIL_SOURCE: expected "gmail" or "directory", got "${raw}"`, 'MAIL_SOURCE');
}

/**
 * Build the process configuration from environment variables.
 * Called once at startup; the result is frozen and passed to components.
 */
export function loadAppConfig(
  env: Env = process.env,
  llm: Record<ConfigType, LLMConfig> = DEFAULT_CONFIGS
): AppConfig {
  const dryRun = readBoolean(env, 'DRY_RUN', false);
  const mistralApiKey = env.MISTRAL_API_KEY || '';

  if (!dryRun && !mistralApiKey) {
    throw new ConfigError('Missing required configuration: MISTRAL_API_KEY', 'MISTRAL_API_KEY');
  }

  const storagePath = resolve(env.STORAGE_PATH || './storage');

  const config: AppConfig = {
    mistralApiKey,
    mistralTimeoutMs: readPositiveInt(env, 'MISTRAL_TIMEOUT_MS', 120000),
    dryRun,
    summaryConcurrency: readPositiveInt(env, 'SUMMARY_CONCURRENCY', 3),
    messageTimeoutMs: readPositiveInt(env, 'MESSAGE_TIMEOUT_MS', 60000),
    storagePath,
    uploadDir: env.UPLOAD_DIR || '00_uploads',
    resultDir: env.RESULT_DIR || '10_digests',
    inboxDir: env.INBOX_DIR || '05_inbox',
    pollIntervalSeconds: readPositiveInt(env, 'POLL_INTERVAL_SECONDS', 60),
    mailSource: readMailSource(env),
    gmail: Object.freeze({
      credentialsFile: resolve(env.GMAIL_CREDENTIALS_FILE || 'credentials.json'),
      tokenFile: resolve(env.GMAIL_TOKEN_FILE || 'token.json'),
      includeUpdates: readBoolean(env, 'GMAIL_INCLUDE_UPDATES', true),
      includePromotions: readBoolean(env, 'GMAIL_INCLUDE_PROMOTIONS', false)
    }),
    llm: Object.freeze({
      summary: Object.freeze({ ...llm.summary }),
      tone: Object.freeze({ ...llm.tone })
    })
  };

  return Object.freeze(config);
}

function pickConfig(raw: unknown, defaults: LLMConfig): { config: LLMConfig; missing: string[] } {
  const config: LLMConfig = { ...defaults };
  const missing: string[] = [];

  if (typeof raw !== 'object' || raw === null) {
    return { config, missing: ['model', 'system_prompt'] };
  }

  const record: Record<string, unknown> = { ...raw };

  if (typeof record.model === 'string' && record.model) config.model = record.model;
  else missing.push('model');

  if (typeof record.system_prompt === 'string' && record.system_prompt) config.system_prompt = record.system_prompt;
  else missing.push('system_prompt');

  if (typeof record.user_prompt === 'string' && record.user_prompt.includes('{{email}}')) {
    config.user_prompt = record.user_prompt;
  }
  if (typeof record.max_output_tokens === 'number' && record.max_output_tokens > 0) {
    config.max_output_tokens = record.max_output_tokens;
  }
  if (typeof record.temperature === 'number') {
    config.temperature = record.temperature;
  }

  return { config, missing };
}

/**
 * Load LLM configuration from file
 * @param type - Configuration type to load
 */
export async function loadLLMConfig(type: ConfigType, configDir: string = DEFAULT_CONFIG_DIR): Promise<LLMConfig> {
  const configFile = CONFIG_FILES[type];
  const configPath = join(configDir, configFile);
  const defaults = getDefaultLLMConfig(type);

  try {
    const configData = await readFile(configPath, 'utf-8');
    const { config, missing } = pickConfig(JSON.parse(configData), defaults);

    for (const field of missing) {
      logger.warn(`${configFile} missing "${field}", using default`);
    }

    logger.info(`LLM configuration loaded from ${configFile}`);
    logger.debug('LLM Config:', {
      model: config.model,
      max_output_tokens: config.max_output_tokens
    });

    return config;
  } catch (error) {
    const err = error as NodeJS.ErrnoException;

    if (err.code === 'ENOENT') {
      logger.warn(`${configFile} not found, using default configuration`);
    } else if (error instanceof SyntaxError) {
      logger.error(`Invalid JSON in ${configFile}, using default configuration`);
      logger.error('   JSON parse error:', error.message);
    } else {
      logger.error(`Error loading ${configFile}:`, err.message);
    }

    return defaults;
  }
}

/**
 * Load both prompt configurations
 */
export async function loadAllLLMConfigs(configDir: string = DEFAULT_CONFIG_DIR): Promise<Record<ConfigType, LLMConfig>> {
  const [summary, tone] = await Promise.all([
    loadLLMConfig('summary', configDir),
    loadLLMConfig('tone', configDir)
  ]);
  return { summary, tone };
}

export function getDefaultLLMConfig(type: ConfigType): LLMConfig {
  return { ...DEFAULT_CONFIGS[type] };
}

export default { loadAppConfig, loadLLMConfig, loadAllLLMConfigs, getDefaultLLMConfig };
