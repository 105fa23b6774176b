// Configuration management with environment variable overrides
import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import { parse } from 'yaml';
import 'dotenv/config';
import { ConfigurationError } from './errors.js';

const ConfigSchema = z.object({
  llm: z.object({
    apiKey: z.string().default(''),
    model: z.string().default('openai/gpt-3.5-turbo'),
  }).default({}),
  gmail: z.object({
    credentialsPath: z.string().default('credentials.json'),
    tokenPath: z.string().default('token.json'),
  }).default({}),
  digest: z.object({
    maxEmails: z.number().int().positive().default(10),
    query: z.string().default(''),
    summaryWords: z.number().int().positive().default(150),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

type PlainObject = { [key: string]: unknown };

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readYamlConfig(path: string): PlainObject {
  if (!existsSync(path)) {
    return {};
  }

  const parsed: unknown = parse(readFileSync(path, 'utf-8'));
  if (parsed == null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${path} must contain a mapping`);
  }
  return parsed;
}

function parseInteger(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

/**
 * Load configuration: schema defaults, then config/app.yml (or CONFIG_PATH),
 * then environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const baseConfig = readYamlConfig(env.CONFIG_PATH || 'config/app.yml');

  const envConfig = {
    llm: {
      apiKey: env.OPENAI_API_KEY,
      model: env.AI_MODEL,
    },
    gmail: {
      credentialsPath: env.GMAIL_CREDENTIALS_FILE,
      tokenPath: env.GMAIL_TOKEN_FILE,
    },
    digest: {
      maxEmails: parseInteger('MAX_EMAILS', env.MAX_EMAILS),
      query: env.EMAIL_QUERY,
      summaryWords: parseInteger('SUMMARY_MAX_LENGTH', env.SUMMARY_MAX_LENGTH),
    },
  };

  // Deep merge, removing undefined values
  const merged = deepMerge(baseConfig, removeUndefined(envConfig) ?? {});

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

/**
 * Check settings that must hold before any network call.
 * Throws on a missing API key; returns warnings for everything recoverable.
 */
export function validateConfig(config: Config): string[] {
  if (!config.llm.apiKey) {
    throw new ConfigurationError(
      'OPENAI_API_KEY not found. Set it in the environment or in a .env file.'
    );
  }

  const warnings: string[] = [];
  if (!existsSync(config.gmail.credentialsPath)) {
    warnings.push(
      `Gmail credentials file '${config.gmail.credentialsPath}' not found. ` +
        'Download an OAuth client secret from Google Cloud Console.'
    );
  }
  return warnings;
}

function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];
    if (isPlainObject(sourceValue)) {
      output[key] = deepMerge(isPlainObject(targetValue) ? targetValue : {}, sourceValue);
    } else {
      output[key] = sourceValue;
    }
  }
  return output;
}

function removeUndefined(obj: PlainObject): PlainObject | undefined {
  const clean: PlainObject = {};
  for (const key of Object.keys(obj)) {
    const raw = obj[key];
    const value = isPlainObject(raw) ? removeUndefined(raw) : raw;
    if (value !== undefined) {
      clean[key] = value;
    }
  }
  return Object.keys(clean).length > 0 ? clean : undefined;
}
