import * as fs from 'fs-extra';
import * as path from 'path';
import * as dotenv from 'dotenv';
import Ajv, { ErrorObject, SchemaObject } from 'ajv';
import { ErrorKind, RcaError, errorMessage } from '../errors';
import { resolveProviderOrder } from '../llm/LLMGateway';
import { deepFreeze } from '../utils/freeze';
import { DEFAULT_CONFIG, PROJECT_ROOT, PROVIDER_DEFAULTS, RcaConfig } from './RcaConfig';

type Json = Record<string, unknown>;
type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  /** Explicit file path; a missing file is an error only when given here. */
  configPath?: string;
  /** Defaults to process.env after loading .env. */
  env?: Env;
}

const DEFAULT_CONFIG_FILE = 'rca.config.json';
const SCHEMA_PATH = path.join(PROJECT_ROOT, 'config', 'rca.config.schema.json');

const ajv = new Ajv({ allErrors: true });
const schema: SchemaObject = fs.readJSONSync(SCHEMA_PATH);
const validateConfig = ajv.compile<RcaConfig>(schema);

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(base: Json, override: Json): Json {
  const merged: Json = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const existing = merged[key];
    merged[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }
  return merged;
}

function readConfigFile(configPath: string | undefined, env: Env): Json {
  const explicit = configPath ?? env.RCA_CONFIG;
  const filePath = path.resolve(explicit ?? DEFAULT_CONFIG_FILE);

  if (!fs.pathExistsSync(filePath)) {
    if (explicit) {
      throw new RcaError(ErrorKind.ConfigurationError, `Configuration file ${filePath} not found`);
    }
    return {};
  }

  let content: unknown;
  try {
    content = fs.readJSONSync(filePath);
  } catch (error) {
    throw new RcaError(ErrorKind.ConfigurationError, `Configuration file ${filePath} is not valid JSON: ${errorMessage(error)}`, {
      cause: error
    });
  }
  if (!isRecord(content)) {
    throw new RcaError(ErrorKind.ConfigurationError, `Configuration file ${filePath} must contain a JSON object`);
  }
  return content;
}

function providerFromEnv(name: string, apiKey: string | undefined, model: string | undefined, baseUrl?: string): Json {
  if (!apiKey) return {};
  return { [name]: deepMerge({ ...PROVIDER_DEFAULTS[name] }, { apiKey, model, baseUrl }) };
}

/** Environment variables layered over the file, as a patch of the same shape. */
function envOverlay(env: Env): Json {
  const providers: Json = {
    ...providerFromEnv('openai', env.OPENAI_API_KEY, env.OPENAI_MODEL),
    ...providerFromEnv('anthropic', env.ANTHROPIC_API_KEY, env.ANTHROPIC_MODEL),
    ...providerFromEnv('openrouter', env.OPENROUTER_API_KEY, env.OPENROUTER_MODEL),
    // The proxy has no public default endpoint, so it needs both values.
    ...(env.LLMPROXY_BASE_URL
      ? providerFromEnv('llmproxy', env.LLMPROXY_API_KEY, env.LLMPROXY_MODEL, env.LLMPROXY_BASE_URL)
      : {})
  };

  const ticketing: Json = {
    baseUrl: env.JIRA_URL,
    username: env.JIRA_USERNAME,
    apiToken: env.JIRA_API_TOKEN,
    enabled: env.RCA_CREATE_TICKETS === undefined ? undefined : env.RCA_CREATE_TICKETS === 'true'
  };

  return {
    providers,
    ticketing,
    logging: env.LOG_LEVEL ? { level: env.LOG_LEVEL } : undefined
  };
}

/** File-declared providers get the defaults of their well-known name, if any. */
function withProviderDefaults(providers: unknown): Json {
  if (!isRecord(providers)) return {};
  const result: Json = {};
  for (const [name, settings] of Object.entries(providers)) {
    const defaults = PROVIDER_DEFAULTS[name];
    result[name] = defaults && isRecord(settings) ? deepMerge({ ...defaults }, settings) : settings;
  }
  return result;
}

function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('; ');
}

function checkConsistency(config: RcaConfig): string[] {
  const problems: string[] = [];
  for (const name of config.providerOrder) {
    if (!config.providers[name]) {
      problems.push(`providerOrder names unknown provider '${name}'`);
    }
  }
  const levels = config.ticketing.severityLevels.map((l) => l.toLowerCase());
  if (!levels.includes(config.ticketing.escalationSeverity.toLowerCase())) {
    problems.push(`ticketing.escalationSeverity '${config.ticketing.escalationSeverity}' is not one of severityLevels`);
  }
  return problems;
}

/**
 * Builds the process-wide configuration: defaults, then the JSON file, then
 * environment variables. The result is validated and frozen.
 */
export function loadConfig(options: LoadConfigOptions = {}): RcaConfig {
  if (!options.env) {
    dotenv.config();
  }
  const env: Env = options.env ?? process.env;

  const file = readConfigFile(options.configPath, env);
  const fileWithDefaults = { ...file, providers: withProviderDefaults(file.providers) };
  const merged = deepMerge(deepMerge(structuredClone(DEFAULT_CONFIG), fileWithDefaults), envOverlay(env));

  if (merged.providerOrder === undefined) {
    const configured = isRecord(merged.providers) ? Object.keys(merged.providers) : [];
    merged.providerOrder = resolveProviderOrder(env.RCA_DEFAULT_PROVIDER, configured);
  }

  if (!validateConfig(merged)) {
    throw new RcaError(ErrorKind.ConfigurationError, `Invalid configuration: ${formatSchemaErrors(validateConfig.errors)}`);
  }

  const problems = checkConsistency(merged);
  if (problems.length > 0) {
    throw new RcaError(ErrorKind.ConfigurationError, `Invalid configuration: ${problems.join('; ')}`);
  }

  return deepFreeze(merged);
}
