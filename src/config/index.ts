// Settings loader with first-run bootstrap.
// Precedence: env (RENDER_NOTIFY_*) > settings file. No CLI layer: the hook
// takes job data on the command line, never credentials.

import writeFileAtomic from 'write-file-atomic';
import { mkdir, readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { NotifierConfigSchema, CONFIG_PLACEHOLDERS } from '../types/index.js';
import type { NotifierConfig } from '../types/index.js';
import { ConfigInvalidError } from '../orchestrator/errors.js';

export const SETTINGS_DIRNAME = 'resolve_slack_settings';
export const SETTINGS_FILENAME = 'resolve_slack_settings.json';
const ENV_PREFIX = 'RENDER_NOTIFY_';

export type ConfigLoadResult =
  | { kind: 'loaded'; path: string; config: Readonly<NotifierConfig> }
  | { kind: 'bootstrapped'; path: string };

export interface LoadConfigOptions {
  /** Environment to read overrides from. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

/** Settings file location relative to the directory the hook is installed in. */
export function resolveSettingsPath(baseDir: string): string {
  return join(baseDir, SETTINGS_DIRNAME, SETTINGS_FILENAME);
}

/** Expand a leading `~` to the current user's home directory. */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/') || path.startsWith('~\\')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Extract RENDER_NOTIFY_* environment variables, strip prefix and lowercase
 * to the settings file's snake_case keys. Values stay strings; the schema
 * coerces the numeric fields.
 * Example: RENDER_NOTIFY_SLACK_TOKEN -> slack_token
 */
function loadEnvVars(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ENV_PREFIX) && value !== undefined && value !== '') {
      result[key.slice(ENV_PREFIX.length).toLowerCase()] = value;
    }
  }
  return result;
}

/**
 * Write the placeholder settings file, creating its directory.
 * Uses write-file-atomic so a concurrent run never reads a half-written template.
 */
export async function writeConfigTemplate(configPath: string): Promise<void> {
  await mkdir(dirname(configPath), { recursive: true });
  await writeFileAtomic(configPath, JSON.stringify(CONFIG_PLACEHOLDERS, null, 2) + '\n');
}

/**
 * Read the raw settings object. Returns null when the file does not exist.
 * Throws ConfigInvalidError for empty files, malformed JSON and non-object roots.
 */
async function readConfigFile(configPath: string): Promise<Record<string, unknown> | null> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw new ConfigInvalidError(`Cannot read config file at ${configPath}`, { cause: err });
  }

  if (!raw.trim()) {
    throw new ConfigInvalidError(`Invalid config file at ${configPath}: file is empty`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigInvalidError(
      `Invalid config file at ${configPath}: file contains malformed JSON`,
      { cause: err },
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigInvalidError(`Invalid config file at ${configPath}: root must be a JSON object`);
  }
  return { ...parsed };
}

/**
 * Load the settings file, or create a template when it is absent.
 *
 * A bootstrapped result means the operator has to fill in the template before
 * anything can be delivered. The loaded file is never written back.
 *
 * @param configPath - Absolute path of resolve_slack_settings.json
 * @returns Frozen, validated config, or the bootstrap signal
 */
export async function loadOrBootstrapConfig(
  configPath: string,
  options: LoadConfigOptions = {},
): Promise<ConfigLoadResult> {
  const fileConfig = await readConfigFile(configPath);

  if (fileConfig === null) {
    try {
      await writeConfigTemplate(configPath);
    } catch (err) {
      throw new ConfigInvalidError(`Failed to create config template at ${configPath}`, { cause: err });
    }
    return { kind: 'bootstrapped', path: configPath };
  }

  const merged = { ...fileConfig, ...loadEnvVars(options.env ?? process.env) };
  const result = NotifierConfigSchema.safeParse(merged);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigInvalidError(`Config validation failed (${configPath}):\n${issues}`);
  }

  return {
    kind: 'loaded',
    path: configPath,
    config: Object.freeze({
      ...result.data,
      log_directory: expandHome(result.data.log_directory),
    }),
  };
}
