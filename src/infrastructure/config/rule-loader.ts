import type { Dirent } from 'node:fs';
import { readFile, readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { parse } from 'yaml';
import { ConfigError, type Rule } from '../../domain/index.js';
import {
  mergeConfigs,
  parseConfig,
  toRules,
  validateConfig,
  type Config,
} from '../../application/rule-schema.js';

const RULE_FILE_EXTENSIONS = new Set(['.yaml', '.yml']);

export interface RuleSources {
  readonly file?: string | undefined;
  readonly dir?: string | undefined;
}

export interface LoadedRules {
  readonly config: Config;
  readonly rules: Rule[];
}

/** Reads one YAML rule document and applies defaults. */
export async function loadConfig(path: string): Promise<Config> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err: unknown) {
    throw new ConfigError(`failed to read config file ${path}: ${errorMessage(err)}`, { cause: err });
  }

  let document: unknown;
  try {
    document = parse(content);
  } catch (err: unknown) {
    throw new ConfigError(`failed to parse config file ${path}: ${errorMessage(err)}`, { cause: err });
  }

  try {
    return parseConfig(document);
  } catch (err: unknown) {
    throw new ConfigError(`${path}: ${errorMessage(err)}`, { cause: err });
  }
}

/** Loads every `*.yaml` / `*.yml` file in `dir`, in file-name order. */
export async function loadConfigFromDirectory(dir: string): Promise<Config[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err: unknown) {
    throw new ConfigError(`failed to read config directory ${dir}: ${errorMessage(err)}`, { cause: err });
  }

  const files = entries
    .filter((entry) => entry.isFile() && RULE_FILE_EXTENSIONS.has(extname(entry.name)))
    .map((entry) => entry.name)
    .sort();

  const configs: Config[] = [];
  for (const name of files) {
    configs.push(await loadConfig(join(dir, name)));
  }
  return configs;
}

/**
 * Loads, merges and validates the configured rule sources.
 * Fails when nothing is configured or no rule is defined.
 */
export async function loadRules(sources: RuleSources): Promise<LoadedRules> {
  const configs: Config[] = [];
  if (sources.file) configs.push(await loadConfig(sources.file));
  if (sources.dir) configs.push(...(await loadConfigFromDirectory(sources.dir)));

  if (configs.length === 0) {
    throw new ConfigError('no rule file or rule directory configured');
  }

  const config = mergeConfigs(...configs);
  validateConfig(config);

  const rules = toRules(config);
  if (rules.length === 0) {
    throw new ConfigError('no rules defined');
  }

  return { config, rules };
}

/**
 * Notification URLs from the rule config with `${VAR}` references
 * expanded from `env`. Entries that expand to nothing are dropped.
 */
export function resolveNotificationUrls(
  urls: Readonly<Record<string, string>>,
  env: NodeJS.ProcessEnv,
): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const [type, template] of Object.entries(urls)) {
    const url = template.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => env[name] ?? '');
    if (url.trim() !== '') resolved[type] = url;
  }
  return resolved;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
