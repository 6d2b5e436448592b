import { z } from 'zod';
import {
  CONDITION_OPERATORS,
  CONDITION_TYPES,
  ConfigError,
  type Rule,
} from '../domain/index.js';

export const SUPPORTED_CONFIG_VERSION = '1.0';

/** Action types the bundled handlers implement. */
export const ACTION_TYPES = [
  'create_issue',
  'add_label',
  'create_comment',
  'merge_pr',
  'notification',
  'run_workflow',
] as const;

const KNOWN_CONDITION_TYPES: ReadonlySet<string> = new Set(CONDITION_TYPES);
const KNOWN_OPERATORS: ReadonlySet<string> = new Set(CONDITION_OPERATORS);
const KNOWN_ACTION_TYPES: ReadonlySet<string> = new Set(ACTION_TYPES);

/**
 * Zod schemas for the rule-file document.
 *
 * The schemas only fix the structure and fill defaults; missing ids,
 * empty lists, unknown operators and the like are reported by
 * `validateConfig` so that every problem names the rule it belongs to.
 */
const conditionSchema = z.object({
  type: z.string().default(''),
  field: z.string().optional(),
  operator: z.string().default(''),
  value: z.unknown().optional(),
  parameters: z.record(z.string(), z.unknown()).optional(),
});

const actionSchema = z.object({
  type: z.string().default(''),
  parameters: z.record(z.string(), z.unknown()).nullable().optional(),
  async: z.boolean().default(false),
  timeout: z.string().optional(),
});

const ruleSchema = z.object({
  id: z.string().default(''),
  name: z.string().default(''),
  description: z.string().default(''),
  enabled: z.boolean().default(false),
  priority: z.number().int().default(0),
  conditions: z.array(conditionSchema).nullable().default([]).transform((c) => c ?? []),
  actions: z.array(actionSchema).nullable().default([]).transform((a) => a ?? []),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

const globalSchema = z.object({
  enabled: z.boolean().default(true),
  default_timeout: z.string().default('30s'),
  max_concurrency: z.number().int().positive().default(10),
  notification_urls: z.record(z.string(), z.string()).default({}),
  variables: z.record(z.string(), z.unknown()).default({}),
});

// YAML reads an unquoted `version: 1.0` as the number 1.
const versionSchema = z
  .union([
    z.string(),
    z.number().transform((n) => (Number.isInteger(n) ? n.toFixed(1) : String(n))),
  ])
  .default(SUPPORTED_CONFIG_VERSION);

export const configSchema = z.object({
  version: versionSchema,
  global: globalSchema.default({}),
  rules: z.array(ruleSchema).nullable().default([]).transform((r) => r ?? []),
});

export type Config = z.infer<typeof configSchema>;
export type ConfigRule = Config['rules'][number];
export type ConfigCondition = ConfigRule['conditions'][number];
export type ConfigAction = ConfigRule['actions'][number];

/** Parses a decoded rule document, applying defaults. */
export function parseConfig(input: unknown): Config {
  const parsed = configSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`invalid configuration: ${details}`);
  }
  return parsed.data;
}

export function validateCondition(condition: ConfigCondition): void {
  if (!condition.type) throw new ConfigError('missing type');
  if (!KNOWN_CONDITION_TYPES.has(condition.type)) {
    throw new ConfigError(`invalid type: ${condition.type}`);
  }
  if (!condition.operator) throw new ConfigError('missing operator');
  if (!KNOWN_OPERATORS.has(condition.operator)) {
    throw new ConfigError(`invalid operator: ${condition.operator}`);
  }
  if (condition.value === undefined || condition.value === null) {
    throw new ConfigError('missing value');
  }
}

export function validateAction(action: ConfigAction): void {
  if (!action.type) throw new ConfigError('missing type');
  if (!KNOWN_ACTION_TYPES.has(action.type)) {
    throw new ConfigError(`invalid type: ${action.type}`);
  }
  if (action.parameters === undefined || action.parameters === null) {
    throw new ConfigError('missing parameters');
  }
}

/** Checks a whole document. Throws `ConfigError` naming the first problem. */
export function validateConfig(config: Config): void {
  if (config.version !== SUPPORTED_CONFIG_VERSION) {
    throw new ConfigError(`unsupported config version: ${config.version}`);
  }

  const seen = new Set<string>();

  for (const [i, rule] of config.rules.entries()) {
    if (!rule.id) throw new ConfigError(`rule[${i}] missing ID`);
    if (seen.has(rule.id)) throw new ConfigError(`duplicate rule ID: ${rule.id}`);
    seen.add(rule.id);

    if (!rule.name) throw new ConfigError(`rule[${i}] missing name`);
    if (rule.conditions.length === 0) throw new ConfigError(`rule[${i}] has no conditions`);
    if (rule.actions.length === 0) throw new ConfigError(`rule[${i}] has no actions`);

    for (const [j, condition] of rule.conditions.entries()) {
      withContext(`rule[${i}] condition[${j}]`, () => validateCondition(condition));
    }
    for (const [j, action] of rule.actions.entries()) {
      withContext(`rule[${i}] action[${j}]`, () => validateAction(action));
    }
  }
}

function withContext(prefix: string, check: () => void): void {
  try {
    check();
  } catch (err: unknown) {
    if (err instanceof ConfigError) throw new ConfigError(`${prefix}: ${err.message}`);
    throw err;
  }
}

/**
 * Combines several documents into one.
 *
 * Rules are concatenated in order. For scalar globals the last document
 * wins; `notification_urls` and `variables` are merged key by key.
 */
export function mergeConfigs(...configs: readonly Config[]): Config {
  const merged: Config = {
    version: SUPPORTED_CONFIG_VERSION,
    global: parseConfig({}).global,
    rules: [],
  };

  for (const config of configs) {
    merged.version = config.version || merged.version;
    merged.rules = [...merged.rules, ...config.rules];
    merged.global = {
      enabled: config.global.enabled,
      default_timeout: config.global.default_timeout || merged.global.default_timeout,
      max_concurrency: config.global.max_concurrency || merged.global.max_concurrency,
      notification_urls: { ...merged.global.notification_urls, ...config.global.notification_urls },
      variables: { ...merged.global.variables, ...config.global.variables },
    };
  }

  return merged;
}

/**
 * Converts validated config rules into engine rules.
 *
 * `global.enabled: false` loads every rule disabled, and
 * `global.default_timeout` applies to actions that set no timeout.
 */
export function toRules(config: Config): Rule[] {
  const { enabled, default_timeout: defaultTimeout } = config.global;

  return config.rules.map((rule) => ({
    id: rule.id,
    name: rule.name,
    description: rule.description,
    enabled: enabled && rule.enabled,
    priority: rule.priority,
    conditions: rule.conditions,
    actions: rule.actions.map((action) => {
      const timeout = action.timeout || defaultTimeout;
      return {
        type: action.type,
        parameters: action.parameters ?? {},
        async: action.async,
        ...(timeout ? { timeout } : {}),
      };
    }),
    ...(rule.metadata !== undefined ? { metadata: rule.metadata } : {}),
  }));
}
