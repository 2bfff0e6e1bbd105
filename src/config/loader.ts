import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse } from 'yaml';
import type { ZodError } from 'zod';
import { ConfigError } from '../graph/errors.js';
import type { TaskState, TaskType } from '../types/index.js';
import {
  type TrackerConfig,
  type TrackerConfigOverride,
  TrackerConfigOverrideSchema,
  TrackerConfigSchema,
} from './schema.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_CONFIG_PATH = join(__dirname, 'default-config.yaml');

let defaultConfig: TrackerConfig | null = null;

export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

function validate(config: unknown, source: string): TrackerConfig {
  const result = TrackerConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(source, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Parse the YAML text of a user config file. An empty file is an empty override.
 */
export function parseConfigOverride(text: string, source: string): TrackerConfigOverride {
  const raw: unknown = parse(text) ?? {};
  const result = TrackerConfigOverrideSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(source, formatIssues(result.error));
  }
  return result.data;
}

export function mergeConfig(base: TrackerConfig, override: TrackerConfigOverride): TrackerConfig {
  return {
    maxIterations: override.maxIterations ?? base.maxIterations,
    pendingStates: override.pendingStates ?? base.pendingStates,
    satisfiedStates: override.satisfiedStates ?? base.satisfiedStates,
    requiredGates: { ...base.requiredGates, ...override.requiredGates },
    transitions: { ...base.transitions, ...override.transitions },
    dispatch: { ...base.dispatch, ...override.dispatch },
  };
}

export function getDefaultConfig(): TrackerConfig {
  if (!defaultConfig) {
    const text = readFileSync(DEFAULT_CONFIG_PATH, 'utf-8');
    defaultConfig = validate(parse(text), DEFAULT_CONFIG_PATH);
  }
  return defaultConfig;
}

/**
 * Load the tracker config: built-in defaults, overlaid with the YAML file at `path` when
 * one is given. A missing file is an error only when `required` is set.
 */
export function loadConfig(path?: string, required = true): TrackerConfig {
  const base = getDefaultConfig();
  if (!path) {
    return base;
  }
  if (!required && !existsSync(path)) {
    return base;
  }

  const override = parseConfigOverride(readFileSync(path, 'utf-8'), path);
  return validate(mergeConfig(base, override), path);
}

export function allowedNextStates(
  config: TrackerConfig,
  type: TaskType,
  state: TaskState
): TaskState[] {
  return config.transitions[type]?.[state] ?? [];
}

export function requiredGatesFor(config: TrackerConfig, type: TaskType): string[] {
  return config.requiredGates[type] ?? [];
}
