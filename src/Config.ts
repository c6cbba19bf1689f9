export interface EngineConfig {
  /** Throw DuplicateSchemaNameError instead of warning when a type redeclares an attribute */
  strictSchema: boolean;
  /** Print a summary table after each top-level serialization */
  trace: boolean;
}

type Environment = Record<string, string | undefined>;

const isEnabled = (value: string | undefined): boolean => (value || '').trim() === '1';

/**
 * Read engine settings from environment variables
 * @param env The environment to read, defaults to the process environment
 */
export function loadConfig(env: Environment = process.env): EngineConfig {
  return {
    strictSchema: isEnabled(env.SCENE_MARKUP_STRICT_SCHEMA),
    trace: isEnabled(env.SCENE_MARKUP_TRACE),
  };
}

let current: EngineConfig = loadConfig();

export function getConfig(): Readonly<EngineConfig> {
  return current;
}

/**
 * Override part of the active settings
 * @returns The settings now in effect
 */
export function configure(overrides: Partial<EngineConfig>): Readonly<EngineConfig> {
  current = { ...current, ...overrides };
  return current;
}

/**
 * Drop programmatic overrides and re-read the environment
 */
export function resetConfig(env: Environment = process.env): Readonly<EngineConfig> {
  current = loadConfig(env);
  return current;
}
