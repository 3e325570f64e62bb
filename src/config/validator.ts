import { ConfigError } from "../core/errors.js";
import { schemaRegistry } from "../schema/registry.js";
import { PLATFORM_NAMES, type PlatformName, type PlatformTarget, type TestConfig } from "../types/config.js";

function conformsToSchema(value: unknown): value is TestConfig {
  return schemaRegistry().check("config", value).valid;
}

/**
 * Validate a merged configuration against `config.schema.json`.
 * Throws ConfigError listing every schema violation.
 */
export function validateConfig(merged: unknown, source: string): TestConfig {
  if (conformsToSchema(merged)) return merged;
  schemaRegistry().assertValid("config", merged, source);
  // assertValid always throws when the guard above rejected the value
  throw new ConfigError(`${source} is invalid`);
}

/**
 * Expand the configuration into platform targets. A per-platform `enabled`
 * overrides the `platforms` map; `only` restricts to one platform.
 */
export function resolvePlatformTargets(config: TestConfig, only?: PlatformName): PlatformTarget[] {
  const targets = PLATFORM_NAMES.map((name): PlatformTarget => {
    const section = config[name];
    return {
      name,
      enabled: section.enabled ?? config.platforms[name],
      skipWorkflow: section.skip_workflow,
      portableVersion: name === "windows_portable" ? (config.windows_portable.comfyui_portable_version ?? "latest") : null,
    };
  });
  return only === undefined ? targets : targets.filter((t) => t.name === only);
}

/** Enabled targets; none is a configuration error. */
export function requireEnabledTargets(targets: readonly PlatformTarget[], only?: PlatformName): PlatformTarget[] {
  const enabled = targets.filter((t) => t.enabled);
  if (enabled.length === 0) {
    throw new ConfigError(
      only === undefined
        ? "No platforms enabled: enable at least one of linux, macos, windows, windows_portable"
        : `Platform '${only}' is not enabled in the configuration`,
    );
  }
  return enabled;
}

export function isPlatformName(value: string): value is PlatformName {
  return (PLATFORM_NAMES as readonly string[]).includes(value);
}
