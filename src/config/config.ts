import {
  DEFAULT_NAVIGATION_CONFIG,
  INTEGER_CONFIG_KEYS,
  SIGNED_CONFIG_KEYS,
  type NavigationConfig,
} from "../shared/constants/NavigationConstants";

/**
 * Configuration for the navigation core.
 *
 * Tunables come from {@link DEFAULT_NAVIGATION_CONFIG}, optionally overridden
 * per field through `NAV_*` environment variables (camelCase key in
 * SCREAMING_SNAKE_CASE, e.g. `NAV_CELL_SIZE`, `NAV_MAX_SPEED`).
 *
 * @module config
 */

const CONFIG_KEYS = Object.keys(
  DEFAULT_NAVIGATION_CONFIG,
) as Array<keyof NavigationConfig>;

function toEnvName(key: string): string {
  return `NAV_${key.replace(/([A-Z])/g, "_$1").toUpperCase()}`;
}

/**
 * Builds a frozen config from defaults plus overrides.
 *
 * @throws Error listing every field that is not finite, not positive where
 * it must be, or not an integer where it must be
 */
export function createNavigationConfig(
  overrides: Partial<NavigationConfig> = {},
): NavigationConfig {
  const merged: NavigationConfig = { ...DEFAULT_NAVIGATION_CONFIG, ...overrides };
  const invalid: string[] = [];

  for (const key of CONFIG_KEYS) {
    const value = merged[key];
    if (!Number.isFinite(value)) {
      invalid.push(`${key} (not a finite number)`);
    } else if (INTEGER_CONFIG_KEYS.includes(key) && !Number.isInteger(value)) {
      invalid.push(`${key} (must be an integer)`);
    } else if (SIGNED_CONFIG_KEYS.includes(key)) {
      if ((key === "expandCells" || key === "startCellSearchRadius") && value < 0) {
        invalid.push(`${key} (must be >= 0)`);
      }
    } else if (value <= 0) {
      invalid.push(`${key} (must be > 0)`);
    }
  }

  if (invalid.length > 0) {
    throw new Error(`Invalid navigation config: ${invalid.join(", ")}`);
  }

  return Object.freeze(merged);
}

/**
 * Reads `NAV_*` overrides from an environment map.
 *
 * @throws Error when a variable is set but is not numeric
 */
export function loadNavigationConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): NavigationConfig {
  const overrides: Partial<Record<keyof NavigationConfig, number>> = {};
  const malformed: string[] = [];

  for (const key of CONFIG_KEYS) {
    const raw = env[toEnvName(key)];
    if (raw === undefined || raw.trim() === "") continue;
    const parsed = Number(raw);
    if (Number.isNaN(parsed)) {
      malformed.push(`${toEnvName(key)}=${raw}`);
      continue;
    }
    overrides[key] = parsed;
  }

  if (malformed.length > 0) {
    throw new Error(
      `Non-numeric navigation settings in environment: ${malformed.join(", ")}`,
    );
  }

  return createNavigationConfig(overrides);
}

/**
 * Process-wide configuration resolved at load time.
 *
 * Logging settings (`LOG_*`) are read by the logger itself.
 *
 * @property {NavigationConfig} NAVIGATION - Resolved navigation tunables
 */
export const CONFIG = {
  NAVIGATION: loadNavigationConfigFromEnv(process.env),
};

export { toEnvName as navigationEnvName };
