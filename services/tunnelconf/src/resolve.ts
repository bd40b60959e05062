import { appLogger, normalizeError } from "./observability/logger.js";
import {
  deepFreeze,
  emptySettings,
  mergeSettings,
  overrideSettings,
  setSettingsDefaults,
  validateSettings,
  type Settings,
  type SettingsFragment,
} from "./settings/settings.js";
import { valueOr } from "./settings/optional.js";

const logger = appLogger.child({ component: "resolve" });

export type ResolveOptions = {
  /** Highest priority first; each only fills fields still absent. */
  fragments?: readonly SettingsFragment[];
  /** Applied in order after the fragments; each replaces present fields. */
  overrides?: readonly SettingsFragment[];
};

export type ResolvedSettings = Readonly<Settings>;

/**
 * Combines fragments, applies defaults once and validates. The returned
 * value is deeply frozen.
 */
export function resolveSettings(options: ResolveOptions = {}): ResolvedSettings {
  const fragments = options.fragments ?? [];
  const overrides = options.overrides ?? [];
  logger.debug(
    { event: "settings.resolve.start", fragments: fragments.length, overrides: overrides.length },
    "resolving settings",
  );

  let combined = fragments.reduce<Settings>((receiver, fragment) => mergeSettings(receiver, fragment), emptySettings());
  combined = overrides.reduce<Settings>((receiver, override) => overrideSettings(receiver, override), combined);
  const resolved = setSettingsDefaults(combined);

  try {
    validateSettings(resolved);
  } catch (error) {
    logger.error({ event: "settings.validate.failed", err: normalizeError(error) }, "settings are not valid");
    throw error;
  }

  logger.info(
    {
      event: "settings.resolve.complete",
      vpnType: valueOr(resolved.vpn.type, ""),
      provider: valueOr(resolved.vpn.provider, ""),
    },
    "settings resolved",
  );
  return deepFreeze(resolved);
}
