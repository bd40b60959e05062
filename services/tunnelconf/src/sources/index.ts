import { appLogger, normalizeError } from "../observability/logger.js";
import { resolveSettings, type ResolvedSettings } from "../resolve.js";
import type { SettingsFragment } from "../settings/settings.js";
import { EnvSource, type Environment } from "./env.js";
import { DEFAULT_SECRETS_DIR, SecretsSource } from "./secrets.js";
import type { SettingsSource } from "./types.js";
import { DEFAULT_WIREGUARD_CONF_PATH, WireguardFileSource } from "./wireguardFile.js";
import { defaultYamlPath, YamlFileSource } from "./yamlFile.js";

const logger = appLogger.child({ component: "load-settings" });

export type LoadSettingsOptions = {
  env?: Environment;
  unsetSecrets?: boolean;
  yamlPath?: string;
  secretsDir?: string;
  wireguardConfPath?: string;
  /** Replace whatever the sources decided, in order. */
  overrides?: readonly SettingsFragment[];
};

export type SourcePaths = {
  yamlPath: string;
  secretsDir: string;
  wireguardConfPath: string;
};

/** Explicit options first, then the tool's own environment variables, then built-in paths. */
export function resolveSourcePaths(options: LoadSettingsOptions = {}): SourcePaths {
  const env = options.env ?? process.env;
  return {
    yamlPath: options.yamlPath ?? (env.TUNNELCONF_CONFIG || defaultYamlPath()),
    secretsDir: options.secretsDir ?? (env.TUNNELCONF_SECRETS_DIR || DEFAULT_SECRETS_DIR),
    wireguardConfPath: options.wireguardConfPath ?? (env.WIREGUARD_CONF_PATH || DEFAULT_WIREGUARD_CONF_PATH),
  };
}

/** Highest priority first. */
export function defaultSources(options: LoadSettingsOptions = {}): SettingsSource[] {
  const paths = resolveSourcePaths(options);
  return [
    new SecretsSource({ directory: paths.secretsDir }),
    new WireguardFileSource({ path: paths.wireguardConfPath }),
    new EnvSource({ env: options.env, unsetSecrets: options.unsetSecrets }),
    new YamlFileSource({ path: paths.yamlPath }),
  ];
}

export async function readSources(sources: readonly SettingsSource[]): Promise<SettingsFragment[]> {
  const fragments: SettingsFragment[] = [];
  for (const source of sources) {
    try {
      fragments.push(await source.read());
    } catch (error) {
      logger.error({ event: "settings.source.failed", source: source.name, err: normalizeError(error) }, "source failed");
      throw error;
    }
    logger.debug({ event: "settings.source.read", source: source.name }, "source read");
  }
  return fragments;
}

export async function loadSettings(
  options: LoadSettingsOptions = {},
  sources: readonly SettingsSource[] = defaultSources(options),
): Promise<ResolvedSettings> {
  const fragments = await readSources(sources);
  return resolveSettings({ fragments, overrides: options.overrides });
}

export { EnvSource, readEnvFragment, SECRET_ENV_KEYS, type Environment, type EnvSourceOptions } from "./env.js";
export { SecretsSource, readSecretFile, DEFAULT_SECRETS_DIR, type SecretsSourceOptions } from "./secrets.js";
export type { SettingsSource } from "./types.js";
export {
  WireguardFileSource,
  parseWireguardConf,
  DEFAULT_WIREGUARD_CONF_PATH,
  type WireguardFileSourceOptions,
} from "./wireguardFile.js";
export { YamlFileSource, parseYamlSettings, defaultYamlPath, type YamlFileSourceOptions } from "./yamlFile.js";
