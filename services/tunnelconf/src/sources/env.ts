import { appLogger } from "../observability/logger.js";
import { controlServerFragment } from "../settings/controlServer.js";
import { parseDuration } from "../settings/duration.js";
import { SourceError } from "../settings/errors.js";
import { parseIpAddress, parseIpNetworkList, parsePort, type Endpoint } from "../settings/network.js";
import { openvpnFragment } from "../settings/openvpn.js";
import { absent, fromUndefined, present, type Optional } from "../settings/optional.js";
import { settingsFragment, type SettingsFragment } from "../settings/settings.js";
import {
  isUpdatableProvider,
  updaterFragment,
  updaterProvidersFromList,
  type UpdaterProviderFlags,
} from "../settings/updater.js";
import { vpnFragment } from "../settings/vpn.js";
import { MAX_UINT32, wireguardFragment } from "../settings/wireguard.js";
import { extractPemBody, parseBoolean, parseCsv, parseInteger, parseUnsignedInteger } from "./parse.js";
import type { SettingsSource } from "./types.js";

const logger = appLogger.child({ component: "env-source" });

const MAX_UINT16 = 0xffff;

export type Environment = Record<string, string | undefined>;

export type EnvSourceOptions = {
  /** Defaults to `process.env`. */
  env?: Environment;
  /** Removes secret variables once read; on by default when reading `process.env`. */
  unsetSecrets?: boolean;
};

export const SECRET_ENV_KEYS = [
  "WIREGUARD_PRIVATE_KEY",
  "WIREGUARD_PRESHARED_KEY",
  "OPENVPN_USER",
  "OPENVPN_PASSWORD",
  "OPENVPN_KEY",
  "OPENVPN_ENCRYPTED_KEY",
  "OPENVPN_KEY_PASSPHRASE",
] as const;

class EnvReader {
  constructor(private readonly env: Environment) {}

  /** Trimmed value; empty variables count as unset. */
  get(key: string): string | undefined {
    const value = this.env[key]?.trim();
    return value && value.length > 0 ? value : undefined;
  }

  /** Falls back to deprecated aliases in order, logging the one used. */
  getWithAliases(key: string, aliases: readonly string[]): { key: string; value: string } | undefined {
    const value = this.get(key);
    if (value !== undefined) {
      return { key, value };
    }
    for (const alias of aliases) {
      const aliased = this.get(alias);
      if (aliased !== undefined) {
        logger.warn(
          { event: "settings.env.deprecated_key", key: alias, replacement: key },
          "deprecated environment variable, please use the replacement",
        );
        return { key: alias, value: aliased };
      }
    }
    return undefined;
  }

  string(key: string, aliases: readonly string[] = []): Optional<string> {
    return fromUndefined(this.getWithAliases(key, aliases)?.value);
  }

  parsed<T>(key: string, parse: (raw: string) => T, aliases: readonly string[] = []): Optional<T> {
    const found = this.getWithAliases(key, aliases);
    if (!found) {
      return absent();
    }
    try {
      return present(parse(found.value));
    } catch (error) {
      throw new SourceError("env", `environment variable ${found.key}`, error);
    }
  }
}

function readEndpoint(reader: EnvReader): Optional<Endpoint> {
  const address = reader.parsed("WIREGUARD_ENDPOINT_IP", parseIpAddress);
  const port = reader.parsed("WIREGUARD_ENDPOINT_PORT", parsePort);
  if (address.kind === "absent" && port.kind === "absent") {
    return absent();
  }
  return present({
    address: address.kind === "present" ? address.value : undefined,
    port: port.kind === "present" ? port.value : 0,
  });
}

function parseUpdatableProviders(raw: string): UpdaterProviderFlags {
  const enabled = parseCsv(raw.toLowerCase()).map(name => {
    if (!isUpdatableProvider(name)) {
      throw new Error(`provider is not updatable: ${name}`);
    }
    return name;
  });
  return updaterProvidersFromList(enabled);
}

function readControlServerAddress(reader: EnvReader): Optional<string> {
  const found = reader.getWithAliases("HTTP_CONTROL_SERVER_ADDRESS", ["HTTP_CONTROL_SERVER_PORT"]);
  if (!found) {
    return absent();
  }
  if (found.key === "HTTP_CONTROL_SERVER_ADDRESS") {
    return present(found.value);
  }
  try {
    return present(`:${parsePort(found.value)}`);
  } catch (error) {
    throw new SourceError("env", `environment variable ${found.key}`, error);
  }
}

/** Reads a settings fragment from environment variables. */
export function readEnvFragment(env: Environment): SettingsFragment {
  const reader = new EnvReader(env);
  const providers = reader.parsed("UPDATER_VPN_SERVICE_PROVIDERS", parseUpdatableProviders);

  return settingsFragment({
    vpn: vpnFragment({
      type: reader.string("VPN_TYPE"),
      provider: reader.parsed("VPN_SERVICE_PROVIDER", raw => raw.toLowerCase()),
      wireguard: wireguardFragment({
        interfaceName: reader.string("VPN_INTERFACE", ["WIREGUARD_INTERFACE"]),
        privateKey: reader.string("WIREGUARD_PRIVATE_KEY"),
        publicKey: reader.string("WIREGUARD_PUBLIC_KEY"),
        preSharedKey: reader.string("WIREGUARD_PRESHARED_KEY"),
        endpoint: readEndpoint(reader),
        allowedIPs: reader.parsed("WIREGUARD_ALLOWED_IPS", parseIpNetworkList),
        addresses: reader.parsed("WIREGUARD_ADDRESSES", parseIpNetworkList, ["WIREGUARD_ADDRESS"]),
        ipv6: reader.parsed("WIREGUARD_IPV6", parseBoolean),
        firewallMark: reader.parsed("WIREGUARD_FIREWALL_MARK", raw => parseUnsignedInteger(raw, MAX_UINT32)),
        rulePriority: reader.parsed("WIREGUARD_RULE_PRIORITY", raw => parseUnsignedInteger(raw, MAX_UINT32)),
        implementation: reader.string("WIREGUARD_IMPLEMENTATION"),
      }),
      openvpn: openvpnFragment({
        version: reader.string("OPENVPN_VERSION"),
        user: reader.string("OPENVPN_USER"),
        password: reader.string("OPENVPN_PASSWORD"),
        confFile: reader.string("OPENVPN_CUSTOM_CONFIG"),
        ciphers: reader.parsed("OPENVPN_CIPHERS", parseCsv),
        auth: reader.string("OPENVPN_AUTH"),
        cert: reader.parsed("OPENVPN_CERT", extractPemBody),
        key: reader.parsed("OPENVPN_KEY", extractPemBody),
        encryptedKey: reader.parsed("OPENVPN_ENCRYPTED_KEY", extractPemBody),
        keyPassphrase: reader.string("OPENVPN_KEY_PASSPHRASE"),
        encryptionPreset: reader.string("PRIVATE_INTERNET_ACCESS_OPENVPN_ENCRYPTION_PRESET"),
        mssFix: reader.parsed("OPENVPN_MSSFIX", raw => parseUnsignedInteger(raw, MAX_UINT16)),
        interfaceName: reader.string("VPN_INTERFACE", ["OPENVPN_INTERFACE"]),
        processUser: reader.string("OPENVPN_PROCESS_USER"),
        verbosity: reader.parsed("OPENVPN_VERBOSITY", parseInteger),
        flags: reader.parsed("OPENVPN_FLAGS", raw => raw.split(/\s+/)),
      }),
    }),
    controlServer: controlServerFragment({
      address: readControlServerAddress(reader),
      log: reader.parsed("HTTP_CONTROL_SERVER_LOG", parseBoolean),
    }),
    updater: updaterFragment({
      period: reader.parsed("UPDATER_PERIOD", parseDuration),
      dnsAddress: reader.string("UPDATER_DNS_ADDRESS"),
      ...(providers.kind === "present" ? { providers: providers.value } : {}),
    }),
  });
}

export class EnvSource implements SettingsSource {
  readonly name = "env";
  private readonly env: Environment;
  private readonly unsetSecrets: boolean;

  constructor(options: EnvSourceOptions = {}) {
    this.env = options.env ?? process.env;
    this.unsetSecrets = options.unsetSecrets ?? options.env === undefined;
  }

  async read(): Promise<SettingsFragment> {
    const fragment = readEnvFragment(this.env);
    if (this.unsetSecrets) {
      for (const key of SECRET_ENV_KEYS) {
        delete this.env[key];
      }
    }
    return fragment;
  }
}
