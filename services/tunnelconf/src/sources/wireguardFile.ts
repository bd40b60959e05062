import { readFile } from "node:fs/promises";

import ini from "ini";

import { SourceError, withContext } from "../settings/errors.js";
import { parseWireguardKey } from "../settings/keys.js";
import { parseEndpoint, parseIpNetwork, type Endpoint, type IpNetwork } from "../settings/network.js";
import { absent, present, type Optional } from "../settings/optional.js";
import { emptySettings, settingsFragment, type SettingsFragment } from "../settings/settings.js";
import { vpnFragment } from "../settings/vpn.js";
import { wireguardFragment, type WireguardSettings } from "../settings/wireguard.js";
import type { SettingsSource } from "./types.js";

export const DEFAULT_WIREGUARD_CONF_PATH = "/etc/wireguard/wg0.conf";

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** `ini` turns a line without `=` into a `true` flag; those are refused here. */
function checkDelimiters(entries: Section): void {
  for (const [key, value] of Object.entries(entries)) {
    if (isSection(value)) {
      checkDelimiters(value);
    } else if (typeof value !== "string") {
      throw new Error(`key-value delimiter not found: ${key}`);
    }
  }
}

function stringValue(section: Section | undefined, key: string): string | undefined {
  const value = section?.[key];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function parseKey(section: Section | undefined, key: string): Optional<string> {
  const value = stringValue(section, key);
  if (value === undefined) {
    return absent();
  }
  try {
    parseWireguardKey(value);
  } catch (error) {
    throw withContext(`parsing ${key}: ${value}`, error);
  }
  return present(value);
}

function parseNetworks(section: Section | undefined, key: string, context: string): Optional<IpNetwork[]> {
  const value = stringValue(section, key);
  if (value === undefined) {
    return absent();
  }
  const networks = value
    .split(",")
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
    .map(entry => {
      try {
        return parseIpNetwork(entry);
      } catch (error) {
        throw withContext(context, error);
      }
    });
  return present(networks);
}

function parseEndpointValue(section: Section | undefined): Optional<Endpoint> {
  const value = stringValue(section, "Endpoint");
  if (value === undefined) {
    return absent();
  }
  try {
    return present(parseEndpoint(value));
  } catch (error) {
    throw withContext(`parsing Endpoint: ${value}`, error);
  }
}

function withSection<T>(context: string, parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw new SourceError("wireguard-file", context, error);
  }
}

/** Extracts WireGuard settings from the content of a `wg-quick` style file. */
export function parseWireguardConf(content: string): Partial<WireguardSettings> {
  const document = withSection("parsing file", () => {
    const parsed: Section = ini.parse(content);
    checkDelimiters(parsed);
    return parsed;
  });
  const interfaceSection = isSection(document.Interface) ? document.Interface : undefined;
  const peerSection = isSection(document.Peer) ? document.Peer : undefined;

  const fromInterface = withSection("parsing interface section", () => ({
    privateKey: parseKey(interfaceSection, "PrivateKey"),
    addresses: parseNetworks(interfaceSection, "Address", "parsing address"),
    preSharedKey: parseKey(interfaceSection, "PreSharedKey"),
  }));

  const fromPeer = withSection("parsing peer section", () => ({
    publicKey: parseKey(peerSection, "PublicKey"),
    preSharedKey: parseKey(peerSection, "PresharedKey"),
    endpoint: parseEndpointValue(peerSection),
    allowedIPs: parseNetworks(peerSection, "AllowedIPs", "parsing allowed IPs"),
  }));

  return {
    privateKey: fromInterface.privateKey,
    addresses: fromInterface.addresses,
    publicKey: fromPeer.publicKey,
    preSharedKey: fromPeer.preSharedKey.kind === "present" ? fromPeer.preSharedKey : fromInterface.preSharedKey,
    endpoint: fromPeer.endpoint,
    allowedIPs: fromPeer.allowedIPs,
  };
}

export type WireguardFileSourceOptions = {
  path?: string;
};

export class WireguardFileSource implements SettingsSource {
  readonly name = "wireguard-file";
  readonly path: string;

  constructor(options: WireguardFileSourceOptions = {}) {
    this.path = options.path ?? DEFAULT_WIREGUARD_CONF_PATH;
  }

  async read(): Promise<SettingsFragment> {
    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return emptySettings();
      }
      throw new SourceError(this.name, `reading file ${this.path}`, error);
    }
    return settingsFragment({
      vpn: vpnFragment({ wireguard: wireguardFragment(parseWireguardConf(content)) }),
    });
  }
}
