import { readFile } from "node:fs/promises";
import path from "node:path";

import YAML from "yaml";
import type { ZodIssue } from "zod";

import { controlServerFragment } from "../settings/controlServer.js";
import { parseDuration } from "../settings/duration.js";
import { SourceError, withContext } from "../settings/errors.js";
import { parseEndpoint, parseIpNetwork } from "../settings/network.js";
import { openvpnFragment } from "../settings/openvpn.js";
import { absent, fromUndefined, present, type Optional } from "../settings/optional.js";
import { emptySettings, settingsFragment, type SettingsFragment } from "../settings/settings.js";
import { updaterFragment, updaterProvidersFromList } from "../settings/updater.js";
import { vpnFragment } from "../settings/vpn.js";
import { wireguardFragment } from "../settings/wireguard.js";
import type { SettingsSource } from "./types.js";
import { SettingsDocumentSchema, type SettingsDocument } from "./yamlSchema.js";

export function defaultYamlPath(): string {
  return path.join(process.cwd(), "config", "settings.yaml");
}

function describeIssue(issue: ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${location}: ${issue.message}`;
}

function convert<T, U>(field: string, value: T | undefined, parse: (raw: T) => U): Optional<U> {
  if (value === undefined) {
    return absent();
  }
  try {
    return present(parse(value));
  } catch (error) {
    throw withContext(field, error);
  }
}

function toFragment(document: SettingsDocument): SettingsFragment {
  const wireguard = document.vpn?.wireguard ?? {};
  const openvpn = document.vpn?.openvpn ?? {};
  const controlServer = document.controlServer ?? {};
  const updater = document.updater ?? {};
  const providers = updater.providers;

  return settingsFragment({
    vpn: vpnFragment({
      type: fromUndefined(document.vpn?.type),
      provider: fromUndefined(document.vpn?.provider?.toLowerCase()),
      wireguard: wireguardFragment({
        interfaceName: fromUndefined(wireguard.interfaceName),
        privateKey: fromUndefined(wireguard.privateKey),
        publicKey: fromUndefined(wireguard.publicKey),
        preSharedKey: fromUndefined(wireguard.preSharedKey),
        endpoint: convert("vpn.wireguard.endpoint", wireguard.endpoint, parseEndpoint),
        allowedIPs: convert("vpn.wireguard.allowedIPs", wireguard.allowedIPs, list => list.map(parseIpNetwork)),
        addresses: convert("vpn.wireguard.addresses", wireguard.addresses, list => list.map(parseIpNetwork)),
        ipv6: fromUndefined(wireguard.ipv6),
        firewallMark: fromUndefined(wireguard.firewallMark),
        rulePriority: fromUndefined(wireguard.rulePriority),
        implementation: fromUndefined(wireguard.implementation),
      }),
      openvpn: openvpnFragment({
        version: fromUndefined(openvpn.version),
        user: fromUndefined(openvpn.user),
        password: fromUndefined(openvpn.password),
        confFile: fromUndefined(openvpn.confFile),
        ciphers: fromUndefined(openvpn.ciphers),
        auth: fromUndefined(openvpn.auth),
        cert: fromUndefined(openvpn.cert),
        key: fromUndefined(openvpn.key),
        encryptedKey: fromUndefined(openvpn.encryptedKey),
        keyPassphrase: fromUndefined(openvpn.keyPassphrase),
        encryptionPreset: fromUndefined(openvpn.encryptionPreset),
        mssFix: fromUndefined(openvpn.mssFix),
        interfaceName: fromUndefined(openvpn.interfaceName),
        processUser: fromUndefined(openvpn.processUser),
        verbosity: fromUndefined(openvpn.verbosity),
        flags: fromUndefined(openvpn.flags),
      }),
    }),
    controlServer: controlServerFragment({
      address: fromUndefined(controlServer.address),
      log: fromUndefined(controlServer.log),
    }),
    updater: updaterFragment({
      period: convert("updater.period", updater.period, raw => (raw === 0 ? 0 : parseDuration(raw))),
      dnsAddress: fromUndefined(updater.dnsAddress),
      ...(providers ? { providers: updaterProvidersFromList(providers) } : {}),
    }),
  });
}

/** Parses and validates a YAML settings document. */
export function parseYamlSettings(content: string, source: string): SettingsFragment {
  const context = `parsing ${source}`;
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (error) {
    throw new SourceError("yaml-file", context, error);
  }
  if (raw === null || raw === undefined) {
    return emptySettings();
  }
  const result = SettingsDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new SourceError("yaml-file", context, new Error(describeIssue(result.error.issues[0])));
  }
  try {
    return toFragment(result.data);
  } catch (error) {
    throw new SourceError("yaml-file", context, error);
  }
}

export type YamlFileSourceOptions = {
  path?: string;
};

export class YamlFileSource implements SettingsSource {
  readonly name = "yaml-file";
  readonly path: string;

  constructor(options: YamlFileSourceOptions = {}) {
    this.path = options.path ?? defaultYamlPath();
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
    return parseYamlSettings(content, this.path);
  }
}
